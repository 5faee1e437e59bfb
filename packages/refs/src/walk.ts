/**
 * Tree traversal.
 *
 * Every pass works on inline lists in place. The walker owns the one place
 * that knows where each node kind keeps its child lists; passes only say
 * which nodes they care about.
 */

import type { Block, Inline } from '@xrefs/types';

export type Node = Block | Inline;

export type InlineReplacer = (token: Inline) => Inline[] | undefined;

/** The inline lists a node owns directly. */
export function childInlineLists(node: Node): Inline[][] {
  switch (node.t) {
    case 'Plain':
    case 'Para':
    case 'Header':
    case 'Emph':
    case 'Strong':
    case 'Underline':
    case 'Strikeout':
    case 'Superscript':
    case 'Subscript':
    case 'SmallCaps':
    case 'Quoted':
    case 'Link':
    case 'Image':
    case 'Span':
      return [node.content];
    case 'Table':
      return [node.caption];
    case 'Cite':
      return [...node.citations.flatMap(c => [c.prefix, c.suffix]), node.content];
    default:
      return [];
  }
}

function childBlockLists(node: Node): Block[][] {
  switch (node.t) {
    case 'BlockQuote':
    case 'Div':
    case 'Note':
      return [node.blocks];
    case 'BulletList':
    case 'OrderedList':
      return node.items;
    case 'Table':
      return node.rows.flat();
    default:
      return [];
  }
}

/**
 * Visit every node in document order. A node is visited before its
 * children, and its child lists are read after the visitor returns, so a
 * visitor may rewrite them freely.
 */
export function visitTree(blocks: Block[], visitor: (node: Node) => void): void {
  for (let i = 0; i < blocks.length; i++) {
    visitNode(blocks[i], visitor);
  }
}

function visitNode(node: Node, visitor: (node: Node) => void): void {
  visitor(node);
  for (const list of childInlineLists(node)) {
    for (let i = 0; i < list.length; i++) {
      visitNode(list[i], visitor);
    }
  }
  for (const list of childBlockLists(node)) {
    visitTree(list, visitor);
  }
}

/**
 * Offer every inline token to `replace`. A returned array is spliced in
 * place of the token; the replacement tokens themselves are not offered
 * again, but their children are.
 */
export function replaceInlines(blocks: Block[], replace: InlineReplacer): void {
  for (const block of blocks) {
    descend(block, replace);
  }
}

function descend(node: Node, replace: InlineReplacer): void {
  for (const list of childInlineLists(node)) {
    replaceInList(list, replace);
  }
  for (const list of childBlockLists(node)) {
    for (const block of list) {
      descend(block, replace);
    }
  }
}

function replaceInList(list: Inline[], replace: InlineReplacer): void {
  let i = 0;
  while (i < list.length) {
    const token = list[i];
    const replacement = replace(token);
    if (replacement === undefined) {
      descend(token, replace);
      i++;
      continue;
    }
    list.splice(i, 1, ...replacement);
    for (const inserted of replacement) {
      descend(inserted, replace);
    }
    i += replacement.length;
  }
}

/**
 * The inline lists of `node` that reference processing should scan, given
 * the container kinds enabled for the current tool version.
 */
export function referenceListsOf(node: Node, containers: ReadonlySet<string>): Inline[][] {
  switch (node.t) {
    case 'Para':
    case 'Plain':
    case 'Emph':
    case 'Strong':
    case 'Underline':
    case 'Span':
    case 'Header':
    case 'Image':
      return containers.has(node.t) ? [node.content] : [];
    case 'Table':
      return containers.has('TableCaption') ? [node.caption] : [];
    case 'Cite':
      return containers.has('CiteAffixes')
        ? node.citations.flatMap(c => [c.prefix, c.suffix])
        : [];
    default:
      return [];
  }
}

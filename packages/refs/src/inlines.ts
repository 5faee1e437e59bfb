/**
 * Inline list utilities: constructors, text rendering, and in-place string
 * joining.
 */

import type { Cite, Document, Inline, Space, Str } from '@xrefs/types';
import { visitTree } from './walk';

export function str(text: string): Str {
  return { t: 'Str', text };
}

export function space(): Space {
  return { t: 'Space' };
}

/** A single-record citation in author-in-text mode, as the upstream parser would emit it. */
export function cite(label: string): Cite {
  return {
    t: 'Cite',
    citations: [
      { id: label, prefix: [], suffix: [], mode: 'AuthorInText', noteNum: 0, hash: 0 },
    ],
    content: [str(`@${label}`)],
  };
}

/**
 * Replace Quoted tokens with quote-delimited strings. Returns a new list;
 * the input is not modified.
 */
export function quotify(list: Inline[]): Inline[] {
  const out: Inline[] = [];
  for (const token of list) {
    if (token.t === 'Quoted') {
      const mark = token.quoteType === 'DoubleQuote' ? '"' : "'";
      out.push(str(mark), ...quotify(token.content), str(mark));
    } else if (token.t === 'Str') {
      // copied, since joinStrings below merges in place
      out.push(str(token.text));
    } else {
      out.push(mapContent(token, quotify));
    }
  }
  joinStrings(out);
  return out;
}

/**
 * Replace Math tokens with `$`-enclosed strings. Returns a new list.
 */
export function dollarfy(list: Inline[]): Inline[] {
  return list.map(token =>
    token.t === 'Math' ? str(`$${token.text}$`) : mapContent(token, dollarfy),
  );
}

function mapContent(token: Inline, fn: (list: Inline[]) => Inline[]): Inline {
  switch (token.t) {
    case 'Emph':
    case 'Strong':
    case 'Underline':
    case 'Strikeout':
    case 'Superscript':
    case 'Subscript':
    case 'SmallCaps':
    case 'Quoted':
    case 'Cite':
    case 'Link':
    case 'Image':
    case 'Span':
      return { ...token, content: fn(token.content) };
    default:
      return token;
  }
}

/**
 * Flatten inlines to plain text. Quoted tokens contribute only their
 * content and Math its source; run quotify/dollarfy first to keep the
 * delimiters.
 */
export function stringify(list: Inline[]): string {
  let out = '';
  for (const token of list) {
    switch (token.t) {
      case 'Str':
      case 'Code':
      case 'Math':
        out += token.text;
        break;
      case 'Space':
      case 'SoftBreak':
      case 'LineBreak':
        out += ' ';
        break;
      case 'RawInline':
      case 'Note':
        break;
      default:
        out += stringify(token.content);
    }
  }
  return out;
}

/** Text exactly as written: quotes and math delimiters included. */
export function toLiteralText(list: Inline[]): string {
  return stringify(dollarfy(quotify(list)));
}

/**
 * Merge adjacent Str tokens in place, starting at `start`. Returns true if
 * anything was merged.
 */
export function joinStrings(list: Inline[], start = 0): boolean {
  let merged = false;
  let i = start;
  while (i < list.length - 1) {
    const current = list[i];
    const next = list[i + 1];
    if (current.t === 'Str' && next.t === 'Str') {
      current.text += next.text;
      list.splice(i + 1, 1);
      merged = true;
    } else {
      i++;
    }
  }
  return merged;
}

/** Merge adjacent Str tokens in every inline list of the document. */
export function joinDocumentStrings(doc: Document): boolean {
  let merged = false;
  visitTree(doc.blocks, node => {
    if (node.t === 'Table') {
      if (joinStrings(node.caption)) merged = true;
    } else if ('content' in node && joinStrings(node.content)) {
      merged = true;
    }
  });
  return merged;
}

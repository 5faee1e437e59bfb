/**
 * Attribute attach/detach for element kinds that carry no attributes of
 * their own (Math, Cite) or whose attributes pandoc may leave empty.
 *
 *   $$ y = f(x) $$ {#eq:1 tag="B.1"}
 *
 * attaches `["eq:1", [], [["tag", "B.1"]]]` to the Math token and removes
 * the attribute text from the paragraph.
 */

import type { Attr, Block, Document, Inline, Table } from '@xrefs/types';
import { report } from '@xrefs/core';
import type { PipelineContext } from '@xrefs/core';
import { AttributeSet } from './attributes';
import { joinStrings, str } from './inlines';
import { tryScanAttributes } from './scanner';
import { childInlineLists, replaceInlines, visitTree } from './walk';

// ============================================================================
// Attributable Kinds
// ============================================================================

export type AttributableKind = 'Math' | 'Cite' | 'Image' | 'Span' | 'Link' | 'Table';

export interface KindInfo {
  /** pandoc gives this kind an attribute field of its own */
  native: boolean;
}

export const ATTRIBUTABLE_KINDS: Readonly<Record<AttributableKind, KindInfo>> = {
  Math: { native: false },
  Cite: { native: false },
  Image: { native: true },
  Span: { native: true },
  Link: { native: true },
  Table: { native: true },
};

export interface AttachOptions {
  /** Allow one Space between the element and its `{...}` */
  allowSpace?: boolean;
  /** Overwrite attributes the element already has */
  replace?: boolean;
}

export interface DetachOptions {
  /** Write the removed attributes back as `{...}` text after the element */
  restore?: boolean;
}

// ============================================================================
// Attach
// ============================================================================

function isCandidate(token: Inline, kind: AttributableKind, replace: boolean): boolean {
  if (token.t !== kind) return false;
  switch (token.t) {
    case 'Math':
    case 'Cite':
      return replace || token.attrs === undefined;
    case 'Span':
      return replace || token.attrs === null;
    case 'Image':
    case 'Link':
      return replace || AttributeSet.fromPandoc(token.attrs).isEmpty;
    default:
      return false;
  }
}

function setAttrs(token: Inline, attrs: Attr): void {
  switch (token.t) {
    case 'Math':
    case 'Cite':
    case 'Span':
    case 'Image':
    case 'Link':
      token.attrs = attrs;
      break;
  }
}

function warnIfMalformed(attrs: AttributeSet, ctx: PipelineContext): void {
  if (!attrs.parseFailed) return;
  report(ctx, {
    code: 'MALFORMED_ATTRIBUTES',
    severity: 'critical',
    message: `Malformed attributes: ${attrs.rawSource}`,
  });
}

/**
 * Attach the attributes that follow each element of `kind` in paragraph
 * bodies. Returns the number of elements that received attributes.
 */
export function attachAttributes(
  doc: Document,
  kind: AttributableKind,
  options: AttachOptions,
  ctx: PipelineContext,
): number {
  let attached = 0;

  visitTree(doc.blocks, node => {
    if (node.t === 'Table' && kind === 'Table') {
      if (attachToTable(node, options.replace ?? false, ctx)) attached++;
      return;
    }
    if (node.t !== 'Para' && node.t !== 'Plain') return;

    attached += attachInList(node.content, kind, options, ctx);

    // A lone image in a paragraph is a figure
    const only = node.content.length === 1 ? node.content[0] : undefined;
    if (kind === 'Image' && only !== undefined && only.t === 'Image') {
      only.title = 'fig:';
    }
  });

  return attached;
}

/**
 * Settle every pending `Span(null)` left by replacing bracketed references,
 * in any inline list of the document: attach the `{...}` that follows it, or
 * unwrap it back to `[`...`]` text. Returns the number of spans that received
 * attributes.
 */
export function settlePendingSpans(doc: Document, ctx: PipelineContext): number {
  let attached = 0;
  visitTree(doc.blocks, node => {
    for (const list of childInlineLists(node)) {
      attached += attachInList(list, 'Span', {}, ctx);
    }
  });
  return attached;
}

function attachInList(
  list: Inline[],
  kind: AttributableKind,
  options: AttachOptions,
  ctx: PipelineContext,
): number {
  let attached = 0;
  let result = attachFirst(list, kind, options, ctx);
  while (result !== 'done') {
    if (result === 'attached') attached++;
    result = attachFirst(list, kind, options, ctx);
  }
  return attached;
}

/**
 * Attach to the first candidate followed by attributes, or unwrap the
 * first pending span that has none. Scanning restarts after either, since
 * both change the list.
 */
function attachFirst(
  list: Inline[],
  kind: AttributableKind,
  options: AttachOptions,
  ctx: PipelineContext,
): 'attached' | 'unwrapped' | 'done' {
  const replace = options.replace ?? false;

  for (let i = 0; i < list.length; i++) {
    const token = list[i];
    if (!isCandidate(token, kind, replace)) continue;

    let n = i + 1;
    const spaced = options.allowSpace === true && n < list.length && list[n].t === 'Space';
    if (spaced) n++;

    const found = tryScanAttributes(list, n);
    if (found) {
      warnIfMalformed(found, ctx);
      setAttrs(token, found.toPandoc());
      if (spaced) list.splice(i + 1, 1);
      return 'attached';
    }

    // A bracketed reference that turned out to have no attributes goes
    // back to being plain text
    if (token.t === 'Span' && token.attrs === null) {
      list.splice(i, 1, str('['), ...token.content, str(']'));
      joinStrings(list, Math.max(0, i - 1));
      return 'unwrapped';
    }
  }
  return 'done';
}

/** Take `{...}` from the end of a table caption. */
function attachToTable(table: Table, replace: boolean, ctx: PipelineContext): boolean {
  if (!replace && !AttributeSet.fromPandoc(table.attrs).isEmpty) return false;

  const { caption } = table;
  for (let j = caption.length - 1; j >= 0; j--) {
    const token = caption[j];
    if (token.t !== 'Str' || !token.text.startsWith('{')) continue;

    const trial = [...caption];
    const found = tryScanAttributes(trial, j);
    // Only a block that ends the caption counts
    if (!found || trial.length !== j) return false;

    while (trial.length > 0 && trial[trial.length - 1].t === 'Space') {
      trial.pop();
    }
    warnIfMalformed(found, ctx);
    caption.splice(0, caption.length, ...trial);
    table.attrs = found.toPandoc();
    return true;
  }
  return false;
}

// ============================================================================
// Detach
// ============================================================================

function stripAttrs(token: Inline): { bare: Inline; attrs: AttributeSet } | null {
  if (token.t === 'Math' && token.attrs !== undefined) {
    return {
      bare: { t: 'Math', mathType: token.mathType, text: token.text },
      attrs: AttributeSet.fromPandoc(token.attrs),
    };
  }
  if (token.t === 'Cite' && token.attrs !== undefined) {
    return {
      bare: { t: 'Cite', citations: token.citations, content: token.content },
      attrs: AttributeSet.fromPandoc(token.attrs),
    };
  }
  return null;
}

/**
 * Remove attributes this engine attached to elements of `kind`. Native
 * attributes are left as they are. Returns the number of elements changed.
 */
export function detachAttributes(doc: Document, kind: AttributableKind, options: DetachOptions = {}): number {
  if (ATTRIBUTABLE_KINDS[kind].native) return 0;

  let detached = 0;
  replaceInlines(doc.blocks, token => {
    if (token.t !== kind) return undefined;
    const stripped = stripAttrs(token);
    if (stripped === null) return undefined;

    detached++;
    if (options.restore && !stripped.attrs.isEmpty) {
      return [stripped.bare, str(stripped.attrs.toMarkdown())];
    }
    return [stripped.bare];
  });
  return detached;
}

/** Attributes carried by a node of `kind`, or null when none are attached. */
export function attachedAttrs(node: Block | Inline, kind: AttributableKind | 'Div'): Attr | null {
  if (node.t !== kind) return null;
  switch (node.t) {
    case 'Math':
    case 'Cite':
      return node.attrs ?? null;
    case 'Span':
      return node.attrs;
    case 'Image':
    case 'Link':
    case 'Table':
    case 'Div':
      return node.attrs;
    default:
      return null;
  }
}

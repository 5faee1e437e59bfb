/**
 * Reference processing: normalizes Cite tokens that point at known labels.
 *
 * Consider `{+@fig:1}{.wide}`: `+` is a modifier, the braces are
 * decoration, and `{.wide}` attaches attributes. After processing, the Cite
 * carries `["", ["wide"], [["modifier", "+"]]]` as its attributes and the
 * surrounding strings are free of brace and modifier characters.
 */

import type { Cite, Document, Inline, Modifier } from '@xrefs/types';
import { report, reportOnce, requireProfile } from '@xrefs/core';
import type { PipelineContext } from '@xrefs/core';
import { AttributeSet } from './attributes';
import { stringify } from './inlines';
import { tryScanAttributes } from './scanner';
import { referenceListsOf, visitTree } from './walk';

// ============================================================================
// Label Matching
// ============================================================================

export interface LabelMatcherOptions {
  /** Labels of targets defined in the document */
  labels?: Iterable<string>;
  /** Labels matching this are processed even when unknown (and reported) */
  pattern?: RegExp | string;
  /** Labels matching this are only reported when unknown */
  warnPattern?: RegExp | string;
}

export interface LabelMatcher {
  /** Map a label onto a known one, falling back to its last `:` segment. */
  resolve(label: string): string;
  isKnown(label: string): boolean;
  accepts(label: string): boolean;
  shouldWarn(label: string): boolean;
}

/** Anchor at the start only, like a prefix match; drop stateful flags. */
function toPrefixMatcher(pattern: RegExp | string | undefined): ((s: string) => boolean) | null {
  if (pattern === undefined) return null;
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  const re = new RegExp(`^(?:${source})`, flags);
  return (s) => re.test(s);
}

export function createLabelMatcher(options: LabelMatcherOptions): LabelMatcher {
  const labels = new Set(options.labels ?? []);
  const pattern = toPrefixMatcher(options.pattern);
  const warnPattern = toPrefixMatcher(options.warnPattern);

  return {
    resolve(label) {
      if (labels.has(label) || !label.includes(':')) return label;
      const segment = label.slice(label.lastIndexOf(':') + 1);
      return labels.has(segment) ? segment : label;
    },
    isKnown: (label) => labels.has(label),
    accepts: (label) => labels.has(label) || (pattern !== null && pattern(label)),
    shouldWarn: (label) =>
      !labels.has(label) &&
      ((pattern !== null && pattern(label)) || (warnPattern !== null && warnPattern(label))),
  };
}

// ============================================================================
// Processing
// ============================================================================

const MODIFIERS: readonly string[] = ['+', '*', '!', '-'];

function isModifier(c: string): c is Modifier {
  return MODIFIERS.includes(c);
}

/**
 * Normalize every eligible Cite in `list`, in place. Each normalization can
 * delete neighbouring tokens, so scanning restarts after every one; a Cite
 * that already carries attributes is never touched again.
 *
 * Returns the number of Cite tokens normalized.
 */
export function processReferences(
  list: Inline[],
  matcher: LabelMatcher,
  ctx: PipelineContext,
): number {
  let processed = 0;
  while (processFirst(list, matcher, ctx)) {
    processed++;
  }
  return processed;
}

function processFirst(list: Inline[], matcher: LabelMatcher, ctx: PipelineContext): boolean {
  for (let i = 0; i < list.length; i++) {
    const token = list[i];
    if (token.t !== 'Cite' || token.attrs !== undefined || token.citations.length !== 1) {
      continue;
    }

    const label = matcher.resolve(token.citations[0].id);

    if (matcher.shouldWarn(label)) {
      reportOnce(ctx, `BAD_REFERENCE:${label}`, {
        code: 'BAD_REFERENCE',
        severity: 'critical',
        message: `Bad reference: @${label}.`,
        label,
      });
    }

    if (!matcher.accepts(label)) continue;

    normalizeCitation(list, i, token, ctx);
    return true;
  }
  return false;
}

function normalizeCitation(list: Inline[], index: number, token: Cite, ctx: PipelineContext): void {
  const attrs = new AttributeSet();

  let i = extractModifier(list, index, token, attrs, ctx);
  i = removeBrackets(list, i, token);

  // Attributes must follow the label immediately
  const citation = token.citations[0];
  if (citation.suffix.length === 0 && !stringify(token.content).endsWith(']')) {
    const found = tryScanAttributes(list, i + 1);
    if (found) {
      if (found.parseFailed) {
        report(ctx, {
          code: 'MALFORMED_ATTRIBUTES',
          severity: 'critical',
          message: `Malformed attributes: ${found.rawSource}`,
          label: citation.id,
        });
      }
      attrs.merge(found);
    }
  }

  token.attrs = attrs.toPandoc();
}

/**
 * Move a modifier character in front of the Cite at `i` into `attrs`. The
 * modifier sits either at the end of the citation's own prefix or at the
 * end of the preceding Str. Returns the Cite's index after any deletion.
 */
function extractModifier(
  list: Inline[],
  i: number,
  token: Cite,
  attrs: AttributeSet,
  ctx: PipelineContext,
): number {
  const { prefix } = token.citations[0];
  const lastPrefix: Inline | undefined = prefix[prefix.length - 1];
  const previous: Inline | undefined = i > 0 ? list[i - 1] : undefined;

  let inPrefix = false;
  let text: string;
  if (lastPrefix !== undefined && lastPrefix.t === 'Str') {
    inPrefix = true;
    text = lastPrefix.text;
  } else if (previous !== undefined && previous.t === 'Str') {
    text = previous.text;
  } else {
    return i;
  }

  const modifier = text.slice(-1);
  if (!isModifier(modifier)) return i;

  if (modifier === '+' || modifier === '*') {
    ctx.cleverefNeeded = true;
  }
  attrs.set('modifier', modifier);

  const remaining = text.slice(0, -1);
  if (inPrefix && lastPrefix !== undefined && lastPrefix.t === 'Str') {
    if (remaining) {
      lastPrefix.text = remaining;
    } else {
      prefix.pop();
    }
    return i;
  }
  if (previous !== undefined && previous.t === 'Str') {
    if (remaining) {
      previous.text = remaining;
    } else {
      list.splice(i - 1, 1);
      return i - 1;
    }
  }
  return i;
}

/**
 * Strip one layer of `{`/`}` around the Cite at `i`. The citation's own
 * prefix and suffix are used when it has both; otherwise the neighbouring
 * Str tokens. Returns the Cite's index after any deletion.
 */
function removeBrackets(list: Inline[], i: number, token: Cite): number {
  const { prefix, suffix } = token.citations[0];

  if (prefix.length > 0 && suffix.length > 0) {
    const before = prefix[prefix.length - 1];
    const after = suffix[0];
    if (before.t === 'Str' && after.t === 'Str' && before.text.endsWith('{') && after.text.startsWith('}')) {
      if (after.text.length > 1) {
        after.text = after.text.slice(1);
      } else {
        suffix.shift();
      }
      if (before.text.length > 1) {
        before.text = before.text.slice(0, -1);
      } else {
        prefix.pop();
      }
    }
    return i;
  }

  if (i === 0 || i >= list.length - 1) return i;

  const before = list[i - 1];
  const after = list[i + 1];
  if (before.t !== 'Str' || after.t !== 'Str') return i;
  if (!before.text.endsWith('{') || !after.text.startsWith('}')) return i;

  if (after.text.length > 1) {
    after.text = after.text.slice(1);
  } else {
    list.splice(i + 1, 1);
  }
  if (before.text.length > 1) {
    before.text = before.text.slice(0, -1);
    return i;
  }
  list.splice(i - 1, 1);
  return i - 1;
}

/**
 * Process references throughout the document, in every container the
 * current tool version's profile lists.
 */
export function processDocument(doc: Document, matcher: LabelMatcher, ctx: PipelineContext): number {
  const profile = requireProfile(ctx, 'processDocument');
  const containers = new Set<string>(profile.containers);

  let processed = 0;
  visitTree(doc.blocks, node => {
    for (const list of referenceListsOf(node, containers)) {
      processed += processReferences(list, matcher, ctx);
    }
  });
  return processed;
}

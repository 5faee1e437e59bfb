/**
 * Attribute scanner: finds a `{...}` block that starts at a given position
 * in an inline list and may span several tokens.
 *
 * The scan is read-only until the closing brace is found, so a failed scan
 * leaves the list exactly as it was.
 */

import type { Inline, Str } from '@xrefs/types';
import { AttributesNotFoundError } from '@xrefs/core';
import { AttributeSet } from './attributes';
import { str, toLiteralText } from './inlines';

interface ClosingBrace {
  index: number;
  offset: number;
  token: Str;
}

/**
 * Extract the attributes that begin at `list[n]`. The consumed tokens are
 * removed; any text glued after the closing brace stays in place as a Str.
 *
 * @throws AttributesNotFoundError when `list[n]` does not open an attribute
 *   block or the block is never closed.
 */
export function scanAttributes(list: Inline[], n: number): AttributeSet {
  if (n < 0 || n >= list.length) {
    throw new AttributesNotFoundError(n, 'Index out of range');
  }
  const first = list[n];
  if (first.t !== 'Str' || !first.text.startsWith('{')) {
    throw new AttributesNotFoundError(n);
  }

  const closing = findClosingBrace(list, n);
  if (!closing) {
    throw new AttributesNotFoundError(n, 'Unterminated attributes');
  }

  const { index, offset, token } = closing;
  const head = token.text.slice(0, offset + 1);
  const tail = token.text.slice(offset + 1);
  const span: Inline[] = [...list.slice(n, index), str(head)];

  if (tail) {
    list.splice(n, index - n + 1, str(tail));
  } else {
    list.splice(n, index - n + 1);
  }

  return AttributeSet.parse(toLiteralText(span).trim());
}

/**
 * Locate the first `}` outside quotes. Quote state carries across tokens;
 * only Str tokens are inspected.
 */
function findClosingBrace(list: Inline[], n: number): ClosingBrace | null {
  let quote: string | null = null;

  for (let i = n; i < list.length; i++) {
    const token = list[i];
    if (token.t !== 'Str') continue;

    for (let j = 0; j < token.text.length; j++) {
      const c = token.text[j];
      if (quote !== null) {
        if (c === quote) quote = null;
      } else if (c === '"' || c === "'") {
        quote = c;
      } else if (c === '}') {
        return { index: i, offset: j, token };
      }
    }
  }

  return null;
}

/** Scan without throwing; returns null when no attribute block is present. */
export function tryScanAttributes(list: Inline[], n: number): AttributeSet | null {
  try {
    return scanAttributes(list, n);
  } catch (err) {
    if (err instanceof AttributesNotFoundError) return null;
    throw err;
  }
}

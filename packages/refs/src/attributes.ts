/**
 * AttributeSet: parser and emitter for `{#id .class key=value}` blocks.
 *
 * Tolerant: a malformed string never throws. Key-value tokens that cannot be
 * parsed are dropped and flagged through `parseFailed`.
 */

import type { Attr } from '@xrefs/types';

// A token is a run of non-space characters or a complete quoted string.
const TOKEN_RE = /(?:[^\s"']|"[^"]*"|'[^']*')+/g;
const KV_RE = /^([^\s"'=]+)=([\s\S]*)$/;
const NEEDS_QUOTES_RE = /^$|[\s"'{}]/;

export interface AttributeInit {
  id?: string;
  classes?: string[];
  kvs?: Iterable<[string, string]>;
}

export class AttributeSet {
  id: string;
  classes: string[];
  kvs: Map<string, string>;
  parseFailed = false;
  rawSource = '';

  constructor(init: AttributeInit = {}) {
    this.id = init.id ?? '';
    this.classes = [...(init.classes ?? [])];
    this.kvs = new Map(init.kvs ?? []);
  }

  /**
   * Parse an attribute string. Surrounding braces are optional.
   */
  static parse(source: string): AttributeSet {
    const attrs = new AttributeSet();
    attrs.rawSource = source;

    const body = source.trim().replace(/^\{+/, '').replace(/\}+$/, '');
    const tokens = body.match(TOKEN_RE) ?? [];

    // A lone word is a class, e.g. a code-block language tag
    if (
      tokens.length === 1 &&
      tokens[0] !== '-' &&
      !body.startsWith('#') &&
      !body.startsWith('.') &&
      !body.includes('=')
    ) {
      attrs.classes.push(tokens[0]);
      return attrs;
    }

    let hasId = false;
    let kvTokens = 0;
    let kvParsed = 0;

    for (const token of tokens) {
      if (token.startsWith('#')) {
        if (!hasId) {
          attrs.id = token.slice(1);
          hasId = true;
        }
      } else if (token.startsWith('.')) {
        attrs.classes.push(token.slice(1));
      } else if (token === '-') {
        attrs.classes.push('unnumbered');
      } else if (token.includes('=')) {
        kvTokens++;
        const m = hasUnquotedEquals(token) ? token.match(KV_RE) : null;
        if (m) {
          attrs.kvs.set(m[1], unquote(m[2]));
          kvParsed++;
        }
      }
    }

    if (kvParsed < kvTokens) {
      attrs.parseFailed = true;
    }

    return attrs;
  }

  /** Build from pandoc's native triple. A `null` triple yields an empty set. */
  static fromPandoc(attr: Attr | null | undefined): AttributeSet {
    if (!attr) return new AttributeSet();
    const [id, classes, kvs] = attr;
    return new AttributeSet({ id, classes, kvs: kvs.map(([k, v]): [string, string] => [k, v]) });
  }

  get isEmpty(): boolean {
    return this.id === '' && this.classes.length === 0 && this.kvs.size === 0;
  }

  has(key: string): boolean {
    return this.kvs.has(key);
  }

  get(key: string): string | undefined {
    return this.kvs.get(key);
  }

  set(key: string, value: string): void {
    this.kvs.set(key, value);
  }

  delete(key: string): boolean {
    return this.kvs.delete(key);
  }

  /** Fold another set into this one: a non-empty id wins, classes append, kvs overwrite. */
  merge(other: AttributeSet): this {
    if (other.id) this.id = other.id;
    this.classes.push(...other.classes);
    for (const [k, v] of other.kvs) {
      this.kvs.set(k, v);
    }
    if (other.parseFailed) {
      this.parseFailed = true;
      this.rawSource = other.rawSource;
    }
    return this;
  }

  toPandoc(): Attr {
    return [this.id, [...this.classes], [...this.kvs].map(([k, v]): [string, string] => [k, v])];
  }

  toMarkdown(surround = true): string {
    const parts: string[] = [];
    if (this.id) parts.push(`#${this.id}`);
    for (const cls of this.classes) parts.push(`.${cls}`);
    for (const [k, v] of this.kvs) parts.push(`${k}=${quoteValue(v)}`);
    const body = parts.join(' ');
    return surround ? `{${body}}` : body;
  }

  toHtml(): string {
    const parts: string[] = [];
    if (this.id) parts.push(`id="${this.id}"`);
    if (this.classes.length > 0) parts.push(`class="${this.classes.join(' ')}"`);
    for (const [k, v] of this.kvs) parts.push(`${k}="${v}"`);
    return parts.join(' ');
  }

  toRecord(): Record<string, string | string[]> {
    const record: Record<string, string | string[]> = { id: this.id, classes: [...this.classes] };
    for (const [k, v] of this.kvs) {
      record[k] = v;
    }
    return record;
  }
}

function hasUnquotedEquals(token: string): boolean {
  let quote: string | null = null;
  for (const c of token) {
    if (quote !== null) {
      if (c === quote) quote = null;
    } else if (c === '"' || c === "'") {
      quote = c;
    } else if (c === '=') {
      return true;
    }
  }
  return false;
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value[value.length - 1] === first) {
      return value.slice(1, -1);
    }
  }
  return value;
}

function quoteValue(value: string): string {
  if (!NEEDS_QUOTES_RE.test(value)) return value;
  return value.includes('"') ? `'${value}'` : `"${value}"`;
}

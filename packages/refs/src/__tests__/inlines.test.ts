import { describe, it, expect } from 'vitest';
import type { Inline } from '@xrefs/types';
import {
  cite,
  dollarfy,
  joinDocumentStrings,
  joinStrings,
  quotify,
  space,
  str,
  stringify,
  toLiteralText,
} from '../inlines';
import { doc, para } from './helpers';

describe('stringify', () => {
  it('flattens nested inlines', () => {
    const list: Inline[] = [
      str('a'),
      space(),
      { t: 'Emph', content: [str('b'), { t: 'LineBreak' }, str('c')] },
      { t: 'Code', attrs: ['', [], []], text: 'd' },
      { t: 'RawInline', format: 'tex', text: '\\x' },
    ];
    expect(stringify(list)).toBe('a b cd');
  });

  it('drops quote marks unless quotified', () => {
    const list: Inline[] = [{ t: 'Quoted', quoteType: 'SingleQuote', content: [str('q')] }];
    expect(stringify(list)).toBe('q');
    expect(stringify(quotify(list))).toBe("'q'");
  });
});

describe('quotify', () => {
  it('does not modify its input', () => {
    const first = str('x=');
    const list: Inline[] = [first, { t: 'Quoted', quoteType: 'DoubleQuote', content: [str('y')] }];
    expect(quotify(list)).toEqual([str('x="y"')]);
    expect(first.text).toBe('x=');
    expect(list).toHaveLength(2);
  });
});

describe('dollarfy', () => {
  it('wraps math in dollars', () => {
    const list: Inline[] = [{ t: 'Strong', content: [{ t: 'Math', mathType: 'InlineMath', text: 'x^2' }] }];
    expect(toLiteralText(dollarfy(list))).toBe('$x^2$');
    expect(toLiteralText(list)).toBe('$x^2$');
  });
});

describe('joinStrings', () => {
  it('merges runs of Str tokens in place', () => {
    const list: Inline[] = [str('a'), str('b'), space(), str('c'), str('d'), str('e')];
    expect(joinStrings(list)).toBe(true);
    expect(list).toEqual([str('ab'), space(), str('cde')]);
  });

  it('starts at the given index', () => {
    const list: Inline[] = [str('a'), str('b'), space(), str('c'), str('d')];
    joinStrings(list, 2);
    expect(list).toEqual([str('a'), str('b'), space(), str('cd')]);
  });

  it('reports when nothing changed', () => {
    expect(joinStrings([str('a'), space()])).toBe(false);
  });

  it('joins across a whole document', () => {
    const d = doc(para(str('a'), { t: 'Emph', content: [str('b'), str('c')] }, str('d'), str('e')));
    expect(joinDocumentStrings(d)).toBe(true);
    expect(d.blocks).toEqual([para(str('a'), { t: 'Emph', content: [str('bc')] }, str('de'))]);
  });

  it('joins strings in table captions', () => {
    const d = doc({ t: 'Table', attrs: ['', [], []], caption: [str('Table'), str(' 1.')], rows: [] });
    expect(joinDocumentStrings(d)).toBe(true);
    expect(d.blocks).toEqual([{ t: 'Table', attrs: ['', [], []], caption: [str('Table 1.')], rows: [] }]);
  });
});

describe('cite', () => {
  it('builds a single author-in-text citation', () => {
    const token = cite('fig:1');
    expect(token.attrs).toBeUndefined();
    expect(token.citations).toHaveLength(1);
    expect(token.citations[0].mode).toBe('AuthorInText');
    expect(stringify(token.content)).toBe('@fig:1');
  });
});

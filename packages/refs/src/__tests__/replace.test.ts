import { describe, it, expect } from 'vitest';
import { parseReplaceOptions } from '@xrefs/core';
import {
  FAKERY_MARKER,
  buildCleverefFakery,
  buildCleverefNames,
  formatFamily,
  replaceReferences,
} from '../replace';
import { space, str } from '../inlines';
import { bracketed, doc, link, para, ref, testContext } from './helpers';

const NBSP = '\u00A0';

describe('formatFamily', () => {
  it('groups output formats', () => {
    expect(formatFamily('latex')).toBe('tex');
    expect(formatFamily('beamer')).toBe('tex');
    expect(formatFamily('html5')).toBe('link');
    expect(formatFamily('epub3')).toBe('link');
    expect(formatFamily('markdown_strict')).toBe('link');
    expect(formatFamily('docx')).toBe('link');
    expect(formatFamily('plain')).toBe('plain');
    expect(formatFamily('man')).toBe('plain');
  });
});

describe('replaceReferences: TeX', () => {
  it('renders clever references and inserts the definitions once', () => {
    const { ctx, diagnostics } = testContext();
    const d = doc(
      para(str('See'), space(), ref('fig:one')),
      para(str('Also'), space(), ref('fig:one')),
    );
    const result = replaceReferences(
      d,
      { references: { 'fig:one': { num: 1 } }, cleverDefault: true, format: 'latex' },
      ctx,
    );

    expect(result).toEqual({ replaced: 2, unresolved: [], insertedFakery: true });
    expect(d.blocks).toHaveLength(4);
    expect(d.blocks[0]).toEqual(buildCleverefFakery());
    expect(d.blocks[1]).toEqual(buildCleverefNames(parseReplaceOptions({}), ['fig']));
    expect(d.blocks[2]).toEqual(
      para(str('See'), space(), { t: 'RawInline', format: 'tex', text: '\\cref{fig:one}' }),
    );
    expect(ctx.cleverefNeeded).toBe(true);
    expect(diagnostics.map(x => x.code)).toEqual(['HEADER_BLOCK']);
  });

  it('does not insert definitions twice', () => {
    const { ctx } = testContext();
    const options = { references: { 'fig:one': { num: 1 } }, format: 'latex' };
    const d = doc(para(ref('fig:one', [['modifier', '*']])));
    replaceReferences(d, options, ctx);
    d.blocks.push(para(ref('fig:one', [['modifier', '+']])));
    const second = replaceReferences(d, options, ctx);

    expect(second.insertedFakery).toBe(false);
    expect(d.blocks.filter(b => b.t === 'RawBlock')).toHaveLength(2);
    expect(d.blocks[2]).toEqual(para({ t: 'RawInline', format: 'tex', text: '\\Cref{fig:one}' }));
  });

  it('writes macros that look names up by label prefix', () => {
    expect(buildCleverefFakery().text).toBe(
      [
        FAKERY_MARKER,
        '\\providecommand{\\crefname}[3]{}',
        '\\providecommand{\\Crefname}[3]{}',
        '\\providecommand{\\cref}[1]{\\xrefsfakeref{cref}{#1}}',
        '\\providecommand{\\Cref}[1]{\\xrefsfakeref{Cref}{#1}}',
        '\\providecommand{\\xrefsfakeref}[2]{\\xrefsfakerefsplit{#1}{#2}#2:\\relax}',
        '\\def\\xrefsfakerefsplit#1#2#3:#4\\relax{\\csname xrefs#1name@#3\\endcsname~\\ref{#2}}',
      ].join('\n'),
    );
  });

  it('writes the names with the configured values', () => {
    const block = buildCleverefNames(
      { refType: 'table', plusName: ['tab.', 'tabs.'], starName: ['Table', 'Tables'] },
      ['tbl'],
    );
    expect(block.text).toBe(
      [
        `${FAKERY_MARKER} (table)`,
        '\\crefname{table}{tab.}{tabs.}',
        '\\Crefname{table}{Table}{Tables}',
        '\\expandafter\\def\\csname xrefscrefname@tbl\\endcsname{tab.}',
        '\\expandafter\\def\\csname xrefsCrefname@tbl\\endcsname{Table}',
      ].join('\n'),
    );
  });

  it('keeps separate names for each reference type', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('fig:one', [['modifier', '+']])));
    replaceReferences(d, { references: { 'fig:one': { num: 1 } }, format: 'latex' }, ctx);

    d.blocks.push(para(ref('eq:1', [['modifier', '+']])));
    const second = replaceReferences(
      d,
      {
        references: { 'eq:1': { num: 1 } },
        format: 'latex',
        refType: 'equation',
        plusName: ['eq.', 'eqs.'],
        starName: ['Equation', 'Equations'],
      },
      ctx,
    );

    expect(second.insertedFakery).toBe(true);
    expect(d.blocks).toHaveLength(5);
    expect(d.blocks[0]).toEqual(buildCleverefFakery());
    expect(d.blocks[1]).toEqual(buildCleverefNames(parseReplaceOptions({}), ['fig']));
    expect(d.blocks[2]).toEqual({
      t: 'RawBlock',
      format: 'tex',
      text: [
        `${FAKERY_MARKER} (equation)`,
        '\\crefname{equation}{eq.}{eqs.}',
        '\\Crefname{equation}{Equation}{Equations}',
        '\\expandafter\\def\\csname xrefscrefname@eq\\endcsname{eq.}',
        '\\expandafter\\def\\csname xrefsCrefname@eq\\endcsname{Equation}',
      ].join('\n'),
    });
    expect(d.blocks[4]).toEqual(para({ t: 'RawInline', format: 'tex', text: '\\cref{eq:1}' }));
  });

  it('adds names for a prefix first seen in a later run', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('fig:one', [['modifier', '+']])));
    replaceReferences(d, { format: 'latex' }, ctx);
    d.blocks.push(para(ref('pic:two', [['modifier', '+']])));
    const second = replaceReferences(d, { format: 'latex' }, ctx);

    expect(second.insertedFakery).toBe(true);
    expect(d.blocks.filter(b => b.t === 'RawBlock')).toHaveLength(2);
    expect(d.blocks[1]).toEqual(buildCleverefNames(parseReplaceOptions({}), ['fig', 'pic']));
  });

  it('puts the definitions ahead of unrelated raw blocks', () => {
    const { ctx } = testContext();
    const d = doc(
      { t: 'RawBlock', format: 'html', text: '<meta charset="utf-8">' },
      para(ref('fig:one', [['modifier', '+']])),
    );
    replaceReferences(d, { format: 'latex' }, ctx);
    expect(d.blocks.map(b => (b.t === 'RawBlock' ? b.text.split('\n')[0] : b.t))).toEqual([
      FAKERY_MARKER,
      `${FAKERY_MARKER} (figure)`,
      '<meta charset="utf-8">',
      'Para',
    ]);
  });

  it('renders a suppressed reference with a plain ref', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('fig:one', [['modifier', '-']])));
    const result = replaceReferences(
      d,
      { references: { 'fig:one': { num: 1 } }, cleverDefault: true, format: 'latex' },
      ctx,
    );
    expect(d.blocks).toEqual([para({ t: 'RawInline', format: 'tex', text: '\\ref{fig:one}' })]);
    expect(result.insertedFakery).toBe(false);
    expect(ctx.cleverefNeeded).toBe(false);
  });

  it('leaves definitions to the real package when asked', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('fig:one', [['modifier', '+']])));
    const result = replaceReferences(d, { format: 'latex', cleverefStrategy: 'package' }, ctx);
    expect(result.insertedFakery).toBe(false);
    expect(d.blocks).toHaveLength(1);
    expect(ctx.cleverefNeeded).toBe(true);
  });

  it('uses eqref and honours nolink', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('eq:1'), space(), ref('eq:1', [['nolink', 'True']])));
    replaceReferences(d, { references: { 'eq:1': { num: 1 } }, format: 'latex', useEqref: true }, ctx);
    expect(d.blocks[0]).toEqual(
      para(
        { t: 'RawInline', format: 'tex', text: '\\eqref{eq:1}' },
        space(),
        { t: 'RawInline', format: 'tex', text: '{\\protect\\NoHyper\\eqref{eq:1}\\protect\\endNoHyper}' },
      ),
    );
  });
});

describe('replaceReferences: hyperlink formats', () => {
  const references = { 'fig:a': { num: 2, sectionNo: 4 } };

  it('links to the label anchor', () => {
    const { ctx } = testContext();
    const d = doc(para(str('See'), space(), ref('fig:a')));
    replaceReferences(d, { references }, ctx);
    expect(d.blocks[0]).toEqual(para(str('See'), space(), link('fig:a', [str('2')])));
  });

  it('prefixes the name for clever references', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('fig:a', [['modifier', '*']])));
    replaceReferences(d, { references }, ctx);
    expect(d.blocks[0]).toEqual(para(str(`Figure${NBSP}`), link('fig:a', [str('2')])));
  });

  it('points epub links at the chapter file', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('fig:a')));
    replaceReferences(d, { references, format: 'epub3' }, ctx);
    expect(d.blocks[0]).toEqual(
      para({ t: 'Link', attrs: ['', [], []], content: [str('2')], url: 'ch004.xhtml#fig:a', title: '' }),
    );
  });

  it('drops the link for nolink', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('fig:a', [['nolink', 'true']])));
    replaceReferences(d, { references }, ctx);
    expect(d.blocks[0]).toEqual(para(str('2')));
  });

  it('parenthesizes equation numbers', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('eq:1')));
    replaceReferences(d, { references: { 'eq:1': { num: 1 } }, useEqref: true }, ctx);
    expect(d.blocks[0]).toEqual(para(link('eq:1', [str('(1)')])));
  });

  it('renders math tags as inline math', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('eq:1')));
    replaceReferences(d, { references: { 'eq:1': { num: '$\\alpha$' } } }, ctx);
    expect(d.blocks[0]).toEqual(para(link('eq:1', [{ t: 'Math', mathType: 'InlineMath', text: '\\alpha' }])));
  });

  it('wraps bracketed references in a pending span', () => {
    const { ctx } = testContext();
    const d = doc(para(bracketed('fig:a', [str('see')], [str(', below')])));
    replaceReferences(d, { references }, ctx);
    expect(d.blocks[0]).toEqual(
      para({ t: 'Span', attrs: null, content: [str('see'), space(), link('fig:a', [str('2')]), str(', below')] }),
    );
  });

  it('resolves implicit labels when allowed', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('fig:one')));
    replaceReferences(d, { references: { one: { num: 7 } }, allowImplicitRefs: true }, ctx);
    expect(d.blocks[0]).toEqual(para(link('one', [str('7')])));
  });

  it('warns on every reference to a duplicated target', () => {
    const { ctx, diagnostics } = testContext();
    const d = doc(para(ref('fig:d'), space(), ref('fig:d')));
    replaceReferences(d, { references: { 'fig:d': { num: 1, hasDuplicate: true } } }, ctx);
    expect(diagnostics.map(x => x.message)).toEqual([
      'Referenced label has duplicate: fig:d',
      'Referenced label has duplicate: fig:d',
    ]);
  });
});

describe('replaceReferences: plain formats', () => {
  it('renders unresolved labels as ?? and warns once', () => {
    const { ctx, diagnostics } = testContext();
    const d = doc(para(ref('fig:x'), space(), ref('fig:x')));
    const result = replaceReferences(d, { references: {}, format: 'plain' }, ctx);

    expect(d.blocks[0]).toEqual(para(str('??'), space(), str('??')));
    expect(result.unresolved).toEqual(['fig:x']);
    expect(diagnostics).toEqual([
      { code: 'UNRESOLVED_REFERENCE', severity: 'critical', message: 'Unresolved reference: @fig:x', label: 'fig:x' },
    ]);
  });

  it('keeps the name but never links', () => {
    const { ctx } = testContext();
    const d = doc(para(ref('fig:a', [['modifier', '+']])));
    replaceReferences(d, { references: { 'fig:a': { num: 3 } }, format: 'plain' }, ctx);
    expect(d.blocks[0]).toEqual(para(str(`fig.${NBSP}`), str('3')));
  });

  it('leaves unprocessed citations alone', () => {
    const { ctx } = testContext();
    const d = doc(para(bracketed('doe99')));
    const before = structuredClone(d);
    expect(replaceReferences(d, { format: 'plain' }, ctx).replaced).toBe(0);
    expect(d).toEqual(before);
  });
});

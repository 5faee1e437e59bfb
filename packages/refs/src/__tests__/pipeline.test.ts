import { describe, it, expect } from 'vitest';
import { UninitializedStateError, createCollectingSink } from '@xrefs/core';
import { runPipeline } from '../pipeline';
import { cite, space, str } from '../inlines';
import { autolink, bracketed, doc, link, para } from './helpers';

const NBSP = '\u00A0';

describe('runPipeline', () => {
  it('processes and replaces a clever reference', () => {
    const d = doc(para(str('See'), space(), str('{+'), cite('fig:one'), str('}.')));
    const result = runPipeline(d, {
      pipeline: { version: '2.0' },
      replace: { references: { 'fig:one': { num: 1 } } },
      sink: createCollectingSink().sink,
    });

    expect(result.repaired).toBe(0);
    expect(result.processed).toBe(1);
    expect(result.replaced).toBe(1);
    expect(result.cleverefNeeded).toBe(true);
    expect(d.blocks[0]).toEqual(
      para(str('See'), space(), str(`fig.${NBSP}`), link('fig:one', [str('1')]), str('.')),
    );
  });

  it('repairs broken references on old versions', () => {
    const d = doc(para(str('See'), space(), autolink('{@fig'), str(':one}.')));
    const result = runPipeline(d, {
      pipeline: { version: '1.16' },
      replace: { references: { 'fig:one': { num: 1 } }, format: 'plain' },
    });

    expect(result.repaired).toBe(1);
    expect(d.blocks[0]).toEqual(para(str('See'), space(), str('1'), str('.')));
  });

  it('turns a bracketed reference without attributes back into text', () => {
    const d = doc(para(str('See'), space(), bracketed('fig:one'), str('.')));
    runPipeline(d, {
      pipeline: { version: '2.0' },
      replace: { references: { 'fig:one': { num: 1 } } },
    });
    expect(d.blocks[0]).toEqual(para(str('See'), space(), str('['), link('fig:one', [str('1')]), str('].')));
  });

  it('keeps a bracketed reference with attributes as a span', () => {
    const d = doc(para(bracketed('fig:one'), str('{.hl}')));
    runPipeline(d, {
      pipeline: { version: '2.0' },
      replace: { references: { 'fig:one': { num: 1 } } },
    });
    expect(d.blocks[0]).toEqual(
      para({ t: 'Span', attrs: ['', ['hl'], []], content: [link('fig:one', [str('1')])] }),
    );
  });

  it('settles bracketed references inside emphasis', () => {
    const d = doc(para({ t: 'Emph', content: [str('see'), space(), bracketed('fig:one')] }));
    runPipeline(d, {
      pipeline: { version: '2.0' },
      replace: { references: { 'fig:one': { num: 1 } } },
    });
    expect(d.blocks[0]).toEqual(
      para({
        t: 'Emph',
        content: [str('see'), space(), str('['), link('fig:one', [str('1')]), str(']')],
      }),
    );
  });

  it('settles bracketed references inside headers', () => {
    const d = doc(
      { t: 'Header', level: 1, attrs: ['', [], []], content: [bracketed('fig:one')] },
      { t: 'Header', level: 1, attrs: ['', [], []], content: [bracketed('fig:one'), str('{.hl}')] },
    );
    runPipeline(d, {
      pipeline: { version: '2.0' },
      replace: { references: { 'fig:one': { num: 1 } } },
    });
    expect(d.blocks).toEqual([
      {
        t: 'Header',
        level: 1,
        attrs: ['', [], []],
        content: [str('['), link('fig:one', [str('1')]), str(']')],
      },
      {
        t: 'Header',
        level: 1,
        attrs: ['', [], []],
        content: [{ t: 'Span', attrs: ['', ['hl'], []], content: [link('fig:one', [str('1')])] }],
      },
    ]);
  });

  it('reports unresolved labels accepted by pattern', () => {
    const { sink, diagnostics } = createCollectingSink();
    const d = doc(para(cite('tbl:9')));
    const result = runPipeline(d, {
      pipeline: { version: '3.1', filterName: 'tablenos' },
      labels: { pattern: /tbl:/ },
      replace: { format: 'plain' },
      sink,
    });

    expect(result.unresolved).toEqual(['tbl:9']);
    expect(d.blocks[0]).toEqual(para(str('??')));
    expect(diagnostics.map(x => x.code)).toEqual(['BAD_REFERENCE', 'UNRESOLVED_REFERENCE']);
    expect(result.context.filterName).toBe('tablenos');
  });

  it('needs a tool version', () => {
    expect(() => runPipeline(doc())).toThrow(UninitializedStateError);
  });
});

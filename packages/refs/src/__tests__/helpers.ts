import type { AttrKeyValue, Block, Cite, Document, Inline, Link } from '@xrefs/types';
import { createCollectingSink, createPipelineContext } from '@xrefs/core';
import type { Diagnostic, PipelineContext, PipelineOptionsInput } from '@xrefs/core';
import { cite } from '../inlines';

export function testContext(options: PipelineOptionsInput = { version: '2.0' }): {
  ctx: PipelineContext;
  diagnostics: Diagnostic[];
} {
  const { sink, diagnostics } = createCollectingSink();
  return { ctx: createPipelineContext(options, sink), diagnostics };
}

/** A Cite as the processor leaves it. */
export function ref(label: string, kvs: AttrKeyValue[] = [], id = ''): Cite {
  return { ...cite(label), attrs: [id, [], kvs] };
}

/** A Cite whose display text is bracketed, e.g. `[@fig:a]`. */
export function bracketed(label: string, prefix: Inline[] = [], suffix: Inline[] = []): Cite {
  const token = cite(label);
  token.citations[0].prefix = prefix;
  token.citations[0].suffix = suffix;
  token.content = [{ t: 'Str', text: `[@${label}]` }];
  return token;
}

/** The mailto link bare-URI autolinking makes of `{@fig`. */
export function autolink(text: string): Link {
  return {
    t: 'Link',
    attrs: ['', [], []],
    content: [{ t: 'Str', text }],
    url: `mailto:${text}`,
    title: '',
  };
}

export function para(...content: Inline[]): Block {
  return { t: 'Para', content };
}

export function doc(...blocks: Block[]): Document {
  return { meta: {}, blocks };
}

export function link(label: string, content: Inline[]): Link {
  return { t: 'Link', attrs: ['', [], []], content, url: `#${label}`, title: '' };
}

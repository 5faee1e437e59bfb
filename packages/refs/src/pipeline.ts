/**
 * Pipeline facade: runs repair, processing and replacement over one
 * document with a fresh context.
 */

import type { Document } from '@xrefs/types';
import { createPipelineContext } from '@xrefs/core';
import type { DiagnosticSink, PipelineContext, PipelineOptionsInput, ReplaceOptionsInput } from '@xrefs/core';
import { settlePendingSpans } from './attach';
import { createLabelMatcher, processDocument } from './process';
import type { LabelMatcherOptions } from './process';
import { repairDocument } from './repair';
import { replaceReferences } from './replace';

export interface RunOptions {
  pipeline?: PipelineOptionsInput;
  /** Defaults to the labels of `replace.references` */
  labels?: LabelMatcherOptions;
  replace?: ReplaceOptionsInput;
  sink?: DiagnosticSink;
}

export interface RunResult {
  repaired: number;
  processed: number;
  replaced: number;
  unresolved: string[];
  /** The caller should load cleveref (or rely on inserted definitions) */
  cleverefNeeded: boolean;
  context: PipelineContext;
}

export function runPipeline(doc: Document, options: RunOptions = {}): RunResult {
  const ctx = createPipelineContext(options.pipeline ?? {}, options.sink);

  const replace = options.replace ?? {};
  const matcher = createLabelMatcher(
    options.labels ?? { labels: Object.keys(replace.references ?? {}) },
  );

  const repaired = repairDocument(doc, ctx);
  const processed = processDocument(doc, matcher, ctx);
  const result = replaceReferences(doc, replace, ctx);
  settlePendingSpans(doc, ctx);

  return {
    repaired,
    processed,
    replaced: result.replaced,
    unresolved: result.unresolved,
    cleverefNeeded: ctx.cleverefNeeded,
    context: ctx,
  };
}

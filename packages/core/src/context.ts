/**
 * Per-run pipeline state.
 *
 * One context is created for each document run and threaded through every
 * pass. Nothing here is shared between runs.
 */

import type { WarningLevel } from '@xrefs/types';
import { parsePipelineOptions } from './schemas';
import { resolveProfile } from './version';
import type { VersionProfile } from './version';
import { UninitializedStateError } from './errors';
import { consoleSink, isReported } from './diagnostics';
import type { Diagnostic, DiagnosticSink } from './diagnostics';

export interface PipelineContext {
  readonly version: string | null;
  readonly profile: VersionProfile | null;
  readonly filterName: string;
  readonly warningLevel: WarningLevel;
  /** Set once a clever reference is seen; the caller decides how to satisfy it. */
  cleverefNeeded: boolean;
  /** Level-1 section counter used by section-number insertion. */
  sectionCounter: number;
  /** Labels already reported as bad or unresolved during this run. */
  readonly reportedLabels: Set<string>;
  readonly sink: DiagnosticSink;
}

export function createPipelineContext(
  options: unknown = {},
  sink: DiagnosticSink = consoleSink,
): PipelineContext {
  const parsed = parsePipelineOptions(options);
  const version = parsed.version ?? null;
  return {
    version,
    profile: version === null ? null : resolveProfile(version),
    filterName: parsed.filterName,
    warningLevel: parsed.warningLevel,
    cleverefNeeded: false,
    sectionCounter: 0,
    reportedLabels: new Set<string>(),
    sink,
  };
}

/**
 * Returns the version profile, failing fatally when the context was built
 * without a tool version.
 */
export function requireProfile(ctx: PipelineContext, operation: string): VersionProfile {
  if (ctx.version === null || ctx.profile === null) {
    throw new UninitializedStateError(operation);
  }
  return ctx.profile;
}

export function report(ctx: PipelineContext, diagnostic: Diagnostic): void {
  if (isReported(ctx.warningLevel, diagnostic.severity)) {
    ctx.sink(diagnostic, ctx.filterName);
  }
}

/** Reports a label-scoped diagnostic at most once per run. */
export function reportOnce(ctx: PipelineContext, key: string, diagnostic: Diagnostic): void {
  if (ctx.reportedLabels.has(key)) return;
  ctx.reportedLabels.add(key);
  report(ctx, diagnostic);
}

/**
 * Diagnostic side channel.
 *
 * Warnings are write-only and best-effort: a sink never influences the
 * traversal that reports to it.
 */

import type { WarningLevel } from '@xrefs/types';

export type DiagnosticCode =
  | 'MALFORMED_ATTRIBUTES'
  | 'BAD_REFERENCE'
  | 'UNRESOLVED_REFERENCE'
  | 'DUPLICATE_TARGET'
  | 'HEADER_BLOCK';

export type DiagnosticSeverity = 'critical' | 'info';

export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  label?: string;
}

export type DiagnosticSink = (diagnostic: Diagnostic, filterName: string) => void;

export const consoleSink: DiagnosticSink = (diagnostic, filterName) => {
  console.error(`${filterName}: ${diagnostic.message}`);
};

/**
 * Level 0 is silent, level 1 passes critical diagnostics, level 2 passes all.
 */
export function isReported(level: WarningLevel, severity: DiagnosticSeverity): boolean {
  if (level === 0) return false;
  return severity === 'critical' || level === 2;
}

/** Sink that stores diagnostics in memory, for callers that render them later. */
export function createCollectingSink(): { sink: DiagnosticSink; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  return {
    diagnostics,
    sink: (diagnostic) => {
      diagnostics.push(diagnostic);
    },
  };
}

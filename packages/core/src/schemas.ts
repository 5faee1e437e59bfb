/**
 * Zod validation schemas for pipeline configuration.
 *
 * Options arrive from the calling filter as plain objects (often read from
 * document metadata), so every field is validated and defaulted here before
 * any pass sees it.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

export const VERSION_RE = /^[1-3]\.[0-9]+(?:\.[0-9]+)?(?:\.[0-9]+)?$/;

// ============================================================================
// Pipeline Schemas
// ============================================================================

export const PipelineOptionsSchema = z.object({
  version: z.string()
    .regex(VERSION_RE, 'Cannot understand version string')
    .optional(),
  warningLevel: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(2),
  filterName: z.string().min(1, 'Filter name must not be empty').default('xrefs'),
});

// ============================================================================
// Reference Schemas
// ============================================================================

export const TargetSchema = z.object({
  num: z.union([z.number(), z.string()]),
  sectionNo: z.number().int().nonnegative().optional(),
  hasDuplicate: z.boolean().optional(),
  name: z.string().optional(),
});

const NamePairSchema = z.tuple([z.string(), z.string()]);

export const ReplaceOptionsSchema = z.object({
  references: z.record(TargetSchema).default({}),
  cleverDefault: z.boolean().default(false),
  useEqref: z.boolean().default(false),
  plusName: NamePairSchema.default(['fig.', 'figs.']),
  starName: NamePairSchema.default(['Figure', 'Figures']),
  format: z.string().default('html'),
  cleverefStrategy: z.enum(['package', 'fake']).default('fake'),
  refType: z.string()
    .regex(/^[A-Za-z]+$/, 'refType must be a LaTeX counter name')
    .default('figure'),
  allowImplicitRefs: z.boolean().default(false),
});

// ============================================================================
// Inferred Types
// ============================================================================

export type PipelineOptionsInput = z.input<typeof PipelineOptionsSchema>;
export type PipelineOptions = z.output<typeof PipelineOptionsSchema>;
export type ReplaceOptionsInput = z.input<typeof ReplaceOptionsSchema>;
export type ReplaceOptions = z.output<typeof ReplaceOptionsSchema>;

// ============================================================================
// Parsing
// ============================================================================

function toConfigError(what: string, error: z.ZodError): ConfigError {
  const issues = error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  return new ConfigError(what, issues);
}

export function parsePipelineOptions(input: unknown): PipelineOptions {
  const result = PipelineOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw toConfigError('pipeline options', result.error);
  }
  return result.data;
}

export function parseReplaceOptions(input: unknown): ReplaceOptions {
  const result = ReplaceOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw toConfigError('replace options', result.error);
  }
  return result.data;
}

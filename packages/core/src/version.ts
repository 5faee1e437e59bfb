/**
 * Tool-version profiles.
 *
 * Each supported version range decides whether broken autolink references
 * need repair and which containers hold inline lists that reference
 * processing must visit. Versions outside every range are rejected rather
 * than guessed.
 */

import { UnsupportedVersionError } from './errors';

export type ContainerKind =
  | 'Para'
  | 'Plain'
  | 'Emph'
  | 'Strong'
  | 'Underline'
  | 'Span'
  | 'Header'
  | 'Image'
  | 'TableCaption'
  | 'CiteAffixes';

export interface VersionProfile {
  /** Inclusive lower bound */
  since: string;
  /** Exclusive upper bound */
  until: string;
  repairAutolinks: boolean;
  containers: readonly ContainerKind[];
}

const BASE_CONTAINERS: readonly ContainerKind[] = [
  'Para',
  'Plain',
  'Emph',
  'Strong',
  'Span',
  'Header',
  'Image',
  'TableCaption',
  'CiteAffixes',
];

export const VERSION_PROFILES: readonly VersionProfile[] = [
  // Bare-URI autolinking splits `{@fig:1}` into a mailto Link plus a Str.
  { since: '1.15', until: '1.18', repairAutolinks: true, containers: BASE_CONTAINERS },
  { since: '1.18', until: '2.10', repairAutolinks: false, containers: BASE_CONTAINERS },
  { since: '2.10', until: '4', repairAutolinks: false, containers: [...BASE_CONTAINERS, 'Underline'] },
];

export function compareVersions(a: string, b: string): number {
  const pa = a.split('.').map(Number);
  const pb = b.split('.').map(Number);
  const len = Math.max(pa.length, pb.length);
  for (let i = 0; i < len; i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function resolveProfile(version: string): VersionProfile {
  const profile = VERSION_PROFILES.find(
    p => compareVersions(version, p.since) >= 0 && compareVersions(version, p.until) < 0,
  );
  if (!profile) {
    throw new UnsupportedVersionError(version);
  }
  return profile;
}

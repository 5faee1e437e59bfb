import type { Document, RawBlock } from '@xrefs/types';

function sameBlock(a: RawBlock, b: RawBlock): boolean {
  return a.format === b.format && a.text === b.text;
}

/**
 * Insert `raw` before the first block of the document that is not a
 * RawBlock, keeping their order. Blocks already present are skipped, so
 * running this twice changes nothing. Returns the number inserted.
 */
export function insertRawBlocks(doc: Document, raw: readonly RawBlock[]): number {
  const existing = doc.blocks.filter((b): b is RawBlock => b.t === 'RawBlock');
  const missing = raw.filter(block => !existing.some(e => sameBlock(e, block)));
  if (missing.length === 0) return 0;

  let at = doc.blocks.findIndex(b => b.t !== 'RawBlock');
  if (at === -1) at = doc.blocks.length;

  doc.blocks.splice(at, 0, ...missing.map(b => ({ ...b })));
  return missing.length;
}

/**
 * Section numbers: records the number of the enclosing level-1 section on
 * attributed elements as a leading `secno` key-value pair, for filters that
 * number targets per chapter.
 */

import type { Document } from '@xrefs/types';
import type { PipelineContext } from '@xrefs/core';
import { attachedAttrs } from './attach';
import type { AttributableKind } from './attach';
import { visitTree } from './walk';

export type SectionedKind = AttributableKind | 'Div';

/**
 * Walk the document in order, counting numbered level-1 headers in
 * `ctx.sectionCounter`, and prepend `secno` to every attributed element of
 * `kind`. Returns the number of elements tagged.
 */
export function insertSectionNumbers(doc: Document, kind: SectionedKind, ctx: PipelineContext): number {
  let tagged = 0;
  visitTree(doc.blocks, node => {
    if (node.t === 'Header') {
      if (node.level === 1 && !node.attrs[1].includes('unnumbered')) {
        ctx.sectionCounter++;
      }
      return;
    }
    const attrs = attachedAttrs(node, kind);
    if (attrs === null) return;
    attrs[2].unshift(['secno', String(ctx.sectionCounter)]);
    tagged++;
  });
  return tagged;
}

/** Remove a leading `secno` pair from every element of `kind`. */
export function deleteSectionNumbers(doc: Document, kind: SectionedKind): number {
  let removed = 0;
  visitTree(doc.blocks, node => {
    const attrs = attachedAttrs(node, kind);
    if (attrs === null) return;
    const first = attrs[2][0];
    if (first !== undefined && first[0] === 'secno') {
      attrs[2].shift();
      removed++;
    }
  });
  return removed;
}

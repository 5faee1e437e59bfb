export { AttributeSet } from './attributes';
export type { AttributeInit } from './attributes';
export {
  str,
  space,
  cite,
  quotify,
  dollarfy,
  stringify,
  toLiteralText,
  joinStrings,
  joinDocumentStrings,
} from './inlines';
export { scanAttributes, tryScanAttributes } from './scanner';
export { visitTree, replaceInlines, referenceListsOf, childInlineLists } from './walk';
export type { Node, InlineReplacer } from './walk';
export { repairReferences, repairDocument } from './repair';
export { createLabelMatcher, processReferences, processDocument } from './process';
export type { LabelMatcher, LabelMatcherOptions } from './process';
export {
  replaceReferences,
  buildCleverefFakery,
  buildCleverefNames,
  labelPrefix,
  formatFamily,
  FAKERY_MARKER,
} from './replace';
export type { ReplaceResult, FormatFamily } from './replace';
export {
  attachAttributes,
  detachAttributes,
  settlePendingSpans,
  attachedAttrs,
  ATTRIBUTABLE_KINDS,
} from './attach';
export type { AttributableKind, AttachOptions, DetachOptions, KindInfo } from './attach';
export { insertSectionNumbers, deleteSectionNumbers } from './secnos';
export type { SectionedKind } from './secnos';
export { insertRawBlocks } from './rawblocks';
export { runPipeline } from './pipeline';
export type { RunOptions, RunResult } from './pipeline';

/**
 * @xrefs/types: shared type definitions for the xrefs engine
 *
 * These types mirror pandoc's inline and block AST with named fields in
 * place of positional tuples. Attributes stay in pandoc's native triple so
 * that the tree remains plain, serializable data.
 */

// ============================================================================
// Core Enums & Literals
// ============================================================================

export type QuoteType = 'SingleQuote' | 'DoubleQuote';
export type MathType = 'InlineMath' | 'DisplayMath';
export type CitationMode = 'AuthorInText' | 'NormalCitation' | 'SuppressAuthor';

/** Leading reference modifier: `+` and `*` request clever refs, `!` and `-` suppress them. */
export type Modifier = '+' | '*' | '!' | '-';

export type WarningLevel = 0 | 1 | 2;

// ============================================================================
// Attributes
// ============================================================================

export type AttrKeyValue = [string, string];

/** pandoc's native attribute triple: `[id, classes, key-values]`. */
export type Attr = [string, string[], AttrKeyValue[]];

// ============================================================================
// Inline Tokens
// ============================================================================

export interface Citation {
  id: string;
  prefix: Inline[];
  suffix: Inline[];
  mode: CitationMode;
  noteNum: number;
  hash: number;
}

export interface Str { t: 'Str'; text: string }
export interface Space { t: 'Space' }
export interface SoftBreak { t: 'SoftBreak' }
export interface LineBreak { t: 'LineBreak' }

export type StyleKind =
  | 'Emph'
  | 'Strong'
  | 'Underline'
  | 'Strikeout'
  | 'Superscript'
  | 'Subscript'
  | 'SmallCaps';

export interface Styled { t: StyleKind; content: Inline[] }

export interface Quoted { t: 'Quoted'; quoteType: QuoteType; content: Inline[] }

export interface MathInline {
  t: 'Math';
  /** Present once attributes have been attached by the engine. */
  attrs?: Attr;
  mathType: MathType;
  text: string;
}

export interface Code { t: 'Code'; attrs: Attr; text: string }
export interface RawInline { t: 'RawInline'; format: string; text: string }

export interface Cite {
  t: 'Cite';
  /** Absent until the reference processor has normalized the citation. */
  attrs?: Attr;
  citations: Citation[];
  content: Inline[];
}

export interface Link {
  t: 'Link';
  attrs: Attr;
  content: Inline[];
  url: string;
  title: string;
}

export interface Image {
  t: 'Image';
  attrs: Attr;
  content: Inline[];
  url: string;
  title: string;
}

export interface Span {
  t: 'Span';
  /** `null` marks a span built around a bracketed reference whose attributes are still pending. */
  attrs: Attr | null;
  content: Inline[];
}

export interface Note { t: 'Note'; blocks: Block[] }

export type Inline =
  | Str
  | Space
  | SoftBreak
  | LineBreak
  | Styled
  | Quoted
  | MathInline
  | Code
  | RawInline
  | Cite
  | Link
  | Image
  | Span
  | Note;

export type InlineKind = Inline['t'];

// ============================================================================
// Blocks
// ============================================================================

export interface Plain { t: 'Plain'; content: Inline[] }
export interface Para { t: 'Para'; content: Inline[] }
export interface Header { t: 'Header'; level: number; attrs: Attr; content: Inline[] }
export interface RawBlock { t: 'RawBlock'; format: string; text: string }
export interface CodeBlock { t: 'CodeBlock'; attrs: Attr; text: string }
export interface BlockQuote { t: 'BlockQuote'; blocks: Block[] }
export interface BulletList { t: 'BulletList'; items: Block[][] }
export interface OrderedList { t: 'OrderedList'; start: number; items: Block[][] }
export interface Div { t: 'Div'; attrs: Attr; blocks: Block[] }

export interface Table {
  t: 'Table';
  attrs: Attr;
  caption: Inline[];
  /** rows → cells → cell blocks */
  rows: Block[][][];
}

export interface HorizontalRule { t: 'HorizontalRule' }
export interface Null { t: 'Null' }

export type Block =
  | Plain
  | Para
  | Header
  | RawBlock
  | CodeBlock
  | BlockQuote
  | BulletList
  | OrderedList
  | Div
  | Table
  | HorizontalRule
  | Null;

export type BlockKind = Block['t'];

export interface Document {
  meta: Record<string, unknown>;
  blocks: Block[];
}

// ============================================================================
// Reference Targets
// ============================================================================

/** Resolved numbering for a label, supplied by the calling filter. */
export interface Target {
  /** Display value: a number, a string tag, or `$…$` math. */
  num: number | string;
  sectionNo?: number;
  hasDuplicate?: boolean;
  name?: string;
}

export type TargetMap = Record<string, Target>;

/**
 * Reference replacement: turns normalized Cite tokens into output-format
 * content: a TeX macro, a hyperlink, or plain text.
 */

import type { Block, Cite, Document, Inline, RawBlock, Target } from '@xrefs/types';
import { parseReplaceOptions, report, reportOnce } from '@xrefs/core';
import type { PipelineContext, ReplaceOptions, ReplaceOptionsInput } from '@xrefs/core';
import { AttributeSet } from './attributes';
import { space, str, stringify } from './inlines';
import { replaceInlines } from './walk';

const NBSP = '\u00A0';

export const FAKERY_MARKER = '%% xrefs: cleveref fakery';

// ============================================================================
// Output Formats
// ============================================================================

export type FormatFamily = 'tex' | 'link' | 'plain';

const TEX_FORMATS = new Set(['latex', 'beamer']);
const LINK_FORMATS = new Set(['docx', 'odt', 'rst', 'asciidoc', 'org', 'jats', 'commonmark', 'gfm']);
const EPUB_RE = /^epub[23]?$/;

export function formatFamily(format: string): FormatFamily {
  if (TEX_FORMATS.has(format)) return 'tex';
  if (
    LINK_FORMATS.has(format) ||
    format.startsWith('html') ||
    format.startsWith('markdown') ||
    EPUB_RE.test(format)
  ) {
    return 'link';
  }
  return 'plain';
}

// ============================================================================
// Cleveref Fakery
// ============================================================================

function namesMarker(refType: string): string {
  return `${FAKERY_MARKER} (${refType})`;
}

function markerOf(block: Block): string | null {
  if (block.t !== 'RawBlock' || block.format !== 'tex') return null;
  const firstLine = block.text.split('\n', 1)[0];
  return firstLine.startsWith(FAKERY_MARKER) ? firstLine : null;
}

/**
 * The part of a label the fake `\cref` keys its names on: everything before
 * the first `:`, or the whole label.
 */
export function labelPrefix(label: string): string {
  const colon = label.indexOf(':');
  return colon === -1 ? label : label.slice(0, colon);
}

/**
 * Minimal `\cref`/`\Cref` definitions for documents built without the
 * cleveref package. Both look up the name registered for the label's prefix,
 * so one definitions block serves every reference type. `\providecommand`
 * keeps the real package's macros when it is loaded after all.
 */
export function buildCleverefFakery(): RawBlock {
  const lines = [
    FAKERY_MARKER,
    '\\providecommand{\\crefname}[3]{}',
    '\\providecommand{\\Crefname}[3]{}',
    '\\providecommand{\\cref}[1]{\\xrefsfakeref{cref}{#1}}',
    '\\providecommand{\\Cref}[1]{\\xrefsfakeref{Cref}{#1}}',
    '\\providecommand{\\xrefsfakeref}[2]{\\xrefsfakerefsplit{#1}{#2}#2:\\relax}',
    '\\def\\xrefsfakerefsplit#1#2#3:#4\\relax{\\csname xrefs#1name@#3\\endcsname~\\ref{#2}}',
  ];
  return { t: 'RawBlock', format: 'tex', text: lines.join('\n') };
}

function nameLines(options: Pick<ReplaceOptions, 'plusName' | 'starName'>, prefix: string): string[] {
  return [
    `\\expandafter\\def\\csname xrefscrefname@${prefix}\\endcsname{${options.plusName[0]}}`,
    `\\expandafter\\def\\csname xrefsCrefname@${prefix}\\endcsname{${options.starName[0]}}`,
  ];
}

/**
 * The names of one reference type: `\crefname`/`\Crefname` for the real
 * package, and the per-prefix names the fake `\cref`/`\Cref` look up.
 */
export function buildCleverefNames(
  options: Pick<ReplaceOptions, 'refType' | 'plusName' | 'starName'>,
  prefixes: Iterable<string>,
): RawBlock {
  const { refType, plusName, starName } = options;
  const lines = [
    namesMarker(refType),
    `\\crefname{${refType}}{${plusName[0]}}{${plusName[1]}}`,
    `\\Crefname{${refType}}{${starName[0]}}{${starName[1]}}`,
  ];
  for (const prefix of prefixes) {
    lines.push(...nameLines(options, prefix));
  }
  return { t: 'RawBlock', format: 'tex', text: lines.join('\n') };
}

/**
 * Make sure the document carries the fake definitions and names for every
 * prefix in `prefixes`. New blocks go before the first block that is not a
 * definitions block, and never ahead of an existing core block. Returns true
 * when the document changed.
 */
function ensureFakery(doc: Document, options: ReplaceOptions, prefixes: ReadonlySet<string>): boolean {
  const { blocks } = doc;
  const marker = namesMarker(options.refType);

  let at = 0;
  while (at < blocks.length && markerOf(blocks[at]) !== null) at++;

  const coreAt = blocks.findIndex(b => markerOf(b) === FAKERY_MARKER);
  const missing: RawBlock[] = [];
  if (coreAt === -1) {
    missing.push(buildCleverefFakery());
  } else if (coreAt >= at) {
    at = coreAt + 1;
  }

  const names = blocks.find((b): b is RawBlock => b.t === 'RawBlock' && markerOf(b) === marker);
  if (names === undefined) {
    missing.push(buildCleverefNames(options, prefixes));
    blocks.splice(at, 0, ...missing);
    return true;
  }

  // Names for this type exist; add prefixes first seen in this run
  const extra = [...prefixes]
    .filter(prefix => !names.text.includes(`xrefscrefname@${prefix}\\endcsname`))
    .flatMap(prefix => nameLines(options, prefix));
  if (extra.length > 0) {
    names.text = [names.text, ...extra].join('\n');
  }
  blocks.splice(at, 0, ...missing);
  return missing.length > 0 || extra.length > 0;
}

// ============================================================================
// Replacement
// ============================================================================

export interface ReplaceResult {
  replaced: number;
  /** Distinct labels with no target */
  unresolved: string[];
  insertedFakery: boolean;
}

interface ReplaceState {
  options: ReplaceOptions;
  family: FormatFamily;
  targets: Map<string, Target>;
  ctx: PipelineContext;
  unresolved: Set<string>;
  /** Label prefixes of clever TeX references */
  texCleverPrefixes: Set<string>;
}

/**
 * Replace every normalized Cite (attributes attached, one citation) in the
 * document. Options are validated first; invalid options throw ConfigError.
 */
export function replaceReferences(
  doc: Document,
  input: ReplaceOptionsInput,
  ctx: PipelineContext,
): ReplaceResult {
  const options = parseReplaceOptions(input);
  const state: ReplaceState = {
    options,
    family: formatFamily(options.format),
    targets: new Map(Object.entries(options.references)),
    ctx,
    unresolved: new Set<string>(),
    texCleverPrefixes: new Set<string>(),
  };

  let replaced = 0;
  replaceInlines(doc.blocks, token => {
    if (token.t !== 'Cite' || token.attrs === undefined || token.citations.length !== 1) {
      return undefined;
    }
    replaced++;
    return replaceCite(token, state);
  });

  let insertedFakery = false;
  if (state.texCleverPrefixes.size > 0 && options.cleverefStrategy === 'fake') {
    insertedFakery = ensureFakery(doc, options, state.texCleverPrefixes);
    if (insertedFakery) {
      report(ctx, {
        code: 'HEADER_BLOCK',
        severity: 'info',
        message: `Inserted cleveref definitions for ${options.refType} references.`,
      });
    }
  }

  return { replaced, unresolved: [...state.unresolved], insertedFakery };
}

function resolveLabel(label: string, state: ReplaceState): string {
  if (!state.options.allowImplicitRefs || state.targets.has(label) || !label.includes(':')) {
    return label;
  }
  const segment = label.slice(label.lastIndexOf(':') + 1);
  return state.targets.has(segment) ? segment : label;
}

function replaceCite(token: Cite, state: ReplaceState): Inline[] {
  const { options, ctx } = state;
  const attrs = AttributeSet.fromPandoc(token.attrs);
  const nolink = (attrs.get('nolink') ?? '').toLowerCase() === 'true';
  const citation = token.citations[0];
  const label = resolveLabel(citation.id, state);

  const target = state.targets.get(label);
  if (target === undefined) {
    state.unresolved.add(label);
    reportOnce(ctx, `UNRESOLVED_REFERENCE:${label}`, {
      code: 'UNRESOLVED_REFERENCE',
      severity: 'critical',
      message: `Unresolved reference: @${label}`,
      label,
    });
  } else if (target.hasDuplicate) {
    report(ctx, {
      code: 'DUPLICATE_TARGET',
      severity: 'critical',
      message: `Referenced label has duplicate: ${label}`,
      label,
    });
  }

  const modifier = attrs.get('modifier');
  const useClever = modifier !== undefined ? modifier === '+' || modifier === '*' : options.cleverDefault;
  const isPlus = modifier !== undefined ? modifier === '+' : options.cleverDefault;
  const refName = isPlus ? options.plusName[0] : options.starName[0];

  if (useClever) {
    ctx.cleverefNeeded = true;
  }

  let rendered: Inline[];
  if (state.family === 'tex') {
    let macro: string;
    if (useClever) {
      macro = isPlus ? '\\cref' : '\\Cref';
      state.texCleverPrefixes.add(labelPrefix(label));
    } else {
      macro = options.useEqref ? '\\eqref' : '\\ref';
    }
    let text = `${macro}{${label}}`;
    if (nolink) {
      text = `{\\protect\\NoHyper${text}\\protect\\endNoHyper}`;
    }
    rendered = [{ t: 'RawInline', format: 'tex', text }];
  } else {
    let text = target === undefined ? '??' : String(target.num);
    if (options.useEqref) {
      text = `(${text})`;
    }
    let elem: Inline = text.length > 1 && text.startsWith('$') && text.endsWith('$')
      ? { t: 'Math', mathType: 'InlineMath', text: text.slice(1, -1) }
      : str(text);

    if (state.family === 'link' && !nolink && target !== undefined) {
      const page = EPUB_RE.test(options.format) && target.sectionNo
        ? `ch${String(target.sectionNo).padStart(3, '0')}.xhtml`
        : '';
      elem = { t: 'Link', attrs: ['', [], []], content: [elem], url: `${page}#${label}`, title: '' };
    }

    rendered = useClever ? [str(refName + NBSP), elem] : [elem];
  }

  // A square-bracketed citation keeps its decoration in a span whose
  // attributes are filled in later
  const display = stringify(token.content);
  if (display.startsWith('[') && display.endsWith(']')) {
    const { prefix, suffix } = citation;
    const prefixText = stringify(prefix);
    const spacer = prefix.length > 0 && !/[{+*!-]$/.test(prefixText) ? [space()] : [];
    return [{ t: 'Span', attrs: null, content: [...prefix, ...spacer, ...rendered, ...suffix] }];
  }

  return rendered;
}

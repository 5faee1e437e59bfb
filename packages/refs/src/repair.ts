/**
 * Reference repair.
 *
 * With bare-URI autolinking enabled, older parsers read `{@fig:1}` as a
 * mailto link (`{@fig`) followed by a string (`:1}`). This pass stitches such
 * pairs back into the Cite token the parser emits everywhere else.
 */

import type { Document, Inline, Link } from '@xrefs/types';
import { requireProfile } from '@xrefs/core';
import type { PipelineContext } from '@xrefs/core';
import { cite, str } from './inlines';
import { visitTree } from './walk';

// Splits a reference into prefix, label and suffix:
//   'xxx{+@fig:1}xxx' -> ['xxx{+', 'fig:1', '}xxx']
const REF_RE = /^((?:.*\{)?[*+!-]?)@([^:]*:[\p{L}\p{N}_/-]+)(.*)$/u;

interface BrokenReference {
  prefix: string;
  label: string;
  suffix: string;
}

function matchBrokenPair(a: Inline, b: Inline): BrokenReference | null {
  if (a.t !== 'Link' || b.t !== 'Str') return null;
  const text = linkText(a);
  // Quoted text inside a real link is not an artifact
  if (text === null) return null;
  const m = (text + b.text).match(REF_RE);
  if (!m) return null;
  return { prefix: m[1], label: m[2], suffix: m[3] };
}

function linkText(link: Link): string | null {
  const first = link.content[0];
  return first !== undefined && first.t === 'Str' ? first.text : null;
}

/**
 * Repair every broken reference in `list`, in place. Returns the number of
 * Cite tokens created.
 */
export function repairReferences(list: Inline[], ctx: PipelineContext): number {
  requireProfile(ctx, 'repairReferences');

  let repaired = 0;
  // Each repair removes one Link, so this terminates.
  while (repairFirst(list)) {
    repaired++;
  }
  return repaired;
}

/**
 * Repair the first broken pair found. Scanning restarts from the start
 * afterwards: a prefix merged into the preceding Str, or a suffix split off
 * behind the Cite, may belong to another broken reference.
 */
function repairFirst(list: Inline[]): boolean {
  for (let i = 0; i < list.length - 1; i++) {
    const broken = matchBrokenPair(list[i], list[i + 1]);
    if (!broken) continue;

    const { prefix, label, suffix } = broken;

    // Right to left, so the indices stay valid
    if (suffix) {
      list.splice(i + 2, 0, str(suffix));
    }
    list[i + 1] = cite(label);

    const previous: Inline | undefined = list[i - 1];
    if (prefix && previous !== undefined && previous.t === 'Str') {
      previous.text += prefix;
      list.splice(i, 1);
    } else if (prefix) {
      list[i] = str(prefix);
    } else {
      list.splice(i, 1);
    }
    return true;
  }
  return false;
}

/**
 * Run the repair over paragraph bodies, image captions and table captions.
 * A no-op for tool versions whose parser does not produce the artifact.
 */
export function repairDocument(doc: Document, ctx: PipelineContext): number {
  const profile = requireProfile(ctx, 'repairDocument');
  if (!profile.repairAutolinks) return 0;

  let repaired = 0;
  visitTree(doc.blocks, node => {
    switch (node.t) {
      case 'Para':
      case 'Plain':
      case 'Image':
        repaired += repairReferences(node.content, ctx);
        break;
      case 'Table':
        repaired += repairReferences(node.caption, ctx);
        break;
    }
  });
  return repaired;
}

/**
 * ReStructuredText rendering of release blocks.
 *
 * @module changelog/renderer
 */

export const DOCUMENT_TITLE = 'Changelog';
/** Heading shown for commits no section rule matched. */
export const OTHER_LABEL = 'Other';

/** One release (or the unreleased head) and its entries per section. */
export interface ReleaseBlock {
  title: string;
  /** Rendered entries by section label; null collects unmatched commits. */
  sections: Map<string | null, string[]>;
}

export interface ReleaseJson {
  title: string;
  sections: Array<{ label: string; entries: string[] }>;
}

function underline(title: string, char: string): string {
  return `${title}\n${char.repeat([...title].length)}\n\n`;
}

interface LabelledSection {
  label: string;
  entries: string[];
}

/**
 * Sections present in `block`, declared labels first, then unmatched
 * commits. Those join a declared "Other" section instead of opening a
 * second one.
 */
function presentSections(block: ReleaseBlock, order: readonly string[]): LabelledSection[] {
  const sections: LabelledSection[] = [];
  for (const label of new Set(order)) {
    const entries = block.sections.get(label);
    if (entries) sections.push({ label, entries: [...entries] });
  }

  const unmatched = block.sections.get(null);
  if (unmatched) {
    const other = sections.find(section => section.label === OTHER_LABEL);
    if (other) {
      other.entries.push(...unmatched);
    } else {
      sections.push({ label: OTHER_LABEL, entries: [...unmatched] });
    }
  }
  return sections;
}

/** Renders one block; a block without entries renders as nothing. */
export function renderRelease(block: ReleaseBlock, order: readonly string[]): string {
  if (block.sections.size === 0) return '';

  let out = underline(block.title.trim(), '-');
  const sections = presentSections(block, order);
  for (const { label, entries } of sections) {
    // A lone "Other" heading says nothing the release title doesn't.
    if (!(label === OTHER_LABEL && sections.length === 1)) {
      out += underline(label, '~');
    }
    out += entries.join('');
  }
  return out;
}

export function renderChangelog(blocks: readonly ReleaseBlock[], order: readonly string[]): string {
  return underline(DOCUMENT_TITLE, '=') + blocks.map(block => renderRelease(block, order)).join('');
}

export function changelogToJson(blocks: readonly ReleaseBlock[], order: readonly string[]): ReleaseJson[] {
  return blocks
    .filter(block => block.sections.size > 0)
    .map(block => ({
      title: block.title.trim(),
      sections: presentSections(block, order).map(({ label, entries }) => ({
        label,
        entries: entries.map(entry => entry.trimEnd()),
      })),
    }));
}

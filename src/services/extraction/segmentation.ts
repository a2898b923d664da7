import type { DocumentSegment } from '../../types/evidence.types.js';

const DEFAULT_SECTION = 'General';
const MAX_HEADER_LENGTH = 100;
const LABELLED_HEADING = /^(section|article|clause|chapter|part)\s+[\dIVXLC]+/i;
const NUMBERED_HEADING = /^\d+(\.\d+)*\.?\s+[A-Z]/;

export function isSectionHeader(block: string): boolean {
  const line = block.trim();
  return (
    line.length > 0 &&
    line.length <= MAX_HEADER_LENGTH &&
    !line.includes('\n') &&
    (LABELLED_HEADING.test(line) || NUMBERED_HEADING.test(line))
  );
}

export function splitBlocks(pageText: string): string[] {
  return pageText
    .split(/\n\s*\n/)
    .map(block => block.replace(/[ \t]+\n/g, '\n').trim())
    .filter(block => block.length > 0);
}

/**
 * Groups the blocks of consecutive pages into segments of at most `maxChars`
 * characters (a single oversized block stays whole). A heading is never left
 * alone at the end of a segment. Each segment's section context names the
 * last two headings it spans, e.g. `"2. Consent > 2.1 Withdrawal"`.
 */
export function segmentPages(pages: readonly string[], maxChars: number): DocumentSegment[] {
  const segments: DocumentSegment[] = [];
  let blocks: string[] = [];
  let length = 0;
  let pageNumbers = new Set<number>();
  let sections: string[] = [];
  let currentSection = DEFAULT_SECTION;

  const flush = () => {
    if (blocks.length === 0) return;
    segments.push({
      text: blocks.join('\n'),
      pages: [...pageNumbers].sort((a, b) => a - b),
      sectionContext: sections.slice(-2).join(' > '),
    });
    blocks = [];
    length = 0;
    pageNumbers = new Set();
    sections = [];
  };

  pages.forEach((pageText, index) => {
    for (const block of splitBlocks(pageText)) {
      if (isSectionHeader(block)) currentSection = block;

      const grown = length === 0 ? block.length : length + 1 + block.length;
      const onlyHeading = blocks.length === 1 && isSectionHeader(blocks[0]);
      if (grown > maxChars && blocks.length > 0 && !onlyHeading) {
        flush();
      }

      blocks.push(block);
      length = length === 0 ? block.length : length + 1 + block.length;
      pageNumbers.add(index + 1);
      if (sections[sections.length - 1] !== currentSection) sections.push(currentSection);
    }
  });

  flush();
  return segments;
}

import type { EvidenceBundle, EvidenceSegment } from '../../types/evidence.types.js';

/** Confidence ceiling for a judgement that lost its citation. */
export const UNCITED_CONFIDENCE_CAP = 0.3;

export function formatEvidence(bundle: EvidenceBundle): string {
  return bundle.segments
    .map((segment, index) => {
      const pages = segment.pages.length > 0 ? ` (page ${segment.pages.join(', ')})` : '';
      const context = segment.section ? `[Context: ${segment.section}]\n` : '';
      return `[Evidence ${index + 1}]${pages}\n${context}${segment.text}`;
    })
    .join('\n\n');
}

export function normalizeForMatch(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’‚′]/g, "'")
    .replace(/[“”„″]/g, '"')
    .replace(/[–—]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
}

function quoteFragments(quote: string): string[] {
  return normalizeForMatch(quote)
    .split(/\.{3}|…/)
    .map(fragment => fragment.replace(/^["'\s]+|["'\s.,;:]+$/g, '').trim())
    .filter(fragment => fragment.length > 0);
}

/**
 * Finds the segment that contains the quote verbatim, up to case, whitespace
 * and typographic quotes. An elided quote ("a ... b") matches when every
 * fragment appears in the same segment.
 */
export function locateQuote(quote: string, segments: readonly EvidenceSegment[]): EvidenceSegment | undefined {
  const fragments = quoteFragments(quote);
  if (fragments.length === 0) return undefined;

  return segments.find(segment => {
    const haystack = normalizeForMatch(segment.text);
    return fragments.every(fragment => haystack.includes(fragment));
  });
}

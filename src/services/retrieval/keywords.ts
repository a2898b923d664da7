import type { Requirement } from '../../domain/entities/Requirement.js';

const MIN_KEYWORD_LENGTH = 4;

const STOPWORDS = new Set([
  'must', 'shall', 'should', 'will', 'have', 'been', 'were', 'that', 'this', 'with',
  'from', 'such', 'each', 'which', 'where', 'when', 'their', 'they', 'them', 'other',
  'into', 'upon', 'under', 'within', 'about', 'also', 'only', 'than',
]);

/** Lowercase content words of four or more characters, first occurrence order. */
export function extractKeywords(...texts: string[]): string[] {
  const seen = new Set<string>();
  for (const text of texts) {
    for (const token of text.toLowerCase().split(/[^a-z0-9]+/)) {
      if (token.length >= MIN_KEYWORD_LENGTH && !STOPWORDS.has(token)) {
        seen.add(token);
      }
    }
  }
  return [...seen];
}

export function requirementKeywords(requirement: Pick<Requirement, 'title' | 'text'>): string[] {
  return extractKeywords(requirement.title, requirement.text);
}

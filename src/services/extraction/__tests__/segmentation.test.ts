import { describe, it, expect } from 'vitest';
import { isSectionHeader, segmentPages, splitBlocks } from '../segmentation.js';

describe('isSectionHeader', () => {
  it('recognises labelled and numbered headings', () => {
    expect(isSectionHeader('Section 4 Grounds for processing')).toBe(true);
    expect(isSectionHeader('Article IV Rights of the data principal')).toBe(true);
    expect(isSectionHeader('2.1 Withdrawal of consent')).toBe(true);
  });

  it('rejects body text and long lines', () => {
    expect(isSectionHeader('We process data only with consent.')).toBe(false);
    expect(isSectionHeader(`Section 9 ${'x'.repeat(100)}`)).toBe(false);
    expect(isSectionHeader('Section 3 Notice\nWe publish a notice.')).toBe(false);
  });
});

describe('splitBlocks', () => {
  it('splits on blank lines and trims each block', () => {
    expect(splitBlocks('A  \nB\n\n\n C ')).toEqual(['A\nB', 'C']);
  });
});

describe('segmentPages', () => {
  const pages = [
    'Section 1 Consent\n\nWe obtain consent.',
    'Section 2 Erasure\n\nWe erase data on request.',
  ];

  it('groups blocks across pages and records the last two headings', () => {
    expect(segmentPages(pages, 1500)).toEqual([
      {
        text: 'Section 1 Consent\nWe obtain consent.\nSection 2 Erasure\nWe erase data on request.',
        pages: [1, 2],
        sectionContext: 'Section 1 Consent > Section 2 Erasure',
      },
    ]);
  });

  it('starts a new segment at the size limit without stranding a heading', () => {
    expect(segmentPages(pages, 40)).toEqual([
      { text: 'Section 1 Consent\nWe obtain consent.', pages: [1], sectionContext: 'Section 1 Consent' },
      { text: 'Section 2 Erasure\nWe erase data on request.', pages: [2], sectionContext: 'Section 2 Erasure' },
    ]);
  });

  it('uses a default section before the first heading', () => {
    expect(segmentPages(['Plain text only.', '', '  '], 100)).toEqual([
      { text: 'Plain text only.', pages: [1], sectionContext: 'General' },
    ]);
  });
});

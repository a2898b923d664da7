import { z } from 'zod';
import type { DocumentSegment } from '../../types/evidence.types.js';

export interface SegmentInput {
  text: string;
  page?: number;
  pages?: number[];
  sectionContext?: string;
}

export const segmentInputSchema = z.object({
  text: z.string(),
  page: z.number().int().positive().optional(),
  pages: z.array(z.number().int().positive()).optional(),
  sectionContext: z.string().optional(),
});

export const segmentFileSchema = z.union([
  z.array(segmentInputSchema),
  z.object({ segments: z.array(segmentInputSchema) }).transform(file => file.segments),
]);

export function toDocumentSegment(input: SegmentInput): DocumentSegment {
  const pages = input.pages ?? (input.page !== undefined ? [input.page] : []);
  return {
    text: input.text.trim(),
    pages: [...new Set(pages)].sort((a, b) => a - b),
    sectionContext: input.sectionContext?.trim() || undefined,
  };
}

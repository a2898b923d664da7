import type { Tiktoken } from 'tiktoken';
import type { DocumentSegment } from '../../types/evidence.types.js';
import { logger } from '../../utils/logger.js';

/**
 * Splits segments that exceed a token budget, preferring sentence boundaries,
 * then line breaks, then raw character windows. The encoder is only loaded
 * once a segment is large enough to possibly exceed the budget.
 */
export class TokenSplitter {
  private encoder: Tiktoken | null = null;

  constructor(private readonly maxTokens: number) {}

  async countTokens(text: string): Promise<number> {
    return (await this.getEncoder()).encode(text).length;
  }

  async split(segment: DocumentSegment): Promise<DocumentSegment[]> {
    // Every cl100k token covers at least one byte.
    if (Buffer.byteLength(segment.text, 'utf8') <= this.maxTokens) {
      return [segment];
    }

    const tokens = await this.countTokens(segment.text);
    if (tokens <= this.maxTokens) {
      return [segment];
    }

    logger.debug({ tokens, maxTokens: this.maxTokens, pages: segment.pages }, 'Segment exceeds token limit, splitting');

    const pieces = await this.splitText(segment.text);
    return pieces.map(text => ({ ...segment, text }));
  }

  free(): void {
    this.encoder?.free();
    this.encoder = null;
  }

  private async getEncoder(): Promise<Tiktoken> {
    if (!this.encoder) {
      const { get_encoding } = await import('tiktoken');
      this.encoder = get_encoding('cl100k_base');
    }
    return this.encoder;
  }

  private async splitText(text: string): Promise<string[]> {
    const sentences = text.split(/(?<=[.!?])\s+/);
    if (sentences.length > 1) return this.pack(sentences, ' ');

    const lines = text.split(/\n+/);
    if (lines.length > 1) return this.pack(lines, '\n');

    return this.characterSplit(text);
  }

  /** Greedily packs units into pieces under the budget; oversized units are split further. */
  private async pack(units: string[], separator: string): Promise<string[]> {
    const pieces: string[] = [];
    let current: string[] = [];
    let currentTokens = 0;

    const flush = () => {
      if (current.length > 0) pieces.push(current.join(separator));
      current = [];
      currentTokens = 0;
    };

    for (const unit of units) {
      const unitTokens = await this.countTokens(unit);
      if (unitTokens > this.maxTokens) {
        flush();
        pieces.push(...(await this.splitText(unit)));
        continue;
      }
      if (currentTokens + unitTokens > this.maxTokens) flush();
      current.push(unit);
      currentTokens += unitTokens;
    }
    flush();

    return pieces;
  }

  private async characterSplit(text: string): Promise<string[]> {
    const pieces: string[] = [];
    let start = 0;

    while (start < text.length) {
      let end = Math.min(start + this.maxTokens * 4, text.length);
      while (end - start > 1 && (await this.countTokens(text.slice(start, end))) > this.maxTokens) {
        end = start + Math.floor((end - start) / 2);
      }
      pieces.push(text.slice(start, end));
      start = end;
    }

    return pieces;
  }
}

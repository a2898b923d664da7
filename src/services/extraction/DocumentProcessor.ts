import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import type { DocumentSegment, DocumentSource } from '../../types/evidence.types.js';
import { createLogger } from '../../utils/logger.js';
import { ExtractionError, errorMessage } from '../../utils/errors.js';
import type { DocumentExtractor } from './DocumentExtractor.interface.js';
import { readPdfPages } from './pdfPages.js';
import { segmentFileSchema, toDocumentSegment } from './segment.schema.js';
import { segmentPages } from './segmentation.js';
import { TokenSplitter } from './TokenSplitter.js';

const log = createLogger('extraction');

export interface DocumentProcessorOptions {
  maxSegmentChars: number;
  maxSegmentTokens: number;
}

const TEXT_EXTENSIONS = new Set(['.txt', '.md', '.markdown', '']);

export class DocumentProcessor implements DocumentExtractor {
  constructor(private readonly options: DocumentProcessorOptions) {}

  async extract(source: DocumentSource): Promise<DocumentSegment[]> {
    const fileName = source.kind === 'file' ? (source.fileName ?? basename(source.path)) : source.fileName;

    try {
      const segments = await this.readSegments(source, fileName);
      const split = await this.splitOversized(segments.filter(segment => segment.text.length > 0));

      if (split.length === 0) {
        throw new ExtractionError(`No text could be extracted from ${fileName}`);
      }

      log.info({ fileName, segments: split.length }, 'Document extracted');
      return split;
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      log.error({ fileName, error: errorMessage(error) }, 'Document extraction failed');
      throw new ExtractionError(`Failed to extract ${fileName}: ${errorMessage(error)}`, error);
    }
  }

  private async readSegments(source: DocumentSource, fileName: string): Promise<DocumentSegment[]> {
    switch (source.kind) {
      case 'segments':
        return source.segments.map(toDocumentSegment);
      case 'buffer':
        return this.processBuffer(source.data, fileName);
      case 'file':
        return this.processBuffer(await readFile(source.path), fileName);
    }
  }

  private async processBuffer(data: Buffer, fileName: string): Promise<DocumentSegment[]> {
    const extension = extname(fileName).toLowerCase();

    if (extension === '.pdf') {
      const pages = await readPdfPages(data);
      log.debug({ fileName, pageCount: pages.length }, 'Processed PDF');
      return segmentPages(pages, this.options.maxSegmentChars);
    }

    if (extension === '.json') {
      const parsed = segmentFileSchema.safeParse(JSON.parse(data.toString('utf8')));
      if (!parsed.success) {
        throw new ExtractionError(`${fileName} is not a list of document segments`, parsed.error.issues);
      }
      return parsed.data.map(toDocumentSegment);
    }

    if (!TEXT_EXTENSIONS.has(extension)) {
      throw new ExtractionError(`Unsupported document type: ${extension}`);
    }

    const text = data.toString('utf8');
    if (text.includes('\u0000')) {
      throw new ExtractionError(`${fileName} does not contain readable text`);
    }

    return segmentPages(text.split('\f'), this.options.maxSegmentChars);
  }

  private async splitOversized(segments: DocumentSegment[]): Promise<DocumentSegment[]> {
    const splitter = new TokenSplitter(this.options.maxSegmentTokens);
    try {
      const result: DocumentSegment[] = [];
      for (const segment of segments) {
        result.push(...(await splitter.split(segment)));
      }
      return result;
    } finally {
      splitter.free();
    }
  }
}

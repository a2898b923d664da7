import pdfParse from 'pdf-parse/lib/pdf-parse.js';

interface PdfTextItem {
  str: string;
  transform: number[];
}

interface PdfPageData {
  pageIndex: number;
  getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<{
    items: PdfTextItem[];
  }>;
}

/** Text lines of one page, a new line starting wherever the baseline moves. */
function joinTextItems(items: PdfTextItem[]): string {
  const lines: string[] = [];
  let line = '';
  let lastY: number | undefined;

  for (const item of items) {
    const y = item.transform[5];
    if (lastY !== undefined && y !== lastY) {
      lines.push(line.trim());
      line = '';
    }
    line += item.str;
    lastY = y;
  }
  lines.push(line.trim());

  return lines.filter(text => text.length > 0).join('\n\n');
}

/** Returns the text of each page in page order. */
export async function readPdfPages(data: Buffer): Promise<string[]> {
  const pages: string[] = [];
  const pending: Promise<void>[] = [];

  await pdfParse(data, {
    pagerender: (pageData: PdfPageData) => {
      pending.push(
        pageData
          .getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
          .then(content => {
            pages[pageData.pageIndex] = joinTextItems(content.items);
          })
      );
      return '';
    },
  });
  await Promise.all(pending);

  return Array.from(pages, page => page ?? '');
}

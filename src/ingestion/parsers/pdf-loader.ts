/**
 * Reads a PDF's text layer into positioned word fragments with pdfjs-dist.
 */

import type { PdfFragment, PdfPage } from '../../types/source.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('pdf-loader');

/**
 * Split one text run into word fragments. pdfjs reports a single box per run,
 * so word positions are estimated from character offsets.
 */
export function splitRunIntoWords(
  text: string,
  x: number,
  width: number,
  top: number,
  bottom: number,
): PdfFragment[] {
  const charWidth = text.length > 0 ? width / text.length : 0;
  const fragments: PdfFragment[] = [];

  for (const match of text.matchAll(/\S+/g)) {
    const offset = match.index ?? 0;
    const x0 = x + offset * charWidth;
    fragments.push({
      text: match[0],
      x0,
      x1: x0 + match[0].length * charWidth,
      top,
      bottom,
    });
  }

  return fragments;
}

/**
 * Load every page of a PDF as positioned fragments with a top-left origin.
 */
export async function loadPdfPages(data: Uint8Array, file?: string): Promise<PdfPage[]> {
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');

  // pdfjs takes ownership of the buffer it is given.
  const document = await getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    useSystemFonts: true,
    disableFontFace: true,
  }).promise;

  const pages: PdfPage[] = [];

  try {
    for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const viewport = page.getViewport({ scale: 1 });
      const content = await page.getTextContent();
      const fragments: PdfFragment[] = [];

      for (const item of content.items) {
        if (!('str' in item) || !item.str.trim()) continue;

        const x = Number(item.transform[4]);
        const baseline = Number(item.transform[5]);
        const height = item.height || Math.abs(Number(item.transform[3])) || 1;
        const top = viewport.height - baseline - height;

        fragments.push(...splitRunIntoWords(item.str, x, item.width, top, top + height));
      }

      pages.push({
        pageNumber,
        width: viewport.width,
        height: viewport.height,
        fragments,
      });
      page.cleanup();
    }
  } finally {
    await document.destroy();
  }

  logger.debug(`Loaded ${pages.length} pages${file ? ` from ${file}` : ''}`);
  return pages;
}

/**
 * Per-document conversion: detect the source kind, segment the document into
 * blocks and parse every block. Block failures are collected, not thrown;
 * document-level errors propagate to the caller.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';

import type { Adversary } from '../types/adversary.js';
import type { PdfPage, RawBlock, SourceKind } from '../types/source.js';
import { RecordParseError, UnsupportedFileTypeError } from './errors.js';
import { cleanText } from './text-cleaner.js';
import { parseBlock } from './parsers/block-parser.js';
import { segmentMarkdownBlocks } from './parsers/markdown.js';
import { extractPdfBlocks } from './parsers/pdf.js';
import { loadPdfPages } from './parsers/pdf-loader.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('normalizer');

export interface ParsedDocument {
  file?: string;
  kind: SourceKind;
  blockCount: number;
  records: Adversary[];
  failures: RecordParseError[];
}

export interface NormalizeOptions {
  file?: string;
  /** Standalone lines dropped from PDF text. */
  runningHeaders?: readonly string[];
  loadPdf?: (data: Uint8Array, file?: string) => Promise<PdfPage[]>;
  /**
   * Source name for PDF records without a Source line. Derived from the file
   * name when omitted.
   */
  sourceName?: string;
}

/**
 * Detect the source kind from a file extension.
 */
export function detectSourceKind(path: string): SourceKind {
  const ext = extname(path).toLowerCase();
  if (ext === '.pdf') return 'pdf';
  if (ext === '.md' || ext === '.markdown') return 'md';
  throw new UnsupportedFileTypeError(path);
}

/**
 * Readable source name from a file name: `Coastal-Threats_v2.pdf` becomes
 * `Coastal Threats v2`.
 */
export function sourceNameFromFile(file: string): string {
  return basename(file, extname(file)).replace(/[-_]+/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Parse blocks into records, collecting blocks without a name as failures.
 * PDF records without a Source line are stamped with `sourceName` and the
 * page their block starts on.
 */
export function parseBlocks(
  blocks: readonly RawBlock[],
  file?: string,
  sourceName?: string,
): Pick<ParsedDocument, 'records' | 'failures'> {
  const records: Adversary[] = [];
  const failures: RecordParseError[] = [];

  for (const block of blocks) {
    try {
      const record = parseBlock(block);
      if (file) record.sourceFile = file;
      if (sourceName && block.origin === 'pdf' && !record.sourceName) {
        record.sourceName = sourceName;
        if (block.page !== undefined) record.sourcePage = block.page;
      }
      records.push(record);
    } catch (err) {
      if (!(err instanceof RecordParseError)) throw err;
      logger.warn(`Skipping block ${err.blockIndex}${file ? ` in ${file}` : ''}: ${err.message}`);
      failures.push(err);
    }
  }

  return { records, failures };
}

export function parseMarkdownDocument(text: string, options: NormalizeOptions = {}): ParsedDocument {
  const blocks = segmentMarkdownBlocks(cleanText(text), options.file);
  logger.debug(`Markdown: ${blocks.length} blocks (${blocks[0]?.dialect ?? 'none'})`);
  return { file: options.file, kind: 'md', blockCount: blocks.length, ...parseBlocks(blocks, options.file) };
}

export function parsePdfDocument(pages: readonly PdfPage[], options: NormalizeOptions = {}): ParsedDocument {
  const blocks = extractPdfBlocks(pages, { file: options.file, runningHeaders: options.runningHeaders });
  logger.debug(`PDF: ${blocks.length} blocks from ${pages.length} pages`);
  const sourceName = options.sourceName ?? (options.file ? sourceNameFromFile(options.file) : undefined);
  return {
    file: options.file,
    kind: 'pdf',
    blockCount: blocks.length,
    ...parseBlocks(blocks, options.file, sourceName),
  };
}

/**
 * Read and parse one source file.
 */
export async function parseSourceFile(path: string, options: NormalizeOptions = {}): Promise<ParsedDocument> {
  const kind = detectSourceKind(path);
  const file = options.file ?? path;

  if (kind === 'pdf') {
    const loadPdf = options.loadPdf ?? loadPdfPages;
    const pages = await loadPdf(await readFile(path), file);
    return parsePdfDocument(pages, { ...options, file });
  }

  return parseMarkdownDocument(await readFile(path, 'utf-8'), { ...options, file });
}

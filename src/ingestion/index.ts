/**
 * Ingestion pipeline: text cleaning, block extraction and block parsing.
 */

export { parseBlock } from './parsers/block-parser.js';
export { parseFeatures } from './parsers/features.js';
export { segmentMarkdownBlocks, splitEntrySections, SEGMENTATION_STRATEGIES } from './parsers/markdown.js';
export { extractPdfBlocks, segmentPdfBlocks, findBlockStarts } from './parsers/pdf.js';
export { detectColumnSplit, linearizePage, linearizeDocument } from './parsers/pdf-layout.js';
export { loadPdfPages } from './parsers/pdf-loader.js';

export { cleanText, stripPageArtifacts, joinWrappedLines, deduplicateText } from './text-cleaner.js';

export {
  parseSourceFile,
  parseMarkdownDocument,
  parsePdfDocument,
  parseBlocks,
  detectSourceKind,
  sourceNameFromFile,
  type ParsedDocument,
  type NormalizeOptions,
} from './normalizer.js';

export {
  ConversionError,
  EmptySourceError,
  RecordParseError,
  UnsupportedDialectError,
  UnsupportedFileTypeError,
  ConfigError,
  isDocumentError,
} from './errors.js';

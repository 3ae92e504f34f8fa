/**
 * Library entry point.
 */

export type { Adversary, Attack, Damage, DiceDamage, FlatDamage, Feature, ThresholdValue } from './types/adversary.js';
export type { RawBlock, PdfPage, PdfFragment, PdfLine, SourceKind, SourceMatch, SourceDocument } from './types/source.js';

export * from './model/adversary.js';
export * from './model/attack.js';
export * from './model/vocabulary.js';

export * from './ingestion/index.js';
export * from './reporting/index.js';

export { SourceIndex, loadSourceIndex, applyAttribution, createSourceDocument } from './attribution/source-finder.js';

export { loadConfig, parseConfig, DEFAULT_CONFIG_FILE } from './config/loader.js';
export { ConverterConfigSchema, type ConverterConfig, type SourceEntry } from './config/schema.js';

export { convertSources, parseSources, type ConvertOptions, type ConvertResult } from './pipeline/convert.js';
export {
  normalizeDirectory,
  normalizeFile,
  findAdversaryFiles,
  buildDirectoryReport,
  type NormalizeSummary,
  type NormalizeFileResult,
} from './pipeline/normalize.js';

export { createLogger, setLogLevel, type LogLevel } from './utils/logger.js';

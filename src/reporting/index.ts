/**
 * Barrel exports for the output writers and reports.
 */

export {
  renderMarkdown,
  renderStatsLine,
  renderFeature,
  renderSourceLine,
  writeAdversaryFiles,
  type WriteOptions,
  type WriteConflict,
  type WrittenFile,
  type WriteResult,
} from './markdown-writer.js';

export {
  formatBeastVaultEntry,
  renderBeastVault,
  writeBeastVault,
  resolveSourceTag,
  slugify,
  HOMEBREW_TAG,
  BeastVaultEntrySchema,
  BeastVaultLibrarySchema,
  type BeastVaultEntry,
  type BeastVaultFeature,
  type BeastVaultOptions,
} from './beastvault-writer.js';

export { buildIndex, buildTierIndex, categoryOf, UNKNOWN_CATEGORY, type IndexOptions } from './index-generator.js';

export { validateAdversary, formatValidationReport } from './validation.js';

export {
  formatConvertSummary,
  formatNormalizeSummary,
  type ConvertSummaryData,
  type NormalizeSummaryData,
} from './summary-reporter.js';

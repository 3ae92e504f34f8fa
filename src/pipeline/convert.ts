/**
 * Batch conversion: parse every source, optionally attribute, then write the
 * requested outputs. Document-level failures and skipped blocks are returned
 * as data; I/O errors propagate.
 */

import { existsSync } from 'node:fs';
import { basename, join, resolve } from 'node:path';

import type { Adversary } from '../types/adversary.js';
import type { ConverterConfig, SourceEntry } from '../config/schema.js';
import { isDocumentError, type RecordParseError } from '../ingestion/errors.js';
import { parseSourceFile, type ParsedDocument } from '../ingestion/normalizer.js';
import { applyAttribution, loadSourceIndex, type PdfPageLoader } from '../attribution/source-finder.js';
import { writeAdversaryFiles, type WriteConflict, type WrittenFile } from '../reporting/markdown-writer.js';
import { writeBeastVault } from '../reporting/beastvault-writer.js';
import { buildIndex, buildTierIndex } from '../reporting/index-generator.js';
import { validateAdversary } from '../reporting/validation.js';
import { writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('convert');

export const INDEX_FILE = 'Adversaries_Index.md';
export const DEFAULT_BEASTVAULT_FILE = 'adversaries.json';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type IndexStyle = 'category' | 'tier';

export interface DocumentFailure {
  file: string;
  code: string;
  message: string;
}

export interface BlockFailure {
  file: string;
  error: RecordParseError;
}

export interface BatchResult {
  documents: ParsedDocument[];
  records: Adversary[];
  documentFailures: DocumentFailure[];
  blockFailures: BlockFailure[];
}

export interface ParseSourcesOptions {
  runningHeaders?: readonly string[];
  loadPdf?: PdfPageLoader;
  /** Configured sources; a converted PDF listed here takes its display name. */
  sources?: readonly SourceEntry[];
}

export interface ConvertOptions extends ParseSourcesOptions {
  /** Write one Markdown file per record here. */
  outputDir?: string;
  overwrite?: boolean;
  index?: IndexStyle;
  /** BeastVault file name, resolved against the output directory or cwd. */
  beastVault?: string;
  /** Search the configured sources for records without a source line. */
  addSources?: boolean;
  /** Overrides the configured sources directory. */
  sourcesDir?: string;
}

export interface ConvertResult extends BatchResult {
  attributed: number;
  written: WrittenFile[];
  conflicts: WriteConflict[];
  withIssues: number;
  indexPath?: string;
  beastVaultPath?: string;
  beastVaultCount: number;
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse all sources concurrently. Records keep source order.
 */
export async function parseSources(paths: readonly string[], options: ParseSourcesOptions = {}): Promise<BatchResult> {
  const outcomes = await Promise.all(
    paths.map(async (path): Promise<ParsedDocument | DocumentFailure> => {
      try {
        const file = basename(path);
        return await parseSourceFile(path, {
          file,
          runningHeaders: options.runningHeaders,
          loadPdf: options.loadPdf,
          sourceName: options.sources?.find((entry) => entry.file === file)?.displayName,
        });
      } catch (err) {
        if (!isDocumentError(err)) throw err;
        logger.warn(`${basename(path)}: ${err.message}`);
        return { file: basename(path), code: err.code, message: err.message };
      }
    }),
  );

  const result: BatchResult = { documents: [], records: [], documentFailures: [], blockFailures: [] };
  for (const outcome of outcomes) {
    if ('code' in outcome) {
      result.documentFailures.push(outcome);
      continue;
    }
    result.documents.push(outcome);
    result.records.push(...outcome.records);
    const file = outcome.file ?? 'unknown';
    result.blockFailures.push(...outcome.failures.map((error) => ({ file, error })));
  }

  logger.debug(`Parsed ${result.records.length} records from ${result.documents.length} documents`);
  return result;
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

function sourceTags(config: ConverterConfig): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const entry of config.sources) {
    if (entry.tag) tags[entry.displayName] = entry.tag;
  }
  return tags;
}

export async function attributeRecords(
  records: readonly Adversary[],
  config: ConverterConfig,
  sourcesDir: string,
  loadPdf?: PdfPageLoader,
): Promise<number> {
  if (!existsSync(sourcesDir)) {
    logger.warn(`Sources directory not found, skipping attribution: ${sourcesDir}`);
    return 0;
  }
  const index = await loadSourceIndex(config, { sourcesDir, loadPdf });
  return records.filter((record) => applyAttribution(record, index)).length;
}

export async function convertSources(
  paths: readonly string[],
  config: ConverterConfig,
  options: ConvertOptions = {},
): Promise<ConvertResult> {
  const startTime = Date.now();
  const batch = await parseSources(paths, {
    runningHeaders: options.runningHeaders ?? config.runningHeaders,
    loadPdf: options.loadPdf,
    sources: config.sources,
  });

  const result: ConvertResult = {
    ...batch,
    attributed: 0,
    written: [],
    conflicts: [],
    withIssues: batch.records.filter((record) => validateAdversary(record).length > 0).length,
    beastVaultCount: 0,
    durationMs: 0,
  };

  if (options.addSources) {
    result.attributed = await attributeRecords(
      batch.records,
      config,
      resolve(options.sourcesDir ?? config.sourcesDir),
      options.loadPdf,
    );
  }

  if (options.outputDir) {
    const outputDir = resolve(options.outputDir);
    const { written, conflicts } = await writeAdversaryFiles(batch.records, outputDir, {
      overwrite: options.overwrite,
    });
    result.written = written;
    result.conflicts = conflicts;

    if (options.index) {
      const content =
        options.index === 'tier'
          ? buildTierIndex(batch.records)
          : buildIndex(batch.records, { categories: config.categories });
      result.indexPath = join(outputDir, INDEX_FILE);
      await writeFileAtomic(result.indexPath, content);
    }
  } else if (options.index) {
    logger.warn('Index requested without an output directory; no index written');
  }

  if (options.beastVault) {
    result.beastVaultPath = resolve(options.outputDir ?? '.', options.beastVault);
    result.beastVaultCount = await writeBeastVault(batch.records, result.beastVaultPath, {
      sourceTags: sourceTags(config),
    });
  }

  result.durationMs = Date.now() - startTime;
  logger.debug(
    `Converted ${batch.records.length} records (${result.written.length} written, ${result.conflicts.length} skipped)`,
  );
  return result;
}

/**
 * Rewrite a directory of single-adversary Markdown files into the
 * standardized layout.
 */

import { existsSync } from 'node:fs';
import { copyFile, readdir, readFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';

import type { Adversary } from '../types/adversary.js';
import type { ConverterConfig } from '../config/schema.js';
import { isDocumentError } from '../ingestion/errors.js';
import { parseMarkdownDocument } from '../ingestion/normalizer.js';
import {
  applyAttribution,
  loadSourceIndex,
  type PdfPageLoader,
  type SourceIndex,
} from '../attribution/source-finder.js';
import { renderMarkdown } from '../reporting/markdown-writer.js';
import { formatValidationReport, validateAdversary } from '../reporting/validation.js';
import { writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('normalize');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface NormalizeFileOptions {
  backup?: boolean;
  dryRun?: boolean;
  sourceIndex?: SourceIndex;
}

export interface NormalizeFileResult {
  file: string;
  name?: string;
  success: boolean;
  changed: boolean;
  sourceAdded: boolean;
  issues: string[];
  error?: string;
}

export interface NormalizeDirectoryOptions {
  backup?: boolean;
  dryRun?: boolean;
  addSources?: boolean;
  loadPdf?: PdfPageLoader;
}

export interface NormalizeSummary {
  total: number;
  success: number;
  changed: number;
  withIssues: number;
  failed: number;
  sourcesAdded: number;
  /** False when sources were requested but the directory was missing. */
  sourcesAvailable: boolean;
  details: NormalizeFileResult[];
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

/**
 * Markdown files under `dir`, sorted. Files starting with `_`, configured
 * skip files and hidden or configured skip directories are left out.
 */
export async function findAdversaryFiles(dir: string, config: ConverterConfig): Promise<string[]> {
  const skipFiles = new Set(config.skip.files);
  const skipDirs = new Set(config.skip.dirs);
  const files: string[] = [];

  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (entry.name.startsWith('.') || skipDirs.has(entry.name)) continue;
        await walk(join(current, entry.name));
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.md')) {
        if (entry.name.startsWith('_') || skipFiles.has(entry.name)) continue;
        files.push(join(current, entry.name));
      }
    }
  };

  await walk(dir);
  return files.sort();
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalize one file. The first record in the file is rendered back; the
 * file is rewritten only when the trimmed content differs.
 */
export async function normalizeFile(path: string, options: NormalizeFileOptions = {}): Promise<NormalizeFileResult> {
  const result: NormalizeFileResult = {
    file: basename(path),
    success: false,
    changed: false,
    sourceAdded: false,
    issues: [],
  };

  try {
    const original = await readFile(path, 'utf-8');
    const [record] = parseMarkdownDocument(original, { file: basename(path) }).records;
    if (!record) {
      result.error = 'Failed to parse adversary';
      return result;
    }

    result.name = record.name;
    result.issues = validateAdversary(record);

    if (options.sourceIndex) {
      result.sourceAdded = applyAttribution(record, options.sourceIndex);
    }

    const normalized = renderMarkdown(record);
    result.changed = original.trim() !== normalized.trim();

    if (!options.dryRun && result.changed) {
      if (options.backup) await copyFile(path, `${path}.bak`);
      await writeFileAtomic(path, normalized);
    }

    result.success = true;
  } catch (err) {
    logger.warn(`${basename(path)}: ${errorMessage(err)}`);
    result.error = errorMessage(err);
  }

  return result;
}

export async function normalizeDirectory(
  dir: string,
  config: ConverterConfig,
  options: NormalizeDirectoryOptions = {},
): Promise<NormalizeSummary> {
  const startTime = Date.now();
  const files = await findAdversaryFiles(dir, config);

  let sourceIndex: SourceIndex | undefined;
  let sourcesAvailable = true;
  if (options.addSources) {
    const sourcesDir = resolve(dir, config.sourcesDir);
    if (existsSync(sourcesDir)) {
      sourceIndex = await loadSourceIndex(config, { sourcesDir, loadPdf: options.loadPdf });
    } else {
      logger.warn(`Sources directory not found, skipping attribution: ${sourcesDir}`);
      sourcesAvailable = false;
    }
  }

  const details = await Promise.all(
    files.map((file) =>
      normalizeFile(file, { backup: options.backup, dryRun: options.dryRun, sourceIndex }),
    ),
  );

  const succeeded = details.filter((d) => d.success);
  return {
    total: files.length,
    success: succeeded.length,
    changed: succeeded.filter((d) => d.changed).length,
    withIssues: succeeded.filter((d) => d.issues.length > 0).length,
    failed: details.length - succeeded.length,
    sourcesAdded: succeeded.filter((d) => d.sourceAdded).length,
    sourcesAvailable,
    details,
    durationMs: Date.now() - startTime,
  };
}

/**
 * Validation report over every adversary file in a directory. Documents in
 * no known format are left out.
 */
export async function buildDirectoryReport(dir: string, config: ConverterConfig): Promise<string> {
  const files = await findAdversaryFiles(dir, config);
  const parsed = await Promise.all(
    files.map(async (file): Promise<Adversary[]> => {
      try {
        return parseMarkdownDocument(await readFile(file, 'utf-8'), { file: basename(file) }).records;
      } catch (err) {
        if (!isDocumentError(err)) throw err;
        logger.warn(`${basename(file)}: ${err.message}`);
        return [];
      }
    }),
  );
  return formatValidationReport(parsed.flat());
}

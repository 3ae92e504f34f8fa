/**
 * Terminal summary table renderer.
 *
 * Produces a colorized box-drawn summary of a conversion or normalization
 * run, printed to stdout after the per-file output.
 */

import chalk from 'chalk';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface ConvertSummaryData {
  sourceCount: number;
  processingTimeMs: number;
  extraction: {
    records: number;
    skippedBlocks: number;
    failedDocuments: number;
  };
  output: {
    written: number;
    conflicts: number;
    beastVault?: number;
    index?: string;
  };
  validation: {
    complete: number;
    withIssues: number;
  };
  attribution?: {
    attributed: number;
  };
}

export interface NormalizeSummaryData {
  directory: string;
  processingTimeMs: number;
  dryRun: boolean;
  total: number;
  success: number;
  changed: number;
  failed: number;
  withIssues: number;
  sourcesAdded?: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 50;

const TOP = chalk.cyan(`╔${''.padStart(BOX_WIDTH, '═')}╗`);
const SEPARATOR = chalk.cyan(`╠${''.padStart(BOX_WIDTH, '═')}╣`);
const BOTTOM = chalk.cyan(`╚${''.padStart(BOX_WIDTH, '═')}╝`);

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Format a conversion run. The completeness rate is green at 90% and up,
 * yellow from 70%, red below.
 */
export function formatConvertSummary(data: ConvertSummaryData): string {
  const lines: string[] = [];

  lines.push(TOP);
  lines.push(formatCenteredLine('Conversion Summary', true));
  lines.push(SEPARATOR);

  lines.push(formatLine(`Sources: ${data.sourceCount}`));
  lines.push(formatLine(`Processing Time: ${formatDuration(data.processingTimeMs)}`));

  lines.push(SEPARATOR);
  lines.push(formatSectionHeader('EXTRACTION'));
  lines.push(formatLine(`  Records: ${data.extraction.records}  │  Skipped blocks: ${data.extraction.skippedBlocks}`));
  if (data.extraction.failedDocuments > 0) {
    lines.push(formatLineRaw(`  ${chalk.red(`Failed documents: ${data.extraction.failedDocuments}`)}`));
  }
  if (data.attribution) {
    lines.push(formatLine(`  Sources attributed: ${data.attribution.attributed}`));
  }

  lines.push(SEPARATOR);
  lines.push(formatSectionHeader('OUTPUT'));
  lines.push(formatLine(`  Files: ${data.output.written}  │  Skipped existing: ${data.output.conflicts}`));
  if (data.output.beastVault !== undefined) {
    lines.push(formatLine(`  BeastVault entries: ${data.output.beastVault}`));
  }
  if (data.output.index) {
    lines.push(formatLine(`  Index: ${data.output.index}`));
  }

  lines.push(SEPARATOR);
  lines.push(formatSectionHeader('VALIDATION'));
  const total = data.validation.complete + data.validation.withIssues;
  const rate = total > 0 ? (data.validation.complete / total) * 100 : 0;
  const coloredRate = colorizeByRate(`${rate.toFixed(1)}%`, rate);
  lines.push(formatLineRaw(`  Complete: ${data.validation.complete} (${coloredRate})  │  With issues: ${data.validation.withIssues}`));

  lines.push(BOTTOM);
  return lines.join('\n');
}

export function formatNormalizeSummary(data: NormalizeSummaryData): string {
  const lines: string[] = [];

  lines.push(TOP);
  lines.push(formatCenteredLine(data.dryRun ? 'Normalization Summary (dry run)' : 'Normalization Summary', true));
  lines.push(SEPARATOR);

  lines.push(formatLine(`Directory: ${truncate(data.directory, BOX_WIDTH - 13)}`));
  lines.push(formatLine(`Processing Time: ${formatDuration(data.processingTimeMs)}`));

  lines.push(SEPARATOR);
  lines.push(formatSectionHeader('FILES'));
  lines.push(formatLine(`  Total: ${data.total}  │  Successful: ${data.success}  │  Changed: ${data.changed}`));
  if (data.sourcesAdded !== undefined) {
    lines.push(formatLine(`  Sources added: ${data.sourcesAdded}`));
  }
  const failed = data.failed > 0 ? chalk.red(String(data.failed)) : String(data.failed);
  const issues = data.withIssues > 0 ? chalk.yellow(String(data.withIssues)) : String(data.withIssues);
  lines.push(formatLineRaw(`  With issues: ${issues}  │  Failed: ${failed}`));

  lines.push(BOTTOM);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

/**
 * Format a line of text padded within the box borders.
 */
function formatLine(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Format a line that may contain chalk-colored segments. Padding comes from
 * the visible length, since escape codes count toward `.length`.
 */
function formatLineRaw(text: string): string {
  const visibleLen = stripAnsi(text).length;
  const paddingNeeded = BOX_WIDTH - 2 - visibleLen;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string, isBold: boolean = false): string {
  const totalPadding = Math.max(0, BOX_WIDTH - 2 - text.length);
  const leftPad = Math.floor(totalPadding / 2);
  const rightPad = totalPadding - leftPad;
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(rightPad);
  const styled = isBold ? chalk.bold.white(padded) : padded;
  return `${chalk.cyan('║')} ${styled} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

/**
 * Green >= 90%, Yellow 70-89%, Red < 70%.
 */
function colorizeByRate(text: string, rate: number): string {
  if (rate >= 90) return chalk.green(text);
  if (rate >= 70) return chalk.yellow(text);
  return chalk.red(text);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/** Keep the tail of a long path. */
function truncate(text: string, max: number): string {
  return text.length <= max ? text : `...${text.slice(text.length - max + 3)}`;
}

/**
 * Strip ANSI escape codes from a string to get its visible length.
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Convert command: multi-entry PDF or Markdown sources to one standardized
 * Markdown file per adversary, with optional index, BeastVault JSON and
 * validation report.
 */

import { basename, relative } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { Adversary } from '../../types/adversary.js';
import {
  convertSources,
  parseSources,
  DEFAULT_BEASTVAULT_FILE,
  type BatchResult,
  type ConvertResult,
} from '../../pipeline/convert.js';
import { formatValidationReport, validateAdversary } from '../../reporting/validation.js';
import { formatConvertSummary } from '../../reporting/summary-reporter.js';
import {
  addConfigOption,
  addQuietOption,
  applyQuiet,
  loadCliConfig,
  parseIndexStyle,
  printError,
  printInfo,
  printSuccess,
  printWarning,
  resolveInputPath,
  resolveOutputDir,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface ConvertCommandOptions {
  output?: string;
  list?: boolean;
  report?: boolean;
  index?: string | boolean;
  overwrite?: boolean;
  beastvault?: string | boolean;
  addSources?: boolean;
  config?: string;
  quiet?: boolean;
}

const INDEX_WITHOUT_OUTPUT = '--index needs an output directory (-o/--output); no index will be written';

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConvertCommand(program: Command): void {
  const cmd = program
    .command('convert')
    .description('Convert adversary sources (PDF or Markdown) to standardized files')
    .argument('<sources...>', 'Source files (.pdf or .md)')
    .option('-o, --output <dir>', 'Output directory for individual adversary files')
    .option('-l, --list', 'List adversaries without converting')
    .option('--report', 'Print a validation report without converting')
    .option('-i, --index [style]', 'Write Adversaries_Index.md (category or tier)')
    .option('--overwrite', 'Overwrite existing files')
    .option('--beastvault [file]', `Export BeastVault JSON (default: ${DEFAULT_BEASTVAULT_FILE})`)
    .option('-s, --add-sources', 'Attribute sources from the configured sources directory');

  addConfigOption(cmd);
  addQuietOption(cmd);

  cmd.action(async (sources: string[], options: ConvertCommandOptions) => {
    await runConvert(sources, options);
  });
}

// ---------------------------------------------------------------------------
// Output helpers
// ---------------------------------------------------------------------------

/**
 * One `--list` line: right-aligned position, name, tier and type, and the
 * issue count when there are issues.
 */
export function formatListLine(record: Adversary, position: number): string {
  const tier = record.tier ? `Tier ${record.tier}` : 'Tier ?';
  const type = record.adversaryType || 'Unknown Type';
  const issues = validateAdversary(record).length;
  const issuesMark = issues > 0 ? ` [${issues} issues]` : '';
  return `  ${String(position).padStart(3)}. ${record.name || 'UNNAMED'} (${tier} ${type})${issuesMark}`;
}

function printFailures(batch: BatchResult): void {
  for (const failure of batch.documentFailures) {
    printWarning(`${failure.file}: ${failure.message}`);
  }
  for (const { file, error } of batch.blockFailures) {
    const page = error.page !== undefined ? `, page ${error.page}` : '';
    printWarning(`${file} (block ${error.blockIndex}${page}): ${error.message} near "${error.excerpt}"`);
  }
}

function printWrittenFiles(result: ConvertResult): void {
  const issuesByName = new Map(result.records.map((r) => [r.name, validateAdversary(r).length]));
  for (const { name, path } of result.written) {
    const issues = issuesByName.get(name) ?? 0;
    const issuesMark = issues > 0 ? chalk.yellow(` [${issues} issues]`) : '';
    console.log(`  ${chalk.green('✓')} ${basename(path)}${issuesMark}`);
  }
  for (const { path } of result.conflicts) {
    console.log(chalk.yellow(`  - ${basename(path)} (exists, skipped)`));
  }
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runConvert(sources: string[], options: ConvertCommandOptions): Promise<void> {
  const config = await loadCliConfig(options.config);
  applyQuiet(options.quiet);

  const inputPaths = sources.map(resolveInputPath);

  // --- List and report modes parse only ---
  if (options.list || options.report) {
    const spinner = ora(`Parsing ${inputPaths.length} source(s)...`).start();
    let batch: BatchResult;
    try {
      batch = await parseSources(inputPaths, { runningHeaders: config.runningHeaders, sources: config.sources });
      spinner.succeed(chalk.green(`Found ${batch.records.length} adversaries`));
    } catch (err) {
      spinner.fail(chalk.red('Failed to read sources'));
      printError('Source read failed', err instanceof Error ? err.message : String(err));
      process.exit(1);
    }

    printFailures(batch);
    console.log('');
    if (options.report) {
      process.stdout.write(formatValidationReport(batch.records));
    } else {
      batch.records.forEach((record, i) => console.log(formatListLine(record, i + 1)));
    }
    if (batch.records.length === 0) process.exit(1);
    return;
  }

  if (!options.output && !options.beastvault) {
    printError('Output directory required (-o/--output)', 'Use --list to see adversaries without converting');
    process.exit(1);
  }

  console.log('');
  console.log(chalk.bold.cyan('  Adversary Conversion'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');

  const outputDir = options.output ? resolveOutputDir(options.output) : undefined;
  const index = parseIndexStyle(options.index);
  const beastVault = options.beastvault === true ? DEFAULT_BEASTVAULT_FILE : options.beastvault || undefined;

  for (const path of inputPaths) printInfo(`Source: ${relative(process.cwd(), path) || path}`);
  if (outputDir) printInfo(`Output: ${outputDir}`);
  if (index && !outputDir) printWarning(INDEX_WITHOUT_OUTPUT);
  console.log('');

  // --- Convert ---
  const spinner = ora('Converting adversaries...').start();
  let result: ConvertResult;
  try {
    result = await convertSources(inputPaths, config, {
      outputDir,
      overwrite: options.overwrite,
      index,
      beastVault,
      addSources: options.addSources,
    });
    spinner.succeed(chalk.green(`Converted ${result.records.length} adversaries`));
  } catch (err) {
    spinner.fail(chalk.red('Conversion failed'));
    printError('Conversion error', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  if (!options.quiet) printWrittenFiles(result);
  printFailures(result);

  console.log('');
  if (result.indexPath) printSuccess(`Index written to ${result.indexPath}`);
  if (result.beastVaultPath) {
    printSuccess(`BeastVault JSON: ${result.beastVaultCount} entries written to ${result.beastVaultPath}`);
  }
  if (result.withIssues > 0) {
    printWarning(`${result.withIssues} adversaries have validation issues. Run with --report for details.`);
  }

  console.log('');
  console.log(
    formatConvertSummary({
      sourceCount: inputPaths.length,
      processingTimeMs: result.durationMs,
      extraction: {
        records: result.records.length,
        skippedBlocks: result.blockFailures.length,
        failedDocuments: result.documentFailures.length,
      },
      output: {
        written: result.written.length,
        conflicts: result.conflicts.length,
        beastVault: result.beastVaultPath ? result.beastVaultCount : undefined,
        index: result.indexPath ? basename(result.indexPath) : undefined,
      },
      validation: {
        complete: result.records.length - result.withIssues,
        withIssues: result.withIssues,
      },
      attribution: options.addSources ? { attributed: result.attributed } : undefined,
    }),
  );
  console.log('');

  if (result.records.length === 0) process.exit(1);
}

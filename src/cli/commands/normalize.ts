/**
 * Normalize command: rewrite existing single-adversary Markdown files in
 * place into the standardized layout.
 */

import { statSync } from 'fs';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import {
  buildDirectoryReport,
  normalizeDirectory,
  type NormalizeFileResult,
  type NormalizeSummary,
} from '../../pipeline/normalize.js';
import { formatNormalizeSummary } from '../../reporting/summary-reporter.js';
import {
  addConfigOption,
  addQuietOption,
  applyQuiet,
  loadCliConfig,
  printError,
  printInfo,
  printWarning,
  resolveInputPath,
} from '../options.js';

interface NormalizeCommandOptions {
  backup?: boolean;
  dryRun?: boolean;
  report?: boolean;
  addSources?: boolean;
  config?: string;
  quiet?: boolean;
}

export function registerNormalizeCommand(program: Command): void {
  const cmd = program
    .command('normalize')
    .description('Normalize adversary Markdown files in a directory')
    .argument('[dir]', 'Directory containing adversary files', '.')
    .option('-b, --backup', 'Keep a .md.bak copy of each changed file')
    .option('-n, --dry-run', 'Show what would change without modifying files')
    .option('-r, --report', 'Print a validation report')
    .option('-s, --add-sources', 'Add source attribution from the sources directory');

  addConfigOption(cmd);
  addQuietOption(cmd);

  cmd.action(async (dir: string, options: NormalizeCommandOptions) => {
    await runNormalize(dir, options);
  });
}

/**
 * One status line per file: check or cross, then the change, source and
 * issue marks.
 */
export function formatResultLine(result: NormalizeFileResult): string {
  const status = result.success ? chalk.green('✓') : chalk.red('✗');
  const changed = result.changed ? ' (changed)' : '';
  const source = result.sourceAdded ? ' [+source]' : '';
  const issues = result.issues.length > 0 ? ` [${result.issues.length} issues]` : '';
  const error = result.error ? chalk.red(` ${result.error}`) : '';
  return `  ${status} ${result.file}${changed}${source}${issues}${error}`;
}

function printIssues(summary: NormalizeSummary): void {
  const withIssues = summary.details.filter((d) => d.issues.length > 0);
  if (withIssues.length === 0) return;

  console.log('');
  console.log(chalk.bold('  Files with validation issues:'));
  for (const detail of withIssues) {
    console.log(`  ${detail.file}:`);
    for (const issue of detail.issues) console.log(chalk.gray(`    - ${issue}`));
  }
}

async function runNormalize(dir: string, options: NormalizeCommandOptions): Promise<void> {
  const config = await loadCliConfig(options.config);
  applyQuiet(options.quiet);

  const directory = resolveInputPath(dir);
  if (!statSync(directory).isDirectory()) {
    printError(`${directory} is not a directory`);
    process.exit(1);
  }

  if (options.report) {
    process.stdout.write(await buildDirectoryReport(directory, config));
    return;
  }

  console.log('');
  console.log(chalk.bold.cyan(`  ${options.dryRun ? 'DRY RUN - ' : ''}Adversary Normalization`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
  printInfo(`Directory: ${directory}${options.addSources ? ' (with source attribution)' : ''}`);
  console.log('');

  const spinner = ora('Normalizing files...').start();
  let summary: NormalizeSummary;
  try {
    summary = await normalizeDirectory(directory, config, {
      backup: options.backup,
      dryRun: options.dryRun,
      addSources: options.addSources,
    });
    spinner.succeed(chalk.green(`Processed ${summary.total} files`));
  } catch (err) {
    spinner.fail(chalk.red('Normalization failed'));
    printError('Normalization error', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  if (!summary.sourcesAvailable) {
    printWarning('Sources directory not found, skipping source attribution');
  }
  if (!options.quiet) {
    for (const detail of summary.details) console.log(formatResultLine(detail));
  }

  console.log('');
  console.log(
    formatNormalizeSummary({
      directory,
      processingTimeMs: summary.durationMs,
      dryRun: Boolean(options.dryRun),
      total: summary.total,
      success: summary.success,
      changed: summary.changed,
      failed: summary.failed,
      withIssues: summary.withIssues,
      sourcesAdded: options.addSources ? summary.sourcesAdded : undefined,
    }),
  );

  if (!options.quiet) printIssues(summary);
  console.log('');
}

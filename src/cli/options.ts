/**
 * Shared CLI option helpers for the converter commands.
 *
 * Provides reusable option registration functions, path resolution
 * utilities, and message helpers used across all commands.
 */

import { existsSync, mkdirSync, statSync } from 'fs';
import { resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from '../config/loader.js';
import type { ConverterConfig } from '../config/schema.js';
import type { IndexStyle } from '../pipeline/convert.js';
import { getLogLevel, isLogLevel, setLogLevel } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/**
 * Add the --config option to a command.
 */
export function addConfigOption(cmd: Command): Command {
  return cmd.option('--config <file>', 'Path to converter.config.yaml');
}

/**
 * Add the -q/--quiet flag to a command.
 */
export function addQuietOption(cmd: Command): Command {
  return cmd.option('-q, --quiet', 'Suppress file-by-file output');
}

// ---------------------------------------------------------------------------
// Path resolution utilities
// ---------------------------------------------------------------------------

/**
 * Resolve and validate that an input file/directory exists.
 * Prints a chalk-colored error and exits if not found.
 */
export function resolveInputPath(input: string): string {
  const resolved = resolve(input);

  if (!existsSync(resolved)) {
    console.error(
      chalk.red(`Error: Input path does not exist: ${resolved}`),
    );
    process.exit(1);
  }

  return resolved;
}

/**
 * Resolve an output directory path, creating it (and parents) if missing.
 */
export function resolveOutputDir(dir: string): string {
  const resolved = resolve(dir);

  if (!existsSync(resolved)) {
    try {
      mkdirSync(resolved, { recursive: true });
    } catch (err) {
      console.error(
        chalk.red(`Error: Could not create output directory: ${resolved}`),
      );
      console.error(
        chalk.red(`  ${err instanceof Error ? err.message : String(err)}`),
      );
      process.exit(1);
    }
  } else {
    const stat = statSync(resolved);
    if (!stat.isDirectory()) {
      console.error(
        chalk.red(`Error: Output path exists but is not a directory: ${resolved}`),
      );
      process.exit(1);
    }
  }

  return resolved;
}

// ---------------------------------------------------------------------------
// Config and option parsing
// ---------------------------------------------------------------------------

/**
 * Load the config file and apply its log level unless LOG_LEVEL is set.
 * Prints the error and exits when the file is invalid.
 */
export async function loadCliConfig(path?: string): Promise<ConverterConfig> {
  try {
    const config = await loadConfig(path);
    if (!isLogLevel(process.env.LOG_LEVEL)) {
      setLogLevel(config.logging.level);
    }
    return config;
  } catch (err) {
    printError('Invalid configuration', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

const INDEX_STYLES = new Set<string>(['category', 'tier']);

function isIndexStyle(value: string): value is IndexStyle {
  return INDEX_STYLES.has(value);
}

/**
 * Parse the --index value. A bare flag means the category listing.
 *
 * @example parseIndexStyle(true) => 'category'
 */
export function parseIndexStyle(value: string | boolean | undefined): IndexStyle | undefined {
  if (value === undefined || value === false) return undefined;
  if (value === true) return 'category';

  const style = value.trim().toLowerCase();
  if (isIndexStyle(style)) return style;

  console.error(chalk.red(`Error: Unknown index style "${value}". Use: category, tier`));
  process.exit(1);
}

/** Quiet runs keep warnings and errors only. */
export function applyQuiet(quiet: boolean | undefined): void {
  if (quiet && getLogLevel() === 'info') setLogLevel('warn');
}

// ---------------------------------------------------------------------------
// Error display
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

/**
 * Print an informational message.
 */
export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

/**
 * Print a success message.
 */
export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

/**
 * Print a warning message.
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}

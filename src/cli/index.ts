#!/usr/bin/env node

/**
 * advconv: adversary stat block converter
 *
 * Usage:
 *   advconv convert source.pdf -o output/
 *   advconv convert source.md -o output/ --index
 *   advconv convert source.md --list
 *   advconv convert source.pdf --beastvault
 *   advconv normalize adversaries/ --backup --add-sources
 */

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import chalk from 'chalk';

import { registerConvertCommand } from './commands/convert.js';
import { registerNormalizeCommand } from './commands/normalize.js';

function readVersion(): string {
  const path = fileURLToPath(new URL('../../package.json', import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('advconv')
  .description('Convert adversary stat blocks from PDF and Markdown into standardized files')
  .version(readVersion());

// Register all commands
registerConvertCommand(program);
registerNormalizeCommand(program);

// Global error handling
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
      process.exit(err.exitCode);
    }

    console.error('');
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    console.error('');
    console.error(chalk.gray('Run "advconv --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();

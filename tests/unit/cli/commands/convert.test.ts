/**
 * Unit tests for the convert command.
 *
 * Tests: registerConvertCommand, formatListLine, and whole runs against the
 * fixture sources.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';

import { registerConvertCommand, formatListLine } from '@/cli/commands/convert.js';
import { createAdversary } from '@/model/adversary.js';
import { stripAnsi } from '@/reporting/summary-reporter.js';

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

vi.mock('ora', () => ({
  default: () => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    info: vi.fn().mockReturnThis(),
  }),
}));

const COASTAL = fileURLToPath(new URL('../../../fixtures/sources/coastal-threats.md', import.meta.url));

function makeProgram(): Command {
  const program = new Command();
  program.exitOverride();
  registerConvertCommand(program);
  return program;
}

function mockProcessExit(): void {
  vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null | undefined) => {
    throw new Error(`process.exit(${code})`);
  });
}

function loggedLines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((args) => stripAnsi(args.map(String).join(' ')));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

let dir: string;

beforeEach(() => {
  vi.restoreAllMocks();
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  dir = mkdtempSync(join(tmpdir(), 'cli-convert-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('registerConvertCommand', () => {
  it('registers the convert command with its options', () => {
    const program = makeProgram();
    const convert = program.commands.find((c) => c.name() === 'convert');

    expect(convert?.options.map((o) => o.long)).toEqual([
      '--output',
      '--list',
      '--report',
      '--index',
      '--overwrite',
      '--beastvault',
      '--add-sources',
      '--config',
      '--quiet',
    ]);
  });
});

describe('formatListLine', () => {
  it('shows tier and type for a complete record', () => {
    const record = createAdversary('Goblin Sneak', {
      tier: 1,
      adversaryType: 'Skulk',
      difficulty: 11,
      thresholdMinor: 5,
      thresholdMajor: 9,
      hp: 3,
      stress: 2,
      features: [{ name: 'Backstab', featureType: 'Passive', description: 'Deal extra damage.' }],
    });
    expect(formatListLine(record, 1)).toBe('    1. Goblin Sneak (Tier 1 Skulk)');
  });

  it('marks unknown fields and counts issues', () => {
    expect(formatListLine(createAdversary('Marsh Light'), 12)).toBe('   12. Marsh Light (Tier ? Unknown Type) [7 issues]');
  });
});

describe('convert runs', () => {
  it('lists adversaries without writing', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await makeProgram().parseAsync(['node', 'advconv', 'convert', COASTAL, '--list']);

    const lines = loggedLines(logSpy);
    expect(lines).toContain('    1. REEF SHARK (Tier 1 Bruiser)');
    expect(lines).toContain('    2. SALT WRAITH (Tier 2 Solo) [1 issues]');
  });

  it('writes files and the index', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await makeProgram().parseAsync(['node', 'advconv', 'convert', COASTAL, '-o', dir, '-i', 'tier']);

    expect(existsSync(join(dir, 'REEF SHARK.md'))).toBe(true);
    expect(readFileSync(join(dir, 'Adversaries_Index.md'), 'utf-8')).toContain('## Tier 2');
    expect(loggedLines(logSpy)).toContain('  ✓ SALT WRAITH.md [1 issues]');
  });

  it('warns that --index is ignored without an output directory', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const beastVault = join(dir, 'out.json');

    await makeProgram().parseAsync(['node', 'advconv', 'convert', COASTAL, '--beastvault', beastVault, '-i']);

    expect(existsSync(beastVault)).toBe(true);
    expect(loggedLines(logSpy)).toContain(
      '  --index needs an output directory (-o/--output); no index will be written',
    );
  });

  it('exits without an output directory', async () => {
    mockProcessExit();
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(makeProgram().parseAsync(['node', 'advconv', 'convert', COASTAL])).rejects.toThrow(
      'process.exit(1)',
    );
  });
});

/**
 * Unit tests for shared CLI options.
 *
 * Tests: resolveInputPath, resolveOutputDir, parseIndexStyle, applyQuiet,
 * loadCliConfig
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import {
  resolveInputPath,
  resolveOutputDir,
  parseIndexStyle,
  applyQuiet,
  loadCliConfig,
} from '@/cli/options.js';
import { getLogLevel, setLogLevel } from '@/utils/logger.js';

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

// Mock chalk so error assertions see plain text.
vi.mock('chalk', () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    bold: {
      cyan: (s: string) => s,
    },
  },
}));

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Mock process.exit so it throws instead of terminating the test runner.
 */
function mockProcessExit(): void {
  vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null | undefined) => {
    throw new Error(`process.exit(${code})`);
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

let dir: string;

beforeEach(() => {
  vi.restoreAllMocks();
  dir = mkdtempSync(join(tmpdir(), 'cli-options-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.unstubAllEnvs();
});

describe('resolveInputPath', () => {
  it('returns the absolute path of an existing file', () => {
    const file = join(dir, 'source.md');
    writeFileSync(file, '# OGRE\n');

    expect(resolveInputPath(file)).toBe(resolve(file));
  });

  it('exits for a path that does not exist', () => {
    mockProcessExit();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const missing = join(dir, 'missing.pdf');

    expect(() => resolveInputPath(missing)).toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith(`Error: Input path does not exist: ${resolve(missing)}`);
  });
});

describe('resolveOutputDir', () => {
  it('creates a missing directory with its parents', () => {
    const out = join(dir, 'a', 'b');

    expect(resolveOutputDir(out)).toBe(resolve(out));
    expect(existsSync(out)).toBe(true);
    expect(statSync(out).isDirectory()).toBe(true);
  });

  it('exits when the path is a file', () => {
    mockProcessExit();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const file = join(dir, 'taken');
    writeFileSync(file, '');

    expect(() => resolveOutputDir(file)).toThrow('process.exit(1)');
  });
});

describe('parseIndexStyle', () => {
  it('treats a bare flag as the category index', () => {
    expect(parseIndexStyle(true)).toBe('category');
  });

  it('returns undefined when the flag is absent', () => {
    expect(parseIndexStyle(undefined)).toBeUndefined();
    expect(parseIndexStyle(false)).toBeUndefined();
  });

  it('accepts a style in any case', () => {
    expect(parseIndexStyle(' Tier ')).toBe('tier');
  });

  it('exits on an unknown style', () => {
    mockProcessExit();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => parseIndexStyle('alpha')).toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith('Error: Unknown index style "alpha". Use: category, tier');
  });
});

describe('applyQuiet', () => {
  it('raises the info level to warn', () => {
    setLogLevel('info');
    applyQuiet(true);
    expect(getLogLevel()).toBe('warn');
  });

  it('leaves an explicit debug level alone', () => {
    setLogLevel('debug');
    applyQuiet(true);
    expect(getLogLevel()).toBe('debug');
    setLogLevel('info');
  });
});

describe('loadCliConfig', () => {
  it('applies the configured log level when LOG_LEVEL is unset', async () => {
    vi.stubEnv('LOG_LEVEL', '');
    const path = join(dir, 'converter.config.yaml');
    writeFileSync(path, 'logging:\n  level: error\n');

    const config = await loadCliConfig(path);
    expect(config.logging.level).toBe('error');
    expect(getLogLevel()).toBe('error');
    setLogLevel('info');
  });

  it('exits on an invalid file', async () => {
    mockProcessExit();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const path = join(dir, 'bad.yaml');
    writeFileSync(path, 'sources: 3\n');

    await expect(loadCliConfig(path)).rejects.toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith('\nError: Invalid configuration');
  });
});

/**
 * Unit tests for the summary reporter.
 */

import { describe, it, expect } from 'vitest';
import {
  formatConvertSummary,
  formatNormalizeSummary,
  formatDuration,
  stripAnsi,
  type ConvertSummaryData,
  type NormalizeSummaryData,
} from '@/reporting/summary-reporter.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

function makeConvertData(overrides?: Partial<ConvertSummaryData>): ConvertSummaryData {
  return {
    sourceCount: 3,
    processingTimeMs: 45200,
    extraction: { records: 10, skippedBlocks: 1, failedDocuments: 0 },
    output: { written: 8, conflicts: 2 },
    validation: { complete: 9, withIssues: 1 },
    ...overrides,
  };
}

function makeNormalizeData(overrides?: Partial<NormalizeSummaryData>): NormalizeSummaryData {
  return {
    directory: 'adversaries',
    processingTimeMs: 320,
    dryRun: false,
    total: 5,
    success: 4,
    changed: 2,
    failed: 1,
    withIssues: 3,
    ...overrides,
  };
}

/** One visible box line holding `text`. */
function boxLine(text: string): string {
  return `║ ${text.padEnd(48)} ║`;
}

function visibleLines(output: string): string[] {
  return stripAnsi(output).split('\n');
}

// ---------------------------------------------------------------------------
// formatConvertSummary
// ---------------------------------------------------------------------------

describe('formatConvertSummary', () => {
  it('draws every line at the box width', () => {
    for (const line of visibleLines(formatConvertSummary(makeConvertData()))) {
      expect(line).toHaveLength(52);
    }
  });

  it('includes the title and run totals', () => {
    const lines = visibleLines(formatConvertSummary(makeConvertData()));

    expect(lines[1]).toBe('║                Conversion Summary                ║');
    expect(lines).toContain(boxLine('Sources: 3'));
    expect(lines).toContain(boxLine('Processing Time: 45.2s'));
    expect(lines).toContain(boxLine('  Records: 10  │  Skipped blocks: 1'));
    expect(lines).toContain(boxLine('  Files: 8  │  Skipped existing: 2'));
    expect(lines).toContain(boxLine('  Complete: 9 (90.0%)  │  With issues: 1'));
  });

  it('leaves out optional lines when their data is absent', () => {
    const output = stripAnsi(formatConvertSummary(makeConvertData()));

    expect(output).not.toContain('Failed documents');
    expect(output).not.toContain('Sources attributed');
    expect(output).not.toContain('BeastVault entries');
    expect(output).not.toContain('Index:');
  });

  it('adds optional lines when present', () => {
    const lines = visibleLines(
      formatConvertSummary(
        makeConvertData({
          extraction: { records: 10, skippedBlocks: 0, failedDocuments: 2 },
          output: { written: 10, conflicts: 0, beastVault: 10, index: 'Adversaries_Index.md' },
          attribution: { attributed: 7 },
        }),
      ),
    );

    expect(lines).toContain(boxLine('  Failed documents: 2'));
    expect(lines).toContain(boxLine('  Sources attributed: 7'));
    expect(lines).toContain(boxLine('  BeastVault entries: 10'));
    expect(lines).toContain(boxLine('  Index: Adversaries_Index.md'));
  });

  it('reports a zero rate for an empty batch', () => {
    const lines = visibleLines(
      formatConvertSummary(makeConvertData({ validation: { complete: 0, withIssues: 0 } })),
    );
    expect(lines).toContain(boxLine('  Complete: 0 (0.0%)  │  With issues: 0'));
  });
});

// ---------------------------------------------------------------------------
// formatNormalizeSummary
// ---------------------------------------------------------------------------

describe('formatNormalizeSummary', () => {
  it('reports file counts', () => {
    const lines = visibleLines(formatNormalizeSummary(makeNormalizeData()));

    expect(lines[1]).toBe('║              Normalization Summary               ║');
    expect(lines).toContain(boxLine('Directory: adversaries'));
    expect(lines).toContain(boxLine('Processing Time: 320ms'));
    expect(lines).toContain(boxLine('  Total: 5  │  Successful: 4  │  Changed: 2'));
    expect(lines).toContain(boxLine('  With issues: 3  │  Failed: 1'));
  });

  it('marks a dry run in the title', () => {
    const lines = visibleLines(formatNormalizeSummary(makeNormalizeData({ dryRun: true })));
    expect(lines[1]).toContain('Normalization Summary (dry run)');
  });

  it('shows sources added only when attribution ran', () => {
    expect(stripAnsi(formatNormalizeSummary(makeNormalizeData()))).not.toContain('Sources added');
    expect(visibleLines(formatNormalizeSummary(makeNormalizeData({ sourcesAdded: 2 })))).toContain(
      boxLine('  Sources added: 2'),
    );
  });

  it('keeps the tail of a long directory path', () => {
    const directory = `/home/user/${'campaign/'.repeat(5)}adversaries`;
    const lines = visibleLines(formatNormalizeSummary(makeNormalizeData({ directory })));

    const expected = `...${directory.slice(directory.length - 34)}`;
    expect(expected).toHaveLength(37);
    expect(lines).toContain(boxLine(`Directory: ${expected}`));
  });
});

// ---------------------------------------------------------------------------
// formatDuration
// ---------------------------------------------------------------------------

describe('formatDuration', () => {
  it('uses milliseconds under a second', () => {
    expect(formatDuration(999)).toBe('999ms');
  });

  it('uses seconds with one decimal from a second up', () => {
    expect(formatDuration(1000)).toBe('1.0s');
    expect(formatDuration(45200)).toBe('45.2s');
  });
});

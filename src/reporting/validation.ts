/**
 * Non-fatal diagnostics for parsed records.
 */

import type { Adversary } from '../types/adversary.js';
import { isEnvironmentType, isKnownAdversaryType, isKnownFeatureType } from '../model/vocabulary.js';

const INLINE_STATS = /\b(?:Difficulty|Thresholds?|HP|Stress)\s*:?\s*\d/i;

/**
 * Issues in a fixed order: missing core fields, then hints. Environment
 * types are not flagged for missing Thresholds, HP or Stress.
 */
export function validateAdversary(record: Adversary): string[] {
  const issues: string[] = [];
  const environment = isEnvironmentType(record.adversaryType);

  if (record.tier === undefined) issues.push('Missing tier');
  if (!record.adversaryType) issues.push('Missing adversary type');
  if (record.difficulty === undefined) issues.push('Missing Difficulty');

  if (!environment) {
    if (record.thresholdMinor === undefined && record.thresholdMajor === undefined) {
      issues.push('Missing Thresholds');
    }
    if (record.hp === undefined) issues.push('Missing HP');
    if (record.stress === undefined) issues.push('Missing Stress');
  }

  if (record.features.length === 0) issues.push('No features found');

  if (record.tier !== undefined && (record.tier < 1 || record.tier > 4)) {
    issues.push(`Tier ${record.tier} is outside 1-4`);
  }
  if (record.adversaryType && !isKnownAdversaryType(record.adversaryType)) {
    issues.push(`Unrecognized adversary type "${record.adversaryType}"`);
  }

  for (const feature of record.features) {
    if (!isKnownFeatureType(feature.featureType)) {
      issues.push(`Unrecognized feature type "${feature.featureType}" on "${feature.name}"`);
    }
    if (/^evolution$/i.test(feature.featureType) && INLINE_STATS.test(feature.description)) {
      issues.push(`Evolution feature "${feature.name}" contains an inline stat block`);
    }
  }

  return issues;
}

/**
 * Markdown report listing every record with issues, with totals.
 */
export function formatValidationReport(records: readonly Adversary[]): string {
  const details: string[] = [];
  let withIssues = 0;

  for (const record of records) {
    const issues = validateAdversary(record);
    if (issues.length === 0) continue;
    withIssues++;
    details.push(`## ${record.name || 'UNNAMED'}`, ...issues.map((issue) => `- ${issue}`), '');
  }

  const lines = [
    '# Adversary Validation Report',
    '',
    `**Total adversaries:** ${records.length}`,
    `**Complete:** ${records.length - withIssues}`,
    `**With issues:** ${withIssues}`,
    '',
    ...details,
  ];

  return lines.join('\n').trimEnd() + '\n';
}

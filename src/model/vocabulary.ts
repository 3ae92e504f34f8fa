/**
 * Known values of the open vocabularies. Used for hints and reporting only;
 * nothing rejects a value that is missing from these lists.
 */

export const ADVERSARY_TYPES = [
  'Bruiser',
  'Horde',
  'Leader',
  'Minion',
  'Ranged',
  'Skulk',
  'Social',
  'Solo',
  'Standard',
  'Support',
] as const;

export const ENVIRONMENT_TYPES = ['Environment', 'Exploration', 'Traversal', 'Event'] as const;

export const RANGE_BANDS = ['Melee', 'Very Close', 'Close', 'Far', 'Very Far'] as const;

export const FEATURE_TYPES = ['Passive', 'Action', 'Reaction', 'Evolution'] as const;

function includesIgnoreCase(values: readonly string[], value: string): boolean {
  const lower = value.toLowerCase();
  return values.some((v) => v.toLowerCase() === lower);
}

/** First word of a type string, e.g. "Horde" for "Horde (3/HP)". */
export function baseType(adversaryType: string): string {
  return adversaryType.trim().split(/[\s(]/)[0] ?? '';
}

export function isKnownAdversaryType(adversaryType: string): boolean {
  const base = baseType(adversaryType);
  return includesIgnoreCase(ADVERSARY_TYPES, base) || includesIgnoreCase(ENVIRONMENT_TYPES, base);
}

export function isEnvironmentType(adversaryType: string | undefined): boolean {
  return adversaryType !== undefined && includesIgnoreCase(ENVIRONMENT_TYPES, baseType(adversaryType));
}

export function isKnownRange(range: string): boolean {
  return includesIgnoreCase(RANGE_BANDS, range.trim());
}

export function isKnownFeatureType(featureType: string): boolean {
  return includesIgnoreCase(FEATURE_TYPES, featureType.trim());
}

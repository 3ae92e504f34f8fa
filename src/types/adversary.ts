/**
 * Canonical adversary record types.
 *
 * Every parser produces these and every writer consumes them. Open
 * vocabularies (adversary type, range band, feature type) are plain strings;
 * the known values live in `src/model/vocabulary.ts` and are only used for
 * hints and reporting.
 */

/** A damage threshold: a number, or the literal "None" some blocks print. */
export type ThresholdValue = number | 'None';

export interface DiceDamage {
  kind: 'dice';
  /** Dice expression as written, e.g. "2d6". */
  dice: string;
  count: number;
  sides: number;
  /** Flat bonus after the dice; 0 when absent. */
  bonus: number;
  /** Damage type suffix, e.g. "phy" or "mag". */
  damageType?: string;
}

/** Damage that is not dice notation, e.g. "1 Stress". */
export interface FlatDamage {
  kind: 'flat';
  text: string;
}

export type Damage = DiceDamage | FlatDamage;

export interface Attack {
  modifier?: number;
  weaponName?: string;
  range?: string;
  damage?: Damage;
}

export interface Feature {
  name: string;
  featureType: string;
  description: string;
}

export interface Adversary {
  name: string;
  tier?: number;
  adversaryType?: string;
  description?: string;
  motivesTactics?: string;
  difficulty?: number;
  thresholdMinor?: ThresholdValue;
  thresholdMajor?: ThresholdValue;
  hp?: number;
  stress?: number;
  attack?: Attack;
  /** Raw experience text, e.g. "Tracker +2, Stealth +1". */
  experience?: string;
  features: Feature[];
  sourceName?: string;
  sourcePage?: number;
  /** Path of the document the record was parsed from. Never rendered. */
  sourceFile?: string;
}

/**
 * Attack and damage parsing and formatting.
 *
 * The compact form is `+4 | Wand: Far | 2d6+1 phy`. The weapon/range
 * separator may also be ` - `; formatting always writes a colon.
 */

import type { Attack, Damage } from '../types/adversary.js';

const MODIFIER_PATTERN = /^[+-]\d+$/;
const DICE_PATTERN = /\b\d*d\d+\b/i;
const DICE_DAMAGE = /^(\d*)d(\d+)(?:\s*([+-])\s*(\d+))?\s*(.*)$/i;

/**
 * Normalize damage type spellings: "physical" to "phy", "magic"/"magical" to
 * "mag", and drop a trailing "damage" after either.
 */
export function normalizeDamageType(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\bphysical\b/gi, 'phy')
    .replace(/\bmagic(?:al)?\b/gi, 'mag')
    .replace(/\b(phy|mag)\s+damage\b/gi, '$1');
}

export function parseDamage(text: string): Damage {
  const normalized = normalizeDamageType(text);
  const match = DICE_DAMAGE.exec(normalized);

  if (!match) {
    return { kind: 'flat', text: normalized };
  }

  const [, count = '', sides = '', sign, bonus, rest = ''] = match;
  const bonusValue = bonus ? Number.parseInt(bonus, 10) : 0;

  return {
    kind: 'dice',
    dice: `${count}d${sides}`,
    count: count ? Number.parseInt(count, 10) : 1,
    sides: Number.parseInt(sides, 10),
    bonus: sign === '-' ? -bonusValue : bonusValue,
    damageType: rest.trim() || undefined,
  };
}

export function formatDamage(damage: Damage): string {
  if (damage.kind === 'flat') return damage.text;

  let result = damage.dice;
  if (damage.bonus > 0) result += `+${damage.bonus}`;
  else if (damage.bonus < 0) result += `${damage.bonus}`;
  if (damage.damageType) result += ` ${damage.damageType}`;
  return result;
}

/** Render a modifier with an explicit sign: 4 becomes "+4", 0 becomes "+0". */
export function formatModifier(modifier: number): string {
  return modifier >= 0 ? `+${modifier}` : `${modifier}`;
}

function splitWeaponRange(part: string, separator: string): Pick<Attack, 'weaponName' | 'range'> {
  const index = part.indexOf(separator);
  const weaponName = part.slice(0, index).trim();
  const range = part.slice(index + separator.length).trim();
  return {
    weaponName: weaponName || undefined,
    range: range || undefined,
  };
}

/**
 * Parse a compact attack string. Never throws; unrecognized text lands in the
 * weapon (first) or damage (second) slot.
 */
export function parseAttack(text: string): Attack {
  const attack: Attack = {};
  const parts = text
    .replace(/\*{2}/g, '')
    .split('|')
    .map((p) => p.trim())
    .filter(Boolean);

  for (const part of parts) {
    if (MODIFIER_PATTERN.test(part)) {
      attack.modifier = Number.parseInt(part, 10);
    } else if (part.includes(':')) {
      Object.assign(attack, splitWeaponRange(part, ':'));
    } else if (part.includes(' - ') && !DICE_PATTERN.test(part)) {
      Object.assign(attack, splitWeaponRange(part, ' - '));
    } else if (DICE_PATTERN.test(part)) {
      attack.damage = parseDamage(part);
    } else if (!attack.weaponName) {
      attack.weaponName = part;
    } else if (!attack.damage) {
      attack.damage = parseDamage(part);
    }
  }

  return attack;
}

export function isAttackEmpty(attack: Attack): boolean {
  return (
    attack.modifier === undefined &&
    attack.weaponName === undefined &&
    attack.range === undefined &&
    attack.damage === undefined
  );
}

export interface FormatAttackOptions {
  /** Bold the weapon name, as the standardized Markdown does. */
  emphasis?: boolean;
}

/**
 * Render an attack in compact form, e.g. `+4 | **Wand:** Far | 2d6+1 phy`.
 */
export function formatAttack(attack: Attack, options: FormatAttackOptions = {}): string {
  const parts: string[] = [];

  if (attack.modifier !== undefined) {
    parts.push(formatModifier(attack.modifier));
  }

  if (attack.weaponName) {
    if (attack.range) {
      parts.push(options.emphasis ? `**${attack.weaponName}:** ${attack.range}` : `${attack.weaponName}: ${attack.range}`);
    } else {
      parts.push(options.emphasis ? `**${attack.weaponName}**` : attack.weaponName);
    }
  }

  if (attack.damage) {
    parts.push(formatDamage(attack.damage));
  }

  return parts.join(' | ');
}

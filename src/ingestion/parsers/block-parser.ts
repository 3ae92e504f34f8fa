/**
 * Block-to-record parser shared by the PDF and Markdown extractors.
 *
 * Lines are classified after markup is stripped, so both Markdown dialects
 * and PDF text go through the same field rules. Only the text before the
 * features section is searched for stats; stat-like text inside a feature
 * (Evolution features often carry one) never overwrites the record's own.
 */

import type { Adversary } from '../../types/adversary.js';
import type { BlockOrigin, RawBlock } from '../../types/source.js';
import { parseAttack, isAttackEmpty } from '../../model/attack.js';
import { parseThresholds, parseTierLine } from '../../model/adversary.js';
import { joinWrappedLines } from '../text-cleaner.js';
import { RecordParseError } from '../errors.js';
import { parseFeatures, looksLikeFeatureStart } from './features.js';
import { SOURCE_LINE, classifyLine, isEmphasizedTierLine, stripMarkup, type LineKind } from './patterns.js';

interface BlockLine {
  raw: string;
  plain: string;
  kind: LineKind;
}

type StatKey = 'difficulty' | 'thresholds' | 'hp' | 'stress';

const STAT_PAIR = /^\s*(difficulty|thresholds?|hp|stress)\s*:\s*(.*?)\s*$/i;
const INLINE_ATTACK = /\b(?:ATK|Attack)\s*:/i;
const INLINE_EXPERIENCE = /\bExperiences?\s*:/i;

const EXCERPT_LENGTH = 80;

function toBlockLine(raw: string): BlockLine {
  const plain = stripMarkup(raw);
  return { raw, plain, kind: isEmphasizedTierLine(raw) ? 'tier' : classifyLine(plain) };
}

function afterColon(text: string): string {
  const index = text.indexOf(':');
  return index === -1 ? text : text.slice(index + 1).trim();
}

function leadingInt(value: string): number | undefined {
  const match = /^(\d+)/.exec(value.trim());
  return match ? Number.parseInt(match[1], 10) : undefined;
}

// ---------------------------------------------------------------------------
// Name
// ---------------------------------------------------------------------------

/**
 * The record name and the index of the first line after it. Markdown blocks
 * are named by their heading; PDF blocks by their first line, merged with
 * the next one when it ends in a colon.
 */
function extractName(lines: readonly BlockLine[], origin: BlockOrigin): { name: string; next: number } {
  const first = lines.findIndex((l) => l.kind !== 'blank' || /^\s*#/.test(l.raw));
  if (first === -1) return { name: '', next: lines.length };

  const line = lines[first];
  if (origin === 'markdown' && /^\s*#+(?:\s|$)/.test(line.raw)) {
    return { name: line.plain, next: first + 1 };
  }
  if (line.kind === 'tier') {
    return { name: '', next: first };
  }

  if (line.plain.endsWith(':')) {
    const second = lines.findIndex((l, i) => i > first && l.kind !== 'blank');
    if (second !== -1 && lines[second].kind === 'text') {
      return { name: `${line.plain} ${lines[second].plain}`, next: second + 1 };
    }
  }

  return { name: line.plain, next: first + 1 };
}

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

class StatCollector {
  readonly values: Partial<Pick<Adversary, 'difficulty' | 'thresholdMinor' | 'thresholdMajor' | 'hp' | 'stress'>> = {};
  pairs = 0;

  set(key: StatKey, value: string): void {
    switch (key) {
      case 'difficulty': {
        const n = leadingInt(value);
        if (n !== undefined && this.values.difficulty === undefined) {
          this.values.difficulty = n;
          this.pairs++;
        }
        break;
      }
      case 'thresholds': {
        const { minor, major } = parseThresholds(value);
        if ((minor !== undefined || major !== undefined) && this.values.thresholdMinor === undefined && this.values.thresholdMajor === undefined) {
          this.values.thresholdMinor = minor;
          this.values.thresholdMajor = major;
          this.pairs++;
        }
        break;
      }
      case 'hp': {
        const n = leadingInt(value);
        if (n !== undefined && this.values.hp === undefined) {
          this.values.hp = n;
          this.pairs++;
        }
        break;
      }
      case 'stress': {
        const n = leadingInt(value);
        if (n !== undefined && this.values.stress === undefined) {
          this.values.stress = n;
          this.pairs++;
        }
        break;
      }
    }
  }

  /** Parse the `key: value` pairs of one pipe-delimited line. */
  addLine(line: string): void {
    for (const segment of line.split('|')) {
      const match = STAT_PAIR.exec(segment);
      if (!match) continue;
      const key = match[1].toLowerCase();
      this.set(key.startsWith('threshold') ? 'thresholds' : key === 'hp' ? 'hp' : key === 'stress' ? 'stress' : 'difficulty', match[2]);
    }
  }

  /**
   * Loose search over running text for blocks that print stats without
   * pipes or colons, including the `Minor 8 Major 15` threshold form.
   */
  addFallback(text: string): void {
    const difficulty = /\bDifficulty\s*:?\s*(\d+)/i.exec(text);
    if (difficulty) this.set('difficulty', difficulty[1]);

    const thresholds = /\bThresholds?\s*:?\s*(None|\d+\s*\/\s*\d+)/i.exec(text);
    if (thresholds) {
      this.set('thresholds', thresholds[1]);
    } else {
      const minorMajor = /\bMinor\s*:?\s*(\d+)[\s\S]*?\bMajor\s*:?\s*(\d+)/i.exec(text);
      if (minorMajor) this.set('thresholds', `${minorMajor[1]}/${minorMajor[2]}`);
    }

    const hp = /\bHP\s*:?\s*(\d+)/.exec(text);
    if (hp) this.set('hp', hp[1]);

    const stress = /\bStress\s*:?\s*(\d+)/i.exec(text);
    if (stress) this.set('stress', stress[1]);
  }
}

/**
 * Split a stats line that also carries the attack or experience inline.
 */
function splitInlineFields(line: string): { stats: string; attack?: string; experience?: string } {
  const atk = INLINE_ATTACK.exec(line);
  const exp = INLINE_EXPERIENCE.exec(line);
  const cuts = [atk?.index, exp?.index].filter((i): i is number => i !== undefined);
  if (cuts.length === 0) return { stats: line };

  const sliceFrom = (match: RegExpExecArray, other: RegExpExecArray | null) =>
    line
      .slice(match.index + match[0].length, other && other.index > match.index ? other.index : undefined)
      .replace(/\|\s*$/, '')
      .trim();

  return {
    stats: line.slice(0, Math.min(...cuts)),
    attack: atk ? sliceFrom(atk, exp) : undefined,
    experience: exp ? sliceFrom(exp, atk) : undefined,
  };
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function splitFeatureSection(body: readonly BlockLine[]): { head: BlockLine[]; features: BlockLine[] } {
  const header = body.findIndex((l) => l.kind === 'features');
  if (header !== -1) {
    return { head: body.slice(0, header), features: body.slice(header + 1) };
  }
  const start = body.findIndex((l) => l.kind === 'text' && looksLikeFeatureStart(l.raw));
  if (start !== -1) {
    return { head: body.slice(0, start), features: body.slice(start) };
  }
  return { head: [...body], features: [] };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse one raw block into an adversary record.
 *
 * @throws RecordParseError when no non-empty name can be found
 */
export function parseBlock(block: RawBlock): Adversary {
  const lines = block.text.split('\n').map(toBlockLine);
  const { name: rawName, next } = extractName(lines, block.origin);
  const name = rawName.replace(/\s+/g, ' ').trim();

  if (!name) {
    const excerpt = block.text.replace(/\s+/g, ' ').trim().slice(0, EXCERPT_LENGTH);
    throw new RecordParseError('Block has no adversary name', block.index, excerpt, block.page);
  }

  const pdf = block.origin === 'pdf';
  const body = lines.slice(next);
  const { head, features } = splitFeatureSection(body);
  const record: Adversary = { name, features: [] };

  const description: string[] = [];
  const motives: string[] = [];
  const experience: string[] = [];
  const stats = new StatCollector();
  let attackText: string | undefined;
  let state: 'head' | 'description' | 'motives' | 'experience' | 'other' = 'head';

  for (let i = 0; i < head.length; i++) {
    const { plain, kind } = head[i];

    switch (kind) {
      case 'tier': {
        const tier = parseTierLine(plain);
        if (tier && record.tier === undefined) {
          record.tier = tier.tier;
          if (tier.adversaryType) record.adversaryType = tier.adversaryType;
          state = 'description';
        } else {
          state = 'other';
        }
        break;
      }
      case 'blank':
        if (state === 'motives' || state === 'experience') state = 'other';
        break;
      case 'text':
        if (state === 'description') description.push(plain);
        else if (state === 'motives') motives.push(plain);
        else if (state === 'experience') experience.push(plain);
        break;
      case 'motives':
        motives.push(afterColon(plain));
        state = 'motives';
        break;
      case 'stats': {
        const inline = splitInlineFields(plain);
        stats.addLine(inline.stats);
        if (inline.attack && attackText === undefined) attackText = inline.attack;
        if (inline.experience) experience.push(inline.experience);
        state = 'other';
        break;
      }
      case 'attack': {
        let text = afterColon(plain);
        // A trailing pipe means the attack wraps onto the next line.
        while (text.endsWith('|') && i + 1 < head.length && head[i + 1].kind !== 'blank') {
          i++;
          text = `${text} ${head[i].plain}`;
        }
        if (attackText === undefined) attackText = text;
        state = 'other';
        break;
      }
      case 'experience':
        experience.push(afterColon(plain));
        state = 'experience';
        break;
      default:
        state = 'other';
    }
  }

  if (stats.pairs === 0) {
    stats.addFallback(head.map((l) => l.plain).join(' '));
  }
  Object.assign(record, stats.values);

  const descriptionText = joinWrappedLines(description, { pdf });
  if (descriptionText) record.description = descriptionText;

  const motivesText = joinWrappedLines(motives, { pdf });
  if (motivesText) record.motivesTactics = motivesText;

  if (attackText) {
    const attack = parseAttack(attackText);
    if (!isAttackEmpty(attack)) record.attack = attack;
  }

  const experienceText = joinWrappedLines(experience, { pdf });
  if (experienceText) record.experience = experienceText;

  record.features = parseFeatures(
    features.map((l) => l.raw),
    block.origin,
  );

  for (const line of body) {
    const source = SOURCE_LINE.exec(line.plain);
    if (source) {
      record.sourceName = source[1].trim();
      if (source[2]) record.sourcePage = Number.parseInt(source[2], 10);
      break;
    }
  }

  return record;
}

/**
 * GUARDRAILS — Overround ceiling selection
 *
 * Handicap races with a large field get the stricter ceiling. A race counts
 * as a handicap when flagged upstream or when its discipline/label says so,
 * unless it is a trot or obstacle race.
 */

import type { GpiConfig } from '../gpi-config/gpi-config.types.js';
import type { RaceProfile } from '../race-snapshot/contracts/snapshot.types.js';
import type { OverroundCeiling } from './guardrails.types.js';

const HANDICAP_TOKENS = ['handicap', 'hand.', 'hcap', 'handi'];
const OBSTACLE_TOKENS = ['haies', 'steeple', 'obstacle', 'cross'];
const TROT_TOKENS = ['trot', 'attel', 'mont', 'sulky'];

export function normalizeText(value: string | undefined): string {
  if (!value) return '';
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
}

export function isHandicapRace(race: RaceProfile): boolean {
  const text = `${normalizeText(race.discipline)} ${normalizeText(race.label)}`.trim();
  const isTrot = TROT_TOKENS.some((t) => text.includes(t));
  const isObstacle = OBSTACLE_TOKENS.some((t) => text.includes(t));
  if (isTrot || isObstacle) return false;
  return race.handicap === true || HANDICAP_TOKENS.some((t) => text.includes(t));
}

export function selectOverroundCeiling(
  race: RaceProfile,
  starters: number,
  config: Pick<GpiConfig, 'overroundCeiling' | 'overroundCeilingHandicap' | 'handicapMinStarters'>
): OverroundCeiling {
  if (isHandicapRace(race) && starters >= config.handicapMinStarters) {
    return {
      ceiling: Math.min(config.overroundCeiling, config.overroundCeilingHandicap),
      reason: 'HANDICAP_LARGE_FIELD',
    };
  }
  return { ceiling: config.overroundCeiling, reason: 'DEFAULT' };
}

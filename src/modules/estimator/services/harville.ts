/**
 * ESTIMATOR — Joint finishing-order probabilities
 *
 * Harville model over normalized win probabilities: the chance that runner
 * j finishes second given i won is p_j / (1 - p_i), and so on down the
 * order.
 *
 * Closed form for COUPLE_GAGNANT, COUPLE_PLACE and TRIO; MULTI (four legs
 * in the first four, any order) is sampled with a seeded PRNG.
 */

import type { ComboBetType, MonteCarloSettings } from '../../gpi-config/gpi-config.types.js';
import { mulberry32, stableSeed } from './rng.js';

export type WinProbabilities = ReadonlyMap<string, number>;

/** Probability that the runners finish exactly in the given order at the top */
export function orderedProbability(order: string[], probs: WinProbabilities): number {
  let result = 1;
  let consumed = 0;
  for (const id of order) {
    const p = probs.get(id) ?? 0;
    const remaining = 1 - consumed;
    if (remaining <= 0) return 0;
    result *= p / remaining;
    consumed += p;
  }
  return result;
}

export function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items.slice()];
  const out: T[][] = [];
  items.forEach((item, index) => {
    const rest = [...items.slice(0, index), ...items.slice(index + 1)];
    for (const perm of permutations(rest)) out.push([item, ...perm]);
  });
  return out;
}

export function combinations<T>(items: T[], size: number): T[][] {
  if (size === 0) return [[]];
  if (items.length < size) return [];
  const [head, ...tail] = items;
  const withHead = combinations(tail, size - 1).map((combo) => [head, ...combo]);
  return [...withHead, ...combinations(tail, size)];
}

/** The given runners fill the first legs.length places in any order */
export function unorderedTopProbability(legs: string[], probs: WinProbabilities): number {
  return permutations(legs).reduce((sum, order) => sum + orderedProbability(order, probs), 0);
}

/** Both runners finish in the first three */
export function couplePlaceProbability(legs: [string, string], probs: WinProbabilities): number {
  let sum = 0;
  for (const other of probs.keys()) {
    if (other === legs[0] || other === legs[1]) continue;
    sum += unorderedTopProbability([legs[0], legs[1], other], probs);
  }
  return sum;
}

/**
 * Share of sampled finishing orders whose first legs.length places are
 * exactly the legs. Runner iteration follows the map order, so results are
 * stable for a given seed.
 */
export function simulateTopSetProbability(
  legs: string[],
  probs: WinProbabilities,
  settings: MonteCarloSettings
): number {
  const ids = [...probs.keys()];
  const weights = ids.map((id) => probs.get(id) ?? 0);
  const wanted = new Set(legs);
  const places = legs.length;
  const rng = mulberry32(stableSeed(settings.seed, [...legs].sort().join('|')));

  let hits = 0;
  for (let iter = 0; iter < settings.iterations; iter++) {
    const taken = new Array<boolean>(ids.length).fill(false);
    let remaining = weights.reduce((s, w) => s + w, 0);
    let matched = true;

    for (let place = 0; place < places; place++) {
      let target = rng() * remaining;
      let pick = -1;
      for (let i = 0; i < ids.length; i++) {
        if (taken[i] || weights[i] <= 0) continue;
        pick = i;
        target -= weights[i];
        if (target < 0) break;
      }
      if (pick < 0) {
        matched = false;
        break;
      }
      taken[pick] = true;
      remaining -= weights[pick];
      if (!wanted.has(ids[pick])) {
        matched = false;
        break;
      }
    }
    if (matched) hits++;
  }
  return hits / settings.iterations;
}

export interface HitProbability {
  probability: number;
  method: 'CLOSED_FORM' | 'MONTE_CARLO';
}

export function comboHitProbability(
  betType: ComboBetType,
  legs: string[],
  probs: WinProbabilities,
  settings: MonteCarloSettings
): HitProbability {
  switch (betType) {
    case 'COUPLE_GAGNANT':
    case 'TRIO':
      return { probability: unorderedTopProbability(legs, probs), method: 'CLOSED_FORM' };
    case 'COUPLE_PLACE':
      return { probability: couplePlaceProbability([legs[0], legs[1]], probs), method: 'CLOSED_FORM' };
    case 'MULTI':
      return { probability: simulateTopSetProbability(legs, probs, settings), method: 'MONTE_CARLO' };
  }
}

/**
 * ESTIMATOR — EV / ROI
 *
 * SP:    ev  = p·(o − 1) − (1 − p)      o = market odds, p = calibrated
 *        roi = p·d − 1                  d = calibrated dividend
 * COMBO: ev  = p·D_market − 1, roi = p·D_calibrated − 1, with p from the
 *        Harville model over win probabilities renormalized on the field.
 *
 * Fails closed: any missing or unusable input yields -Infinity ratios and a
 * `failure`, never a substituted default.
 */

import type { ComboBetType, GpiConfig, SpBetType } from '../../gpi-config/gpi-config.types.js';
import type { RaceSnapshot, Runner } from '../../race-snapshot/contracts/snapshot.types.js';
import {
  activeRunners,
  findRunner,
  isUsableOdds,
  spMarketOdds,
} from '../../race-snapshot/services/market.service.js';
import {
  COMBO_LEGS,
  type BetSelection,
  type Estimate,
  type Estimator,
  type PayoutModel,
} from '../estimator.types.js';
import { combinations, comboHitProbability, type WinProbabilities } from './harville.js';

export function isValidProbability(p: number | undefined): p is number {
  return p !== undefined && Number.isFinite(p) && p > 0 && p < 1;
}

export function failClosed(selection: BetSelection, detail: string): Estimate {
  return {
    kind: selection.kind,
    betType: selection.betType,
    evRatio: Number.NEGATIVE_INFINITY,
    roiRatio: Number.NEGATIVE_INFINITY,
    expectedPayout: 0,
    involvedRunners: [...selection.runnerIds].sort(),
    hitProbability: 0,
    marketOdds: 0,
    payoutOdds: 0,
    method: selection.kind === 'SP' ? 'DIRECT' : 'CLOSED_FORM',
    failure: { code: 'ESTIMATION_FAILURE', detail },
  };
}

function resolveLegs(snapshot: RaceSnapshot, runnerIds: string[]): Runner[] | string {
  const legs: Runner[] = [];
  for (const id of runnerIds) {
    const runner = findRunner(snapshot, id);
    if (!runner) return `unknown runner ${id}`;
    if (runner.scratched) return `runner ${id} is scratched`;
    legs.push(runner);
  }
  return legs;
}

export function estimateSp(
  snapshot: RaceSnapshot,
  runnerId: string,
  betType: SpBetType,
  model: PayoutModel
): Estimate {
  const selection: BetSelection = { kind: 'SP', betType, runnerIds: [runnerId] };
  const legs = resolveLegs(snapshot, [runnerId]);
  if (typeof legs === 'string') return failClosed(selection, legs);
  const [runner] = legs;

  const odds = spMarketOdds(runner, betType);
  if (!isUsableOdds(odds)) return failClosed(selection, `runner ${runnerId} has no usable ${betType} odds`);

  const p = model.probability(runnerId, betType === 'SIMPLE_PLACE' ? 'PLACE' : 'WIN');
  if (!isValidProbability(p)) return failClosed(selection, `runner ${runnerId} has no calibrated probability`);

  const quote = model.dividend(betType, [runner]);
  if (!quote || !isUsableOdds(quote.calibrated)) {
    return failClosed(selection, `no calibrated dividend for ${betType} on ${runnerId}`);
  }

  return {
    kind: 'SP',
    betType,
    evRatio: p * (odds - 1) - (1 - p),
    roiRatio: p * quote.calibrated - 1,
    expectedPayout: quote.calibrated,
    involvedRunners: [runnerId],
    hitProbability: p,
    marketOdds: odds,
    payoutOdds: quote.calibrated,
    method: 'DIRECT',
  };
}

/**
 * Calibrated win probabilities renormalized over non-scratched runners.
 * Undefined when any active runner lacks one: the joint model would be
 * built on a partial field.
 */
export function fieldWinProbabilities(snapshot: RaceSnapshot, model: PayoutModel): WinProbabilities | undefined {
  const raw: Array<[string, number]> = [];
  for (const runner of activeRunners(snapshot)) {
    const p = model.probability(runner.id, 'WIN');
    if (!isValidProbability(p)) return undefined;
    raw.push([runner.id, p]);
  }
  const total = raw.reduce((s, [, p]) => s + p, 0);
  if (total <= 0) return undefined;
  return new Map(raw.map(([id, p]) => [id, p / total]));
}

export function estimateCombo(
  snapshot: RaceSnapshot,
  runnerIds: string[],
  betType: ComboBetType,
  model: PayoutModel,
  config: GpiConfig
): Estimate {
  const selection: BetSelection = { kind: 'COMBO', betType, runnerIds };
  const expectedLegs = COMBO_LEGS[betType];
  if (runnerIds.length !== expectedLegs || new Set(runnerIds).size !== expectedLegs) {
    return failClosed(selection, `${betType} needs ${expectedLegs} distinct runners`);
  }

  const legs = resolveLegs(snapshot, runnerIds);
  if (typeof legs === 'string') return failClosed(selection, legs);

  const probs = fieldWinProbabilities(snapshot, model);
  if (!probs) return failClosed(selection, 'calibrated win probabilities incomplete for the field');

  const quote = model.dividend(betType, legs);
  if (!quote || !isUsableOdds(quote.market) || !isUsableOdds(quote.calibrated)) {
    return failClosed(selection, `no dividend quote for ${betType} ${runnerIds.join('-')}`);
  }

  const sorted = [...runnerIds].sort();
  const hit = comboHitProbability(betType, sorted, probs, config.monteCarlo);

  return {
    kind: 'COMBO',
    betType,
    evRatio: hit.probability * quote.market - 1,
    roiRatio: hit.probability * quote.calibrated - 1,
    expectedPayout: quote.calibrated,
    involvedRunners: sorted,
    hitProbability: hit.probability,
    marketOdds: quote.market,
    payoutOdds: quote.calibrated,
    method: hit.method,
  };
}

export function estimate(
  snapshot: RaceSnapshot,
  selection: BetSelection,
  model: PayoutModel,
  config: GpiConfig
): Estimate {
  switch (selection.kind) {
    case 'SP':
      return estimateSp(snapshot, selection.runnerIds[0], selection.betType, model);
    case 'COMBO':
      return estimateCombo(snapshot, selection.runnerIds, selection.betType, model, config);
  }
}

export const defaultEstimator: Estimator = { estimate };

// ═══════════════════════════════════════════════════════════════
// CANDIDATES & SELECTION
// ═══════════════════════════════════════════════════════════════

export function estimateKey(e: Pick<Estimate, 'betType' | 'involvedRunners'>): string {
  return `${e.betType}:${e.involvedRunners.join('-')}`;
}

function compareDesc(a: number, b: number): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}

/** Highest evRatio first, then highest expectedPayout, then key */
export function compareEstimates(a: Estimate, b: Estimate): number {
  return (
    compareDesc(a.evRatio, b.evRatio) ||
    compareDesc(a.expectedPayout, b.expectedPayout) ||
    (estimateKey(a) < estimateKey(b) ? -1 : estimateKey(a) > estimateKey(b) ? 1 : 0)
  );
}

export function rankEstimates(estimates: Estimate[]): Estimate[] {
  return [...estimates].sort(compareEstimates);
}

export function spSelections(snapshot: RaceSnapshot, config: GpiConfig): BetSelection[] {
  return activeRunners(snapshot).map((runner): BetSelection => ({
    kind: 'SP',
    betType: config.spBetType,
    runnerIds: [runner.id],
  }));
}

/**
 * Baskets drawn from the `comboPoolSize` runners with the highest
 * calibrated win probability (snapshot order breaks ties).
 */
export function comboSelections(snapshot: RaceSnapshot, model: PayoutModel, config: GpiConfig): BetSelection[] {
  const pool = activeRunners(snapshot)
    .map((runner, index) => ({ runner, index, p: model.probability(runner.id, 'WIN') }))
    .filter((entry): entry is { runner: Runner; index: number; p: number } => isValidProbability(entry.p))
    .sort((a, b) => compareDesc(a.p, b.p) || a.index - b.index)
    .slice(0, config.comboPoolSize)
    .map((entry) => entry.runner.id);

  const selections: BetSelection[] = [];
  for (const betType of config.comboBetTypes) {
    for (const legs of combinations(pool, COMBO_LEGS[betType])) {
      selections.push({ kind: 'COMBO', betType, runnerIds: legs });
    }
  }
  return selections;
}

/** Top five runners by calibrated win probability */
export function topRunners(
  snapshot: RaceSnapshot,
  model: PayoutModel,
  limit = 5
): Array<{ rank: number; runnerId: string; winProbability: number }> {
  return activeRunners(snapshot)
    .map((runner, index) => ({ runner, index, p: model.probability(runner.id, 'WIN') }))
    .filter((entry): entry is { runner: Runner; index: number; p: number } => isValidProbability(entry.p))
    .sort((a, b) => compareDesc(a.p, b.p) || a.index - b.index)
    .slice(0, limit)
    .map((entry, i) => ({ rank: i + 1, runnerId: entry.runner.id, winProbability: entry.p }));
}

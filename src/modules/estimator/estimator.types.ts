/**
 * ESTIMATOR — Types
 */

import type { BetType, ComboBetType, GpiConfig, SpBetType } from '../gpi-config/gpi-config.types.js';
import type { RaceSnapshot, Runner } from '../race-snapshot/contracts/snapshot.types.js';

export type EstimateKind = 'SP' | 'COMBO';
export type EstimateMethod = 'DIRECT' | 'CLOSED_FORM' | 'MONTE_CARLO';
export type ProbabilityMarket = 'WIN' | 'PLACE';

export const COMBO_LEGS: Record<ComboBetType, number> = {
  COUPLE_GAGNANT: 2,
  COUPLE_PLACE: 2,
  TRIO: 3,
  MULTI: 4,
};

export interface EstimationFailure {
  code: 'ESTIMATION_FAILURE';
  detail: string;
}

export interface Estimate {
  kind: EstimateKind;
  betType: BetType;
  /** Expected net value per unit staked, priced on market odds */
  evRatio: number;
  /** Expected net return per unit staked, priced on the calibrated dividend */
  roiRatio: number;
  /** Calibrated gross payout for one currency unit staked, if the ticket wins */
  expectedPayout: number;
  /** Sorted runner ids */
  involvedRunners: string[];
  hitProbability: number;
  /** Market-priced gross return per unit */
  marketOdds: number;
  /** Calibrated gross return per unit, used for Kelly sizing */
  payoutOdds: number;
  method: EstimateMethod;
  failure?: EstimationFailure;
}

/** A candidate ticket shape before it is priced */
export type BetSelection =
  | { kind: 'SP'; betType: SpBetType; runnerIds: [string] }
  | { kind: 'COMBO'; betType: ComboBetType; runnerIds: string[] };

export interface DividendQuote {
  market: number;
  calibrated: number;
}

/**
 * Calibrated probabilities and payout expectations for one race.
 * Produced outside this service; `calibratedAt` feeds the freshness gate.
 */
export interface PayoutModel {
  readonly calibratedAt: number;
  readonly signature: string;
  probability(runnerId: string, market: ProbabilityMarket): number | undefined;
  dividend(betType: BetType, legs: Runner[]): DividendQuote | undefined;
}

export interface Estimator {
  estimate(snapshot: RaceSnapshot, selection: BetSelection, model: PayoutModel, config: GpiConfig): Estimate;
}

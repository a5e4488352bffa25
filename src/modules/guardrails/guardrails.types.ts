/**
 * GUARDRAILS — Types
 *
 * Fail-closed gates applied before any stake is committed. A rejection is a
 * normal outcome carried by a verdict, never an exception.
 */

import type { EstimateKind } from '../estimator/estimator.types.js';

export type GuardrailStage = 'MARKET' | 'ESTIMATES' | 'GLOBAL';

export type ReasonCode =
  | 'STALE_INPUT'           // input older than freshnessMaxAgeSeconds, or missing
  | 'UNPRICED_RUNNER'       // active runner without usable win odds
  | 'OVERROUND_TOO_HIGH'    // book sum above the race-type ceiling
  | 'ESTIMATION_FAILURE'    // estimate failed closed
  | 'SP_EV_TOO_LOW'
  | 'SP_ROI_TOO_LOW'
  | 'SP_PRICE_TOO_SHORT'    // implied probability above spMaxImpliedProbability
  | 'COMBO_EV_TOO_LOW'
  | 'COMBO_ROI_TOO_LOW'
  | 'COMBO_PAYOUT_TOO_LOW'
  | 'GLOBAL_EV_TOO_LOW';

export interface GuardrailReason {
  code: ReasonCode;
  message: string;
  leg?: EstimateKind;
}

export interface GuardrailVerdict {
  stage: GuardrailStage;
  passed: boolean;
  /** Empty iff passed */
  reasons: readonly GuardrailReason[];
}

export type FreshnessField = 'odds' | 'runners' | 'scratches' | 'calibration';

export interface MarketContext {
  /** Reference time of the invocation (epoch ms) */
  asOf: number;
  /** Calibration curve timestamp; mandatory when requireCalibration */
  calibratedAt?: number;
  requireCalibration: boolean;
}

export type OverroundCeilingReason = 'DEFAULT' | 'HANDICAP_LARGE_FIELD';

export interface OverroundCeiling {
  ceiling: number;
  reason: OverroundCeilingReason;
}

/** Stake-weighted inputs of the global gate */
export interface GlobalGateItem {
  kind: EstimateKind;
  evRatio: number;
  stake?: number;
}

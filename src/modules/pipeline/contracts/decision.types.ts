/**
 * PIPELINE — Decision contracts
 *
 * A Decision is a tagged union on `abstain`. It carries no wall-clock
 * value: two invocations over identical inputs serialize to identical bytes.
 */

import type { Estimate } from '../../estimator/estimator.types.js';
import type { GuardrailVerdict } from '../../guardrails/guardrails.types.js';
import type { DriftEntry, RaceSnapshot } from '../../race-snapshot/contracts/snapshot.types.js';
import type { DroppedLeg, Ticket } from '../../staking/staking.types.js';
import type { ReconciliationReport } from '../../tracking/tracking.types.js';
import type { Phase } from './phase.js';

export type AbstainCode =
  | 'DATA_UNAVAILABLE'       // snapshot or calibration could not be obtained
  | 'ENRICHMENT_MISSING'     // jockey/trainer or chrono absent at H5
  | 'MARKET_REJECTED'        // freshness or overround gate failed
  | 'NO_FRESH_DATA'          // a stricter earlier decision stands
  | 'NO_QUALIFYING_LEG'      // no SP nor combo candidate passed its thresholds
  | 'STAKE_BELOW_INCREMENT'  // every qualifying leg sized to zero
  | 'GLOBAL_EV_REJECTED'     // stake-weighted EV under evMinGlobal
  | 'PRELIMINARY'            // H30 never plays
  | 'RESULT_PHASE';          // RESULT never plays

export type DecisionCode = AbstainCode | 'PLAY';

export interface PhaseRequest {
  raceId: string;
  /** Validated on entry; unknown values raise UnknownPhaseError */
  phase: string;
  /** Reference time for freshness checks (epoch ms) */
  asOf: number;
}

interface DecisionBase {
  policyVersion: string;
  phase: Phase;
  meetingId: string | null;
  raceId: string;
  message: string;
  reasons: string[];
  evGlobalEstimate: number | null;
  roiGlobalEstimate: number | null;
  totalStake: number;
  snapshotCapturedAt: number | null;
  calibratedAt: number | null;
  enrichmentCapturedAt: number | null;
  inputsFingerprint: string;
}

export interface PlayDecision extends DecisionBase {
  abstain: false;
  reasonCode: 'PLAY';
  tickets: Ticket[];
}

export interface AbstainDecision extends DecisionBase {
  abstain: true;
  reasonCode: AbstainCode;
  /** Always empty */
  tickets: never[];
}

export type Decision = PlayDecision | AbstainDecision;

export interface RankedRunner {
  rank: number;
  runnerId: string;
  winProbability: number;
}

/** Everything the sink needs to audit a decision */
export interface DecisionTrail {
  verdicts: GuardrailVerdict[];
  estimates: Estimate[];
  dropped: DroppedLeg[];
  drift: DriftEntry[];
  top5: RankedRunner[];
  overround: number | null;
  snapshot: RaceSnapshot | null;
  reconciliation?: ReconciliationReport;
}

export interface DecisionArtifact {
  decision: Decision;
  trail: DecisionTrail;
}

export interface TicketView {
  id: string;
  kind: Ticket['kind'];
  betType: Ticket['betType'];
  stake: number;
  runners: string[];
  evRatio: number;
  roiRatio: number;
  expectedPayout: number;
}

/** Presentation copy of a decision, ratios rounded to two decimals */
export interface DecisionView {
  policyVersion: string;
  phase: Phase;
  meetingId: string | null;
  raceId: string;
  abstain: boolean;
  reasonCode: DecisionCode;
  message: string;
  reasons: string[];
  evGlobalEstimate: number | null;
  roiGlobalEstimate: number | null;
  totalStake: number;
  inputsFingerprint: string;
  tickets: TicketView[];
}

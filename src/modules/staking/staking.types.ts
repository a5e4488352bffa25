/**
 * STAKING — Types
 */

import type { BetType } from '../gpi-config/gpi-config.types.js';
import type { Estimate, EstimateKind } from '../estimator/estimator.types.js';

export interface AllocationPolicy {
  budget: number;
  kellyFraction: number;
  exposureCapFraction: number;
  minStakeIncrement: number;
  maxTickets: number;
  /** Namespace for deterministic ticket ids, e.g. "R1C3:H5" */
  scope: string;
}

export type DropReason =
  | 'ESTIMATION_FAILURE'  // candidate failed closed upstream
  | 'DUPLICATE_KIND'      // a better candidate of the same kind was kept
  | 'TICKET_CAP'          // maxTickets reached, SP has priority
  | 'ZERO_KELLY'          // no positive edge at the payout odds
  | 'EXPOSURE_CAP'        // per-runner cap left less than one increment
  | 'BELOW_INCREMENT';    // stake rounds down to zero

export interface DroppedLeg {
  kind: EstimateKind;
  betType: BetType;
  runners: string[];
  reason: DropReason;
  note: string;
}

export interface Ticket {
  id: string;
  kind: EstimateKind;
  betType: BetType;
  stake: number;
  runners: string[];
  estimate: Estimate;
}

export interface AllocationResult {
  tickets: Ticket[];
  dropped: DroppedLeg[];
}

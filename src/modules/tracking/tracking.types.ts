/**
 * TRACKING — Ports
 *
 * Everything the pipeline reads or writes goes through these interfaces.
 * MongoDB and in-memory adapters implement them.
 */

import type { BetType } from '../gpi-config/gpi-config.types.js';
import type { EstimateKind, PayoutModel } from '../estimator/estimator.types.js';
import type { RaceSnapshot, SnapshotPhase } from '../race-snapshot/contracts/snapshot.types.js';
import type { DecisionArtifact, DecisionCode } from '../pipeline/contracts/decision.types.js';
import type { Phase } from '../pipeline/contracts/phase.js';

// ═══════════════════════════════════════════════════════════════
// INPUTS
// ═══════════════════════════════════════════════════════════════

export interface JockeyTrainerStats {
  capturedAt: number;
  runners: Record<string, { jockeyWinRate?: number; trainerWinRate?: number }>;
}

export interface ChronoStats {
  capturedAt: number;
  runners: Record<string, { lastTimes?: number[]; bestTime?: number }>;
}

export interface RaceEnrichment {
  raceId: string;
  capturedAt: number;
  jockeyTrainer?: JockeyTrainerStats;
  chrono?: ChronoStats;
}

export interface OfficialResult {
  raceId: string;
  /** Runner ids in finishing order */
  arrival: string[];
  /** Official dividend per one unit staked, by bet type */
  dividends: Partial<Record<BetType, number>>;
  /** SIMPLE_PLACE dividends per placed runner, when published individually */
  placeDividends?: Record<string, number>;
  /** Runners that started; decides two or three places paid */
  starters?: number;
  publishedAt: number;
}

/** Throws DataUnavailableError when the snapshot is missing or unusable */
export interface SnapshotSource {
  fetch(raceId: string, phase: SnapshotPhase): Promise<RaceSnapshot>;
}

export interface EnrichmentSource {
  fetch(raceId: string): Promise<RaceEnrichment | undefined>;
}

/** Throws DataUnavailableError when no calibration exists for the race */
export interface CalibrationSource {
  load(raceId: string): Promise<PayoutModel>;
}

/** Throws DataUnavailableError when results are not published */
export interface ResultsSource {
  fetch(raceId: string): Promise<OfficialResult>;
}

// ═══════════════════════════════════════════════════════════════
// OUTPUTS
// ═══════════════════════════════════════════════════════════════

export type ReconciliationStatus = 'RECONCILED' | 'INCOMPLETE' | 'NO_TICKETS' | 'FAILED';

export interface ReconciledTicket {
  id: string;
  betType: BetType;
  runners: string[];
  stake: number;
  won: boolean;
  dividend: number | null;
  return: number;
}

export interface ReconciliationReport {
  raceId: string;
  status: ReconciliationStatus;
  message: string;
  tickets: ReconciledTicket[];
  totalStake: number;
  totalReturn: number;
  profit: number;
  roi: number | null;
}

export interface TicketSummary {
  id: string;
  kind: EstimateKind;
  betType: BetType;
  stake: number;
  runners: string[];
}

/** What later phases need to know about an emitted decision */
export interface ArtifactRecord {
  raceId: string;
  meetingId: string | null;
  phase: Phase;
  abstain: boolean;
  reasonCode: DecisionCode;
  message: string;
  inputsFingerprint: string;
  /** sha256 of the decision; with the fingerprint it keys the stored artifact */
  decisionDigest: string;
  snapshotCapturedAt: number | null;
  calibratedAt: number | null;
  enrichmentCapturedAt: number | null;
  /** Outcome of the MARKET stage, null when it did not run */
  marketPassed: boolean | null;
  starters: number | null;
  totalStake: number;
  tickets: TicketSummary[];
}

export interface ArtifactSink {
  emit(artifact: DecisionArtifact): Promise<void>;
  recordReconciliation(report: ReconciliationReport): Promise<void>;
}

export interface DecisionHistory {
  latest(raceId: string, phase: Phase): Promise<ArtifactRecord | undefined>;
  /** Latest record of the phase that carries tickets */
  latestTicketed(raceId: string, phase: Phase): Promise<ArtifactRecord | undefined>;
  list(raceId: string, options?: { phase?: Phase; limit?: number }): Promise<ArtifactRecord[]>;
}

export interface PipelinePorts {
  snapshots: SnapshotSource;
  enrichment: EnrichmentSource;
  calibration: CalibrationSource;
  results: ResultsSource;
  sink: ArtifactSink;
  history: DecisionHistory;
}

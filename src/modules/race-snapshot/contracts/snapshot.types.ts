/**
 * RACE SNAPSHOT — Types
 *
 * Normalized market state of one race at a checkpoint. Supplied by the
 * acquisition side and treated as read-only here.
 */

export type SnapshotPhase = 'H30' | 'H5';

export interface Runner {
  id: string;
  number: number;
  name: string;
  winOdds: number;
  placeOdds?: number;
  scratched: boolean;
}

/** Race-type facts used to pick the overround ceiling */
export interface RaceProfile {
  discipline?: string;
  label?: string;
  handicap?: boolean;
}

/** Capture time (epoch ms) of each mandatory input */
export interface InputTimestamps {
  odds: number;
  runners: number;
  scratches: number;
}

export interface RaceSnapshot {
  meetingId: string;
  raceId: string;
  phase: SnapshotPhase;
  capturedAt: number;
  race: RaceProfile;
  inputs: InputTimestamps;
  runners: Runner[];
  /** Σ 1/winOdds over non-scratched runners, always recomputed */
  overround: number;
  /** Non-scratched runners without usable win odds */
  unpricedRunners: string[];
}

/** Shape accepted from upstream; any overround it carries is discarded */
export type RawRaceSnapshot = Omit<RaceSnapshot, 'overround' | 'unpricedRunners'> & {
  overround?: number;
};

export type DriftStatus = 'STEAM' | 'DRIFT' | 'STABLE';

export interface DriftEntry {
  runnerId: string;
  odds30: number;
  odds5: number;
  driftPercent: number;
  status: DriftStatus;
}

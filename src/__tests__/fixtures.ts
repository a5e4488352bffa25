/**
 * Shared test fixtures
 *
 * Six-runner flat race "R1C1". With the default odds the book sums to 1.10
 * and runner B is the only SP candidate with an edge:
 *   place odds 3.0, calibrated place probability 0.5 → ev 0.50
 */

import type { GpiConfig } from '../modules/gpi-config/gpi-config.types.js';
import { parseGpiConfig, readPreset } from '../modules/gpi-config/gpi-config.loader.js';
import type { Estimate, Estimator } from '../modules/estimator/estimator.types.js';
import { defaultEstimator } from '../modules/estimator/services/estimator.service.js';
import {
  CalibratedPayoutModel,
  loadPayoutCalibration,
  type PayoutCalibration,
  type RunnerProbabilities,
} from '../modules/estimator/services/payout.model.js';
import type {
  RaceProfile,
  RaceSnapshot,
  RawRaceSnapshot,
  Runner,
  SnapshotPhase,
} from '../modules/race-snapshot/contracts/snapshot.types.js';
import { normalizeSnapshot } from '../modules/race-snapshot/services/market.service.js';
import type { RaceEnrichment } from '../modules/tracking/tracking.types.js';

export const T0 = Date.UTC(2025, 5, 1, 13, 0, 0);
export const RACE_ID = 'R1C1';
export const MEETING_ID = 'R1';

export function testConfig(overrides: Partial<GpiConfig> = {}): GpiConfig {
  return parseGpiConfig({ ...readPreset(), ...overrides });
}

/** Shipped dividend calibration */
export const SHIPPED_CALIBRATION: PayoutCalibration = loadPayoutCalibration();

/** SIMPLE_PLACE realizes 5/6 of the market price, so runner B has roi 0.25 */
export const SCENARIO_CALIBRATION: PayoutCalibration = {
  version: 'test',
  betTypes: {
    ...SHIPPED_CALIBRATION.betTypes,
    SIMPLE_PLACE: { marketFactor: 1, realizationRatio: 5 / 6 },
  },
};

export function runner(id: string, number: number, winOdds: number, placeOdds?: number, scratched = false): Runner {
  return { id, number, name: `Horse ${id}`, winOdds, placeOdds, scratched };
}

/** Σ 1/winOdds = 0.4 + 0.25 + 0.2 + 0.1 + 0.05 + 0.1 = 1.10 */
export function baseRunners(): Runner[] {
  return [
    runner('A', 1, 2.5, 1.3),
    runner('B', 2, 4, 3.0),
    runner('C', 3, 5, 2.0),
    runner('D', 4, 10, 3.5),
    runner('E', 5, 20, 6),
    runner('F', 6, 10, 3.5),
  ];
}

/** Σ 1/winOdds = 0.5 + 0.25 + 0.2 + 0.2 + 0.1 + 0.1 = 1.35 */
export function highOverroundRunners(): Runner[] {
  return [
    runner('A', 1, 2, 1.3),
    runner('B', 2, 4, 3.0),
    runner('C', 3, 5, 2.0),
    runner('D', 4, 5, 3.5),
    runner('E', 5, 10, 6),
    runner('F', 6, 10, 3.5),
  ];
}

/** Σ 1/winOdds = 0.5 + 0.25 + 0.2 + 0.1 + 0.1 + 0.16 = 1.31 */
export function borderlineOverroundRunners(): Runner[] {
  return [
    runner('A', 1, 2, 1.3),
    runner('B', 2, 4, 3.0),
    runner('C', 3, 5, 2.0),
    runner('D', 4, 10, 3.5),
    runner('E', 5, 10, 6),
    runner('F', 6, 6.25, 3.5),
  ];
}

export interface SnapshotOptions {
  phase?: SnapshotPhase;
  capturedAt?: number;
  runners?: Runner[];
  race?: RaceProfile;
  inputs?: Partial<RawRaceSnapshot['inputs']>;
}

export function rawSnapshot(options: SnapshotOptions = {}): RawRaceSnapshot {
  const capturedAt = options.capturedAt ?? T0 - 60_000;
  return {
    meetingId: MEETING_ID,
    raceId: RACE_ID,
    phase: options.phase ?? 'H5',
    capturedAt,
    race: options.race ?? { discipline: 'Plat', label: 'Prix de Test' },
    inputs: { odds: capturedAt, runners: capturedAt, scratches: capturedAt, ...options.inputs },
    runners: options.runners ?? baseRunners(),
  };
}

export function makeSnapshot(options: SnapshotOptions = {}): RaceSnapshot {
  return normalizeSnapshot(rawSnapshot(options));
}

/** Win probabilities sum to 1; place probabilities give B the only SP edge */
export const RUNNER_PROBABILITIES: Record<string, RunnerProbabilities> = {
  A: { win: 0.35, place: 0.7 },
  B: { win: 0.25, place: 0.5 },
  C: { win: 0.18, place: 0.45 },
  D: { win: 0.1, place: 0.2 },
  E: { win: 0.04, place: 0.1 },
  F: { win: 0.08, place: 0.2 },
};

export function makeModel(
  options: {
    runners?: Record<string, RunnerProbabilities>;
    calibratedAt?: number;
    calibration?: PayoutCalibration;
  } = {}
): CalibratedPayoutModel {
  return new CalibratedPayoutModel(
    {
      raceId: RACE_ID,
      calibratedAt: options.calibratedAt ?? T0 - 120_000,
      runners: options.runners ?? RUNNER_PROBABILITIES,
    },
    options.calibration ?? SCENARIO_CALIBRATION
  );
}

export function makeEnrichment(overrides: Partial<RaceEnrichment> = {}): RaceEnrichment {
  return {
    raceId: RACE_ID,
    capturedAt: T0 - 300_000,
    jockeyTrainer: { capturedAt: T0 - 300_000, runners: { B: { jockeyWinRate: 0.18, trainerWinRate: 0.12 } } },
    chrono: { capturedAt: T0 - 300_000, runners: { B: { lastTimes: [72.4, 71.9], bestTime: 71.9 } } },
    ...overrides,
  };
}

export function makeEstimate(overrides: Partial<Estimate> = {}): Estimate {
  return {
    kind: 'SP',
    betType: 'SIMPLE_PLACE',
    evRatio: 0.5,
    roiRatio: 0.25,
    expectedPayout: 2.5,
    involvedRunners: ['B'],
    hitProbability: 0.5,
    marketOdds: 3,
    payoutOdds: 2.5,
    method: 'DIRECT',
    ...overrides,
  };
}

/**
 * Real SP estimates; every combo basket gets the same fixed figures.
 */
export function fixedComboEstimator(combo: Partial<Estimate>): Estimator {
  return {
    estimate: (snapshot, selection, model, config) => {
      if (selection.kind === 'SP') return defaultEstimator.estimate(snapshot, selection, model, config);
      return makeEstimate({
        kind: 'COMBO',
        betType: selection.betType,
        involvedRunners: [...selection.runnerIds].sort(),
        method: 'CLOSED_FORM',
        ...combo,
      });
    },
  };
}

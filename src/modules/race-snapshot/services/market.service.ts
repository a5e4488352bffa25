/**
 * RACE SNAPSHOT — Market computations
 *
 * Normalization, overround and H30 → H5 drift. Pure functions.
 */

import { DataUnavailableError } from '../../../common/errors.js';
import { deepFreeze } from '../../../common/hash.js';
import type { SpBetType } from '../../gpi-config/gpi-config.types.js';
import type {
  DriftEntry,
  DriftStatus,
  RaceSnapshot,
  RawRaceSnapshot,
  Runner,
} from '../contracts/snapshot.types.js';

export function isUsableOdds(odds: number | undefined): odds is number {
  return odds !== undefined && Number.isFinite(odds) && odds > 1;
}

export function activeRunners(snapshot: Pick<RaceSnapshot, 'runners'>): Runner[] {
  return snapshot.runners.filter((r) => !r.scratched);
}

export function computeOverround(runners: Runner[]): number {
  let sum = 0;
  for (const runner of runners) {
    if (runner.scratched || !isUsableOdds(runner.winOdds)) continue;
    sum += 1 / runner.winOdds;
  }
  return sum;
}

/**
 * Validate identity invariants and recompute derived fields.
 * Duplicate ids or an empty field make the snapshot unusable.
 */
export function normalizeSnapshot(raw: RawRaceSnapshot): RaceSnapshot {
  const seen = new Set<string>();
  for (const runner of raw.runners) {
    if (seen.has(runner.id)) {
      throw new DataUnavailableError(`Duplicate runner id ${runner.id} in ${raw.raceId}`, {
        raceId: raw.raceId,
        runnerId: runner.id,
      });
    }
    seen.add(runner.id);
  }

  const runners = raw.runners.map((r) => ({ ...r }));
  if (activeRunners({ runners }).length === 0) {
    throw new DataUnavailableError(`No active runners in ${raw.raceId}`, { raceId: raw.raceId });
  }

  return deepFreeze({
    meetingId: raw.meetingId,
    raceId: raw.raceId,
    phase: raw.phase,
    capturedAt: raw.capturedAt,
    race: { ...raw.race },
    inputs: { ...raw.inputs },
    runners,
    overround: computeOverround(runners),
    unpricedRunners: runners.filter((r) => !r.scratched && !isUsableOdds(r.winOdds)).map((r) => r.id),
  });
}

export function findRunner(snapshot: RaceSnapshot, runnerId: string): Runner | undefined {
  return snapshot.runners.find((r) => r.id === runnerId);
}

/** Odds of the market an SP ticket is placed on */
export function spMarketOdds(runner: Runner, betType: SpBetType): number | undefined {
  return betType === 'SIMPLE_PLACE' ? runner.placeOdds : runner.winOdds;
}

export function classifyDrift(driftRatio: number, threshold: number): DriftStatus {
  if (driftRatio > threshold) return 'DRIFT';
  if (driftRatio < -threshold) return 'STEAM';
  return 'STABLE';
}

/**
 * Per-runner odds movement between the H30 and H5 snapshots.
 * Runners missing usable odds at either checkpoint are skipped.
 */
export function computeDrift(
  h30: RaceSnapshot,
  h5: RaceSnapshot,
  betType: SpBetType,
  threshold: number
): DriftEntry[] {
  const earlier = new Map(h30.runners.map((r) => [r.id, spMarketOdds(r, betType)]));
  const entries: DriftEntry[] = [];

  for (const runner of activeRunners(h5)) {
    const odds5 = spMarketOdds(runner, betType);
    const odds30 = earlier.get(runner.id);
    if (!isUsableOdds(odds5) || !isUsableOdds(odds30)) continue;

    const ratio = (odds5 - odds30) / odds30;
    entries.push({
      runnerId: runner.id,
      odds30,
      odds5,
      driftPercent: ratio * 100,
      status: classifyDrift(ratio, threshold),
    });
  }
  return entries;
}

/**
 * ESTIMATOR — Calibrated payout model
 *
 * Built from the calibrated per-runner probabilities of one race and the
 * shipped dividend calibration (config/payout_calibration.json):
 *   market dividend     = Π leg odds × marketFactor
 *   calibrated dividend = market dividend × realizationRatio
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigInvalidError, errorMessage } from '../../../common/errors.js';
import { sha256 } from '../../../common/hash.js';
import { BET_TYPES, type BetType } from '../../gpi-config/gpi-config.types.js';
import type { Runner } from '../../race-snapshot/contracts/snapshot.types.js';
import { isUsableOdds } from '../../race-snapshot/services/market.service.js';
import type { DividendQuote, PayoutModel, ProbabilityMarket } from '../estimator.types.js';

export const DEFAULT_CALIBRATION_PATH = fileURLToPath(
  new URL('../../../../config/payout_calibration.json', import.meta.url)
);

export interface DividendFactors {
  marketFactor: number;
  realizationRatio: number;
}

export interface PayoutCalibration {
  version: string;
  betTypes: Partial<Record<BetType, DividendFactors>>;
}

export interface RunnerProbabilities {
  win: number;
  place?: number;
}

export interface RaceCalibration {
  raceId: string;
  calibratedAt: number;
  runners: Record<string, RunnerProbabilities>;
}

const factorsSchema = z.object({
  marketFactor: z.number().finite().positive(),
  realizationRatio: z.number().finite().positive(),
});

export const payoutCalibrationSchema: z.ZodType<PayoutCalibration> = z.object({
  version: z.string().min(1),
  betTypes: z.record(z.enum(BET_TYPES), factorsSchema),
});

export const raceCalibrationSchema: z.ZodType<RaceCalibration> = z.object({
  raceId: z.string().min(1),
  calibratedAt: z.number().int().nonnegative(),
  runners: z.record(
    z.string(),
    z.object({
      win: z.number(),
      place: z.number().optional(),
    })
  ),
});

export function loadPayoutCalibration(filePath: string = DEFAULT_CALIBRATION_PATH): PayoutCalibration {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigInvalidError([`payout calibration ${filePath}: ${errorMessage(err)}`]);
  }
  const parsed = payoutCalibrationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigInvalidError(
      parsed.error.issues.map((i) => `payout calibration ${i.path.join('.')}: ${i.message}`)
    );
  }
  return parsed.data;
}

/** Which odds each bet type multiplies */
function legOdds(betType: BetType, runner: Runner): number | undefined {
  switch (betType) {
    case 'SIMPLE_GAGNANT':
    case 'COUPLE_GAGNANT':
      return runner.winOdds;
    case 'SIMPLE_PLACE':
    case 'COUPLE_PLACE':
    case 'TRIO':
    case 'MULTI':
      return runner.placeOdds;
  }
}

export class CalibratedPayoutModel implements PayoutModel {
  readonly calibratedAt: number;
  readonly signature: string;

  constructor(
    private readonly race: RaceCalibration,
    private readonly calibration: PayoutCalibration
  ) {
    this.calibratedAt = race.calibratedAt;
    this.signature = sha256({ race, calibration });
  }

  probability(runnerId: string, market: ProbabilityMarket): number | undefined {
    const entry = this.race.runners[runnerId];
    if (!entry) return undefined;
    return market === 'WIN' ? entry.win : entry.place;
  }

  dividend(betType: BetType, legs: Runner[]): DividendQuote | undefined {
    const factors = this.calibration.betTypes[betType];
    if (!factors || legs.length === 0) return undefined;

    let product = 1;
    for (const leg of legs) {
      const odds = legOdds(betType, leg);
      if (!isUsableOdds(odds)) return undefined;
      product *= odds;
    }
    const market = product * factors.marketFactor;
    return { market, calibrated: market * factors.realizationRatio };
  }
}

import { z } from 'zod';
import { BET_TYPES } from '../gpi-config/gpi-config.types.js';
import type { ArtifactRecord, OfficialResult, RaceEnrichment } from './tracking.types.js';

const epochMs = z.number().int().nonnegative();

export const raceEnrichmentSchema: z.ZodType<RaceEnrichment> = z.object({
  raceId: z.string().min(1),
  capturedAt: epochMs,
  jockeyTrainer: z
    .object({
      capturedAt: epochMs,
      runners: z.record(
        z.string(),
        z.object({ jockeyWinRate: z.number().optional(), trainerWinRate: z.number().optional() })
      ),
    })
    .optional(),
  chrono: z
    .object({
      capturedAt: epochMs,
      runners: z.record(
        z.string(),
        z.object({ lastTimes: z.array(z.number()).optional(), bestTime: z.number().optional() })
      ),
    })
    .optional(),
});

export const officialResultSchema: z.ZodType<OfficialResult> = z.object({
  raceId: z.string().min(1),
  arrival: z.array(z.string().min(1)).min(1),
  dividends: z.record(z.enum(BET_TYPES), z.number().nonnegative()),
  placeDividends: z.record(z.string(), z.number().nonnegative()).optional(),
  starters: z.number().int().positive().optional(),
  publishedAt: epochMs,
});

export const artifactRecordSchema: z.ZodType<ArtifactRecord> = z.object({
  raceId: z.string(),
  meetingId: z.string().nullable(),
  phase: z.enum(['H30', 'H5', 'RESULT']),
  abstain: z.boolean(),
  reasonCode: z.enum([
    'PLAY',
    'DATA_UNAVAILABLE',
    'ENRICHMENT_MISSING',
    'MARKET_REJECTED',
    'NO_FRESH_DATA',
    'NO_QUALIFYING_LEG',
    'STAKE_BELOW_INCREMENT',
    'GLOBAL_EV_REJECTED',
    'PRELIMINARY',
    'RESULT_PHASE',
  ]),
  message: z.string(),
  inputsFingerprint: z.string(),
  decisionDigest: z.string(),
  snapshotCapturedAt: z.number().nullable(),
  calibratedAt: z.number().nullable(),
  enrichmentCapturedAt: z.number().nullable(),
  marketPassed: z.boolean().nullable(),
  starters: z.number().nullable(),
  totalStake: z.number(),
  tickets: z.array(
    z.object({
      id: z.string(),
      kind: z.enum(['SP', 'COMBO']),
      betType: z.enum(BET_TYPES),
      stake: z.number(),
      runners: z.array(z.string()),
    })
  ),
});

import { z } from 'zod';
import type { RawRaceSnapshot } from './snapshot.types.js';

const epochMs = z.number().int().nonnegative();

export const runnerSchema = z.object({
  id: z.string().min(1),
  number: z.number().int().positive(),
  name: z.string(),
  winOdds: z.number(),
  placeOdds: z.number().optional(),
  scratched: z.boolean(),
});

export const rawSnapshotSchema: z.ZodType<RawRaceSnapshot> = z.object({
  meetingId: z.string().min(1),
  raceId: z.string().min(1),
  phase: z.enum(['H30', 'H5']),
  capturedAt: epochMs,
  race: z.object({
    discipline: z.string().optional(),
    label: z.string().optional(),
    handicap: z.boolean().optional(),
  }),
  inputs: z.object({
    odds: epochMs,
    runners: epochMs,
    scratches: epochMs,
  }),
  runners: z.array(runnerSchema).min(1),
  overround: z.number().optional(),
});

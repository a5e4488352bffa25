import { z } from 'zod';
import { COMBO_BET_TYPES, SP_BET_TYPES, type GpiConfig } from './gpi-config.types.js';

const fraction = z.number().finite().gt(0).lte(1);
const positive = z.number().finite().gt(0);
const ratio = z.number().finite();

export const gpiConfigSchema: z.ZodType<GpiConfig> = z
  .object({
    budget: positive,
    kellyFraction: fraction,
    exposureCapFraction: fraction,
    minStakeIncrement: positive,
    maxTicketsPerRace: z.number().int().min(1).max(2),

    freshnessMaxAgeSeconds: z.number().int().positive(),
    overroundCeiling: positive,
    overroundCeilingHandicap: positive,
    handicapMinStarters: z.number().int().min(2),

    evMinSp: ratio,
    roiMinSp: ratio,
    spMaxImpliedProbability: fraction,
    spBetType: z.enum(SP_BET_TYPES),

    evMinCombo: ratio,
    roiMinCombo: ratio,
    minPayout: z.number().finite().min(0),
    comboBetTypes: z.array(z.enum(COMBO_BET_TYPES)),
    comboPoolSize: z.number().int().min(2).max(8),
    monteCarlo: z
      .object({
        iterations: z.number().int().min(1000).max(1_000_000),
        seed: z.number().int(),
      })
      .strict(),

    evMinGlobal: ratio,

    driftThreshold: fraction,
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (cfg.overroundCeilingHandicap > cfg.overroundCeiling) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['overroundCeilingHandicap'],
        message: 'must not be looser than overroundCeiling',
      });
    }
    if (cfg.minStakeIncrement > cfg.budget) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minStakeIncrement'],
        message: 'must not exceed budget',
      });
    }
  });

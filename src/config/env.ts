import { z } from 'zod';
import { ConfigInvalidError } from '../common/errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  MONGO_URL: z.string().min(1).default('mongodb://localhost:27017/gpi'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  GPI_PRESET_PATH: z.string().min(1).optional(),
  GPI_CALIBRATION_PATH: z.string().min(1).optional(),
  PHASE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigInvalidError(parsed.error.issues.map((i) => `env ${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data;
}

/**
 * GPI CONFIG — Loader
 *
 * Preset file (config/gpi.v51.json) overlaid with GPI_* environment
 * overrides, then validated. Any problem is fatal: the pipeline never runs
 * on a partially valid configuration.
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { ConfigInvalidError, errorMessage } from '../../common/errors.js';
import { deepFreeze } from '../../common/hash.js';
import { gpiConfigSchema } from './gpi-config.schema.js';
import type { GpiConfig } from './gpi-config.types.js';

export const DEFAULT_PRESET_PATH = fileURLToPath(new URL('../../../config/gpi.v51.json', import.meta.url));

const NUMERIC_KEYS = [
  'budget',
  'kellyFraction',
  'exposureCapFraction',
  'minStakeIncrement',
  'maxTicketsPerRace',
  'freshnessMaxAgeSeconds',
  'overroundCeiling',
  'overroundCeilingHandicap',
  'handicapMinStarters',
  'evMinSp',
  'roiMinSp',
  'spMaxImpliedProbability',
  'evMinCombo',
  'roiMinCombo',
  'minPayout',
  'comboPoolSize',
  'evMinGlobal',
  'driftThreshold',
] as const;

export function envKeyFor(field: string): string {
  return `GPI_${field.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase()}`;
}

/**
 * Validate an already assembled config object.
 * Returns a frozen copy; throws ConfigInvalidError listing every issue.
 */
export function parseGpiConfig(raw: unknown): GpiConfig {
  const result = gpiConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigInvalidError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return deepFreeze(result.data);
}

export function readPreset(presetPath: string = DEFAULT_PRESET_PATH): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(presetPath, 'utf-8'));
  } catch (err) {
    throw new ConfigInvalidError([`preset ${presetPath}: ${errorMessage(err)}`]);
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigInvalidError([`preset ${presetPath}: expected a JSON object`]);
  }
  return { ...parsed };
}

function toNumber(value: string): number {
  // Empty strings must not turn into 0
  return value.trim() === '' ? Number.NaN : Number(value);
}

export function applyEnvOverrides(
  base: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };

  for (const key of NUMERIC_KEYS) {
    const value = env[envKeyFor(key)];
    if (value !== undefined) merged[key] = toNumber(value);
  }

  const spBetType = env[envKeyFor('spBetType')];
  if (spBetType !== undefined) merged.spBetType = spBetType.trim();

  const comboBetTypes = env[envKeyFor('comboBetTypes')];
  if (comboBetTypes !== undefined) {
    merged.comboBetTypes = comboBetTypes
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  const iterations = env.GPI_MONTE_CARLO_ITERATIONS;
  const seed = env.GPI_MONTE_CARLO_SEED;
  if (iterations !== undefined || seed !== undefined) {
    const current = merged.monteCarlo;
    const monteCarlo: Record<string, unknown> =
      current !== null && typeof current === 'object' ? { ...current } : {};
    if (iterations !== undefined) monteCarlo.iterations = toNumber(iterations);
    if (seed !== undefined) monteCarlo.seed = toNumber(seed);
    merged.monteCarlo = monteCarlo;
  }

  return merged;
}

export function loadGpiConfig(options: { presetPath?: string; env?: NodeJS.ProcessEnv } = {}): GpiConfig {
  const preset = readPreset(options.presetPath);
  return parseGpiConfig(applyEnvOverrides(preset, options.env ?? process.env));
}

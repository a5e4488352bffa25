/**
 * GPI CONFIG — Types
 *
 * Every threshold the guardrails and the allocator read. The object is
 * passed into each invocation and frozen; nothing reads thresholds from
 * ambient state.
 */

export const SP_BET_TYPES = ['SIMPLE_GAGNANT', 'SIMPLE_PLACE'] as const;
export const COMBO_BET_TYPES = ['COUPLE_GAGNANT', 'COUPLE_PLACE', 'TRIO', 'MULTI'] as const;
export const BET_TYPES = [...SP_BET_TYPES, ...COMBO_BET_TYPES] as const;

export type SpBetType = (typeof SP_BET_TYPES)[number];
export type ComboBetType = (typeof COMBO_BET_TYPES)[number];
export type BetType = (typeof BET_TYPES)[number];

export interface MonteCarloSettings {
  iterations: number;
  seed: number;
}

export interface GpiConfig {
  // Staking
  budget: number;
  kellyFraction: number;
  exposureCapFraction: number;
  minStakeIncrement: number;
  maxTicketsPerRace: number;

  // Market gates
  freshnessMaxAgeSeconds: number;
  overroundCeiling: number;
  overroundCeilingHandicap: number;
  handicapMinStarters: number;

  // SP leg
  evMinSp: number;
  roiMinSp: number;
  spMaxImpliedProbability: number;
  spBetType: SpBetType;

  // Combo leg
  evMinCombo: number;
  roiMinCombo: number;
  minPayout: number;
  comboBetTypes: ComboBetType[];
  comboPoolSize: number;
  monteCarlo: MonteCarloSettings;

  // Global gate
  evMinGlobal: number;

  // Annotations
  driftThreshold: number;
}

export const POLICY_VERSION = 'GPI v5.1';

/**
 * GUARDRAILS — Evaluator
 *
 * Gate order:
 *   1. MARKET    freshness of every mandatory input, unpriced runners, overround
 *   2. ESTIMATES SP thresholds, combo thresholds
 *   3. GLOBAL    stake-weighted EV, only when a combo is present
 * Reasons accumulate inside a stage; a failing stage stops the cascade.
 * Every function here is pure.
 */

import { deepFreeze } from '../../common/hash.js';
import type { GpiConfig } from '../gpi-config/gpi-config.types.js';
import type { Estimate } from '../estimator/estimator.types.js';
import type { RaceSnapshot } from '../race-snapshot/contracts/snapshot.types.js';
import { activeRunners } from '../race-snapshot/services/market.service.js';
import { selectOverroundCeiling } from './overround.policy.js';
import type {
  FreshnessField,
  GlobalGateItem,
  GuardrailReason,
  GuardrailStage,
  GuardrailVerdict,
  MarketContext,
} from './guardrails.types.js';

function fmt(value: number): string {
  return Number.isFinite(value) ? value.toFixed(2) : String(value);
}

export function buildVerdict(stage: GuardrailStage, reasons: GuardrailReason[]): GuardrailVerdict {
  return deepFreeze({ stage, passed: reasons.length === 0, reasons: [...reasons] });
}

// ═══════════════════════════════════════════════════════════════
// MARKET
// ═══════════════════════════════════════════════════════════════

export function freshnessInputs(
  snapshot: RaceSnapshot,
  context: MarketContext
): Array<[FreshnessField, number | undefined]> {
  const fields: Array<[FreshnessField, number | undefined]> = [
    ['odds', snapshot.inputs.odds],
    ['runners', snapshot.inputs.runners],
    ['scratches', snapshot.inputs.scratches],
  ];
  if (context.requireCalibration) fields.push(['calibration', context.calibratedAt]);
  return fields;
}

export function checkFreshness(
  snapshot: RaceSnapshot,
  context: MarketContext,
  config: Pick<GpiConfig, 'freshnessMaxAgeSeconds'>
): GuardrailReason[] {
  const maxAgeMs = config.freshnessMaxAgeSeconds * 1000;
  const reasons: GuardrailReason[] = [];

  for (const [field, capturedAt] of freshnessInputs(snapshot, context)) {
    if (capturedAt === undefined || !Number.isFinite(capturedAt)) {
      reasons.push({ code: 'STALE_INPUT', message: `stale input: ${field} (missing)` });
      continue;
    }
    const ageMs = context.asOf - capturedAt;
    if (ageMs > maxAgeMs) {
      reasons.push({
        code: 'STALE_INPUT',
        message: `stale input: ${field} (${Math.round(ageMs / 1000)}s old, max ${config.freshnessMaxAgeSeconds}s)`,
      });
    }
  }
  return reasons;
}

export function checkOverround(snapshot: RaceSnapshot, config: GpiConfig): GuardrailReason[] {
  if (snapshot.unpricedRunners.length > 0) {
    return [
      {
        code: 'UNPRICED_RUNNER',
        message: `overround cannot be computed: no usable win odds for ${snapshot.unpricedRunners.join(', ')}`,
      },
    ];
  }

  const { ceiling, reason } = selectOverroundCeiling(snapshot.race, activeRunners(snapshot).length, config);
  if (snapshot.overround > ceiling) {
    return [
      {
        code: 'OVERROUND_TOO_HIGH',
        message: `overround ${fmt(snapshot.overround)} above ceiling ${fmt(ceiling)}${
          reason === 'HANDICAP_LARGE_FIELD' ? ' (handicap, large field)' : ''
        }`,
      },
    ];
  }
  return [];
}

export function evaluateMarket(snapshot: RaceSnapshot, context: MarketContext, config: GpiConfig): GuardrailVerdict {
  return buildVerdict('MARKET', [...checkFreshness(snapshot, context, config), ...checkOverround(snapshot, config)]);
}

// ═══════════════════════════════════════════════════════════════
// ESTIMATES
// ═══════════════════════════════════════════════════════════════

export function checkSpEstimate(estimate: Estimate, config: GpiConfig): GuardrailReason[] {
  if (estimate.failure) {
    return [{ code: 'ESTIMATION_FAILURE', message: `SP estimation failed: ${estimate.failure.detail}`, leg: 'SP' }];
  }

  const reasons: GuardrailReason[] = [];
  if (!(estimate.evRatio >= config.evMinSp)) {
    reasons.push({
      code: 'SP_EV_TOO_LOW',
      message: `SP ev ${fmt(estimate.evRatio)} below minimum ${fmt(config.evMinSp)}`,
      leg: 'SP',
    });
  }
  if (!(estimate.roiRatio >= config.roiMinSp)) {
    reasons.push({
      code: 'SP_ROI_TOO_LOW',
      message: `SP roi ${fmt(estimate.roiRatio)} below minimum ${fmt(config.roiMinSp)}`,
      leg: 'SP',
    });
  }
  const implied = 1 / estimate.marketOdds;
  if (!(implied <= config.spMaxImpliedProbability)) {
    reasons.push({
      code: 'SP_PRICE_TOO_SHORT',
      message: `SP implied probability ${fmt(implied)} above maximum ${fmt(config.spMaxImpliedProbability)}`,
      leg: 'SP',
    });
  }
  return reasons;
}

export function checkComboEstimate(estimate: Estimate, config: GpiConfig): GuardrailReason[] {
  if (estimate.failure) {
    return [
      { code: 'ESTIMATION_FAILURE', message: `combo estimation failed: ${estimate.failure.detail}`, leg: 'COMBO' },
    ];
  }

  const reasons: GuardrailReason[] = [];
  if (!(estimate.evRatio >= config.evMinCombo)) {
    reasons.push({
      code: 'COMBO_EV_TOO_LOW',
      message: `combo ev ${fmt(estimate.evRatio)} below minimum ${fmt(config.evMinCombo)}`,
      leg: 'COMBO',
    });
  }
  if (!(estimate.roiRatio >= config.roiMinCombo)) {
    reasons.push({
      code: 'COMBO_ROI_TOO_LOW',
      message: `combo roi ${fmt(estimate.roiRatio)} below minimum ${fmt(config.roiMinCombo)}`,
      leg: 'COMBO',
    });
  }
  if (!(estimate.expectedPayout >= config.minPayout)) {
    reasons.push({
      code: 'COMBO_PAYOUT_TOO_LOW',
      message: `combo expected payout ${fmt(estimate.expectedPayout)} below minimum ${fmt(config.minPayout)}`,
      leg: 'COMBO',
    });
  }
  return reasons;
}

export function checkEstimate(estimate: Estimate, config: GpiConfig): GuardrailReason[] {
  return estimate.kind === 'SP' ? checkSpEstimate(estimate, config) : checkComboEstimate(estimate, config);
}

/** SP checks first, then combo checks, over the proposed estimates */
export function evaluateEstimates(estimates: Estimate[], config: GpiConfig): GuardrailVerdict {
  const ordered = [...estimates.filter((e) => e.kind === 'SP'), ...estimates.filter((e) => e.kind === 'COMBO')];
  return buildVerdict(
    'ESTIMATES',
    ordered.flatMap((e) => checkEstimate(e, config))
  );
}

// ═══════════════════════════════════════════════════════════════
// GLOBAL
// ═══════════════════════════════════════════════════════════════

/**
 * Stake-weighted mean EV; plain mean when no stakes are known.
 * Null when there is nothing to average.
 */
export function computeEvGlobal(items: GlobalGateItem[]): number | null {
  if (items.length === 0) return null;
  const staked = items.every((i) => i.stake !== undefined);
  if (staked) {
    const total = items.reduce((s, i) => s + (i.stake ?? 0), 0);
    if (total > 0) return items.reduce((s, i) => s + i.evRatio * (i.stake ?? 0), 0) / total;
  }
  return items.reduce((s, i) => s + i.evRatio, 0) / items.length;
}

export function evaluateGlobal(items: GlobalGateItem[], config: GpiConfig): GuardrailVerdict {
  if (!items.some((i) => i.kind === 'COMBO')) return buildVerdict('GLOBAL', []);

  const evGlobal = computeEvGlobal(items);
  if (evGlobal === null || !(evGlobal >= config.evMinGlobal)) {
    return buildVerdict('GLOBAL', [
      {
        code: 'GLOBAL_EV_TOO_LOW',
        message: `global ev ${evGlobal === null ? 'n/a' : fmt(evGlobal)} below minimum ${fmt(config.evMinGlobal)}`,
      },
    ]);
  }
  return buildVerdict('GLOBAL', []);
}

// ═══════════════════════════════════════════════════════════════
// FULL CASCADE
// ═══════════════════════════════════════════════════════════════

/**
 * All gates in order over one proposal. Returns the verdict of the first
 * failing stage, or the GLOBAL verdict when everything passed.
 */
export function evaluate(
  snapshot: RaceSnapshot,
  estimates: Estimate[],
  config: GpiConfig,
  context: MarketContext,
  stakes?: ReadonlyMap<Estimate, number>
): GuardrailVerdict {
  const market = evaluateMarket(snapshot, context, config);
  if (!market.passed) return market;

  const checked = evaluateEstimates(estimates, config);
  if (!checked.passed) return checked;

  return evaluateGlobal(
    estimates.map((e) => ({ kind: e.kind, evRatio: e.evRatio, stake: stakes?.get(e) })),
    config
  );
}

/**
 * Guardrails Tests
 */

import { describe, it, expect } from 'vitest';
import {
  T0,
  borderlineOverroundRunners,
  highOverroundRunners,
  makeEstimate,
  makeSnapshot,
  runner,
  testConfig,
} from '../../../__tests__/fixtures.js';
import type { RaceSnapshot, Runner } from '../../race-snapshot/contracts/snapshot.types.js';
import {
  checkComboEstimate,
  checkFreshness,
  checkOverround,
  checkSpEstimate,
  computeEvGlobal,
  evaluate,
  evaluateGlobal,
  evaluateMarket,
} from '../guardrails.service.js';
import { isHandicapRace, selectOverroundCeiling } from '../overround.policy.js';

const config = testConfig();
const context = { asOf: T0, calibratedAt: T0 - 120_000, requireCalibration: true };

/** Fourteen priced runners with a hand-set book sum */
function largeField(overround: number, race: RaceSnapshot['race'], starters = 14): RaceSnapshot {
  const runners: Runner[] = Array.from({ length: starters }, (_, i) => runner(`R${i + 1}`, i + 1, 10, 3));
  return {
    meetingId: 'R1',
    raceId: 'R1C1',
    phase: 'H5',
    capturedAt: T0 - 60_000,
    race,
    inputs: { odds: T0 - 60_000, runners: T0 - 60_000, scratches: T0 - 60_000 },
    runners,
    overround,
    unpricedRunners: [],
  };
}

describe('Guardrails', () => {
  describe('freshness', () => {
    it('should pass inputs within the maximum age', () => {
      expect(checkFreshness(makeSnapshot(), context, config)).toEqual([]);
    });

    it('should accept an input exactly at the maximum age', () => {
      const snapshot = makeSnapshot({ inputs: { odds: T0 - 420_000 } });
      expect(checkFreshness(snapshot, context, config)).toEqual([]);
    });

    it('should reject stale odds', () => {
      const snapshot = makeSnapshot({ inputs: { odds: T0 - 421_000 } });

      expect(checkFreshness(snapshot, context, config)).toEqual([
        { code: 'STALE_INPUT', message: 'stale input: odds (421s old, max 420s)' },
      ]);
    });

    it('should reject a missing calibration timestamp when required', () => {
      const reasons = checkFreshness(makeSnapshot(), { asOf: T0, requireCalibration: true }, config);
      expect(reasons.map((r) => r.message)).toEqual(['stale input: calibration (missing)']);
    });

    it('should ignore calibration when not required', () => {
      expect(checkFreshness(makeSnapshot(), { asOf: T0, requireCalibration: false }, config)).toEqual([]);
    });
  });

  describe('overround', () => {
    it('should accept a 1.10 book', () => {
      expect(checkOverround(makeSnapshot(), config)).toEqual([]);
    });

    it('should reject 1.31 against a 1.30 ceiling', () => {
      const snapshot = makeSnapshot({ runners: borderlineOverroundRunners() });

      expect(checkOverround(snapshot, config)).toEqual([
        { code: 'OVERROUND_TOO_HIGH', message: 'overround 1.31 above ceiling 1.30' },
      ]);
    });

    it('should apply the handicap ceiling to large handicap fields', () => {
      const snapshot = largeField(1.27, { discipline: 'Plat', label: 'Grand Handicap de Test' });

      expect(checkOverround(snapshot, config)).toEqual([
        { code: 'OVERROUND_TOO_HIGH', message: 'overround 1.27 above ceiling 1.25 (handicap, large field)' },
      ]);
    });

    it('should keep the default ceiling for small handicap fields', () => {
      const snapshot = largeField(1.27, { handicap: true }, 13);
      expect(checkOverround(snapshot, config)).toEqual([]);
    });

    it('should not count scratched runners as starters', () => {
      const snapshot = largeField(1.27, { handicap: true });
      const scratched: RaceSnapshot = {
        ...snapshot,
        runners: snapshot.runners.map((r, i) => (i === 0 ? { ...r, scratched: true } : r)),
      };
      expect(checkOverround(scratched, config)).toEqual([]);
    });

    it('should reject a market with unpriced runners', () => {
      const snapshot = makeSnapshot({ runners: [runner('A', 1, 2.5, 1.3), runner('B', 2, 0, 3)] });

      expect(checkOverround(snapshot, config)).toEqual([
        { code: 'UNPRICED_RUNNER', message: 'overround cannot be computed: no usable win odds for B' },
      ]);
    });

    it('should accumulate freshness and overround reasons in the MARKET stage', () => {
      const snapshot = makeSnapshot({ runners: highOverroundRunners(), inputs: { scratches: T0 - 500_000 } });

      const verdict = evaluateMarket(snapshot, context, config);

      expect(verdict.stage).toBe('MARKET');
      expect(verdict.passed).toBe(false);
      expect(verdict.reasons.map((r) => r.message)).toEqual([
        'stale input: scratches (500s old, max 420s)',
        'overround 1.35 above ceiling 1.30',
      ]);
    });
  });

  describe('handicap detection', () => {
    it('should detect handicaps from the flag or the label', () => {
      expect(isHandicapRace({ handicap: true })).toBe(true);
      expect(isHandicapRace({ label: 'HANDICAP DIVISÉ' })).toBe(true);
      expect(isHandicapRace({ label: 'Prix de Diane' })).toBe(false);
    });

    it('should never treat trot or obstacle races as handicaps', () => {
      expect(isHandicapRace({ discipline: 'Trot attelé', label: 'Handicap' })).toBe(false);
      expect(isHandicapRace({ discipline: 'Haies', handicap: true })).toBe(false);
    });

    it('should select the stricter ceiling only for large handicap fields', () => {
      expect(selectOverroundCeiling({ handicap: true }, 14, config)).toEqual({
        ceiling: 1.25,
        reason: 'HANDICAP_LARGE_FIELD',
      });
      expect(selectOverroundCeiling({ handicap: true }, 13, config)).toEqual({ ceiling: 1.3, reason: 'DEFAULT' });
    });
  });

  describe('estimates', () => {
    it('should pass a qualifying SP estimate', () => {
      expect(checkSpEstimate(makeEstimate(), config)).toEqual([]);
    });

    it('should list every SP threshold miss', () => {
      const estimate = makeEstimate({ evRatio: 0.1, roiRatio: 0.05, marketOdds: 1.5 });

      expect(checkSpEstimate(estimate, config).map((r) => r.message)).toEqual([
        'SP ev 0.10 below minimum 0.15',
        'SP roi 0.05 below minimum 0.10',
        'SP implied probability 0.67 above maximum 0.60',
      ]);
    });

    it('should report a failed estimate as a single reason', () => {
      const estimate = makeEstimate({
        evRatio: Number.NEGATIVE_INFINITY,
        roiRatio: Number.NEGATIVE_INFINITY,
        failure: { code: 'ESTIMATION_FAILURE', detail: 'runner B has no calibrated probability' },
      });

      expect(checkSpEstimate(estimate, config)).toEqual([
        {
          code: 'ESTIMATION_FAILURE',
          message: 'SP estimation failed: runner B has no calibrated probability',
          leg: 'SP',
        },
      ]);
    });

    it('should check combo ev, roi and payout', () => {
      const estimate = makeEstimate({
        kind: 'COMBO',
        betType: 'TRIO',
        involvedRunners: ['A', 'B', 'C'],
        evRatio: 0.38,
        roiRatio: 0.1,
        expectedPayout: 10,
      });

      expect(checkComboEstimate(estimate, config).map((r) => r.code)).toEqual([
        'COMBO_EV_TOO_LOW',
        'COMBO_ROI_TOO_LOW',
        'COMBO_PAYOUT_TOO_LOW',
      ]);
      expect(checkComboEstimate(estimate, config)[0].message).toBe('combo ev 0.38 below minimum 0.40');
      expect(checkComboEstimate(estimate, config)[2].message).toBe(
        'combo expected payout 10.00 below minimum 12.00'
      );
    });
  });

  describe('global gate', () => {
    it('should weight EV by stake', () => {
      const ev = computeEvGlobal([
        { kind: 'SP', evRatio: 0.5, stake: 0.4 },
        { kind: 'COMBO', evRatio: 1.5, stake: 0.3 },
      ]);
      expect(ev).toBeCloseTo(0.65 / 0.7, 10);
    });

    it('should fall back to the plain mean without stakes', () => {
      expect(computeEvGlobal([
        { kind: 'SP', evRatio: 0.2 },
        { kind: 'COMBO', evRatio: 0.6 },
      ])).toBeCloseTo(0.4, 10);
      expect(computeEvGlobal([])).toBeNull();
    });

    it('should not apply without a combo', () => {
      const verdict = evaluateGlobal([{ kind: 'SP', evRatio: 0.16, stake: 0.4 }], config);
      expect(verdict.passed).toBe(true);
    });

    it('should reject a low global EV when a combo is present', () => {
      const verdict = evaluateGlobal(
        [
          { kind: 'SP', evRatio: 0.2, stake: 0.5 },
          { kind: 'COMBO', evRatio: 0.2, stake: 0.5 },
        ],
        config
      );

      expect(verdict.passed).toBe(false);
      expect(verdict.reasons.map((r) => r.message)).toEqual(['global ev 0.20 below minimum 0.35']);
    });
  });

  describe('cascade', () => {
    it('should stop at the first failing stage', () => {
      const snapshot = makeSnapshot({ runners: highOverroundRunners() });
      const weak = makeEstimate({ evRatio: 0.01 });

      const verdict = evaluate(snapshot, [weak], config, context);

      expect(verdict.stage).toBe('MARKET');
      expect(verdict.reasons).toHaveLength(1);
    });

    it('should end on a passing GLOBAL verdict', () => {
      const verdict = evaluate(makeSnapshot(), [makeEstimate()], config, context);
      expect(verdict).toEqual({ stage: 'GLOBAL', passed: true, reasons: [] });
    });
  });
});

/**
 * HTTP API Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { fixedClock } from '../common/clock.js';
import { createInMemoryPorts, type InMemoryPorts } from '../modules/tracking/adapters/memory.adapters.js';
import {
  RACE_ID,
  RUNNER_PROBABILITIES,
  SCENARIO_CALIBRATION,
  T0,
  makeEnrichment,
  makeModel,
  makeSnapshot,
  rawSnapshot,
  testConfig,
} from './fixtures.js';

interface ErrorBody {
  ok: false;
  error: string;
  message: string;
}

interface DecisionBody {
  ok: true;
  reasonCode: string;
  abstain: boolean;
  message: string;
  totalStake: number;
  tickets: Array<{ betType: string; stake: number; runners: string[]; evRatio: number; roiRatio: number }>;
}

describe('HTTP API', () => {
  let app: FastifyInstance;
  let ports: InMemoryPorts;

  beforeEach(() => {
    ports = createInMemoryPorts();
    ports.snapshots.put(makeSnapshot());
    ports.enrichment.put(makeEnrichment());
    ports.calibration.put(RACE_ID, makeModel());
    app = buildApp({
      config: testConfig({ comboBetTypes: [] }),
      payoutCalibration: SCENARIO_CALIBRATION,
      ports,
      logLevel: 'silent',
      clock: fixedClock(T0),
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('should report health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      service: 'gpi-decision-engine',
      policyVersion: 'GPI v5.1',
      timestamp: '2025-06-01T13:00:00.000Z',
    });
  });

  it('should answer unknown routes with NOT_FOUND', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json<ErrorBody>().error).toBe('NOT_FOUND');
  });

  it('should run H5 and return the rounded decision', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/gpi/races/${RACE_ID}/phases/H5/run`,
      payload: { asOf: T0 },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json<DecisionBody>();
    expect(body.ok).toBe(true);
    expect(body.reasonCode).toBe('PLAY');
    expect(body.totalStake).toBe(0.4);
    expect(body.tickets).toEqual([
      expect.objectContaining({ betType: 'SIMPLE_PLACE', stake: 0.4, runners: ['B'], evRatio: 0.5, roiRatio: 0.25 }),
    ]);
    expect(ports.sink.artifacts).toHaveLength(1);
  });

  it('should use the server clock when asOf is omitted', async () => {
    const res = await app.inject({ method: 'POST', url: `/api/gpi/races/${RACE_ID}/phases/H5/run` });

    expect(res.statusCode).toBe(200);
    expect(res.json<DecisionBody>().reasonCode).toBe('PLAY');
  });

  it('should reject an unknown phase', async () => {
    const res = await app.inject({ method: 'POST', url: `/api/gpi/races/${RACE_ID}/phases/H10/run` });

    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorBody>()).toEqual({ ok: false, error: 'UNKNOWN_PHASE', message: 'Unknown phase: H10' });
  });

  it('should reject a malformed run body', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/gpi/races/${RACE_ID}/phases/H5/run`,
      payload: { asOf: 'soon' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorBody>().error).toBe('VALIDATION_ERROR');
  });

  it('should list decisions after a run', async () => {
    await app.inject({ method: 'POST', url: `/api/gpi/races/${RACE_ID}/phases/H5/run`, payload: { asOf: T0 } });

    const res = await app.inject({ method: 'GET', url: `/api/gpi/races/${RACE_ID}/decisions?phase=H5` });

    expect(res.statusCode).toBe(200);
    const body = res.json<{ count: number; decisions: Array<{ reasonCode: string; totalStake: number }> }>();
    expect(body.count).toBe(1);
    expect(body.decisions[0]).toEqual(expect.objectContaining({ reasonCode: 'PLAY', totalStake: 0.4 }));
  });

  it('should reject a non-positive limit', async () => {
    const res = await app.inject({ method: 'GET', url: `/api/gpi/races/${RACE_ID}/decisions?limit=0` });

    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorBody>().message).toBe('limit must be a positive integer, got 0');
  });

  it('should expose the active configuration', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/gpi/config' });

    const body = res.json<{ policyVersion: string; config: { budget: number; comboBetTypes: string[] } }>();
    expect(body.policyVersion).toBe('GPI v5.1');
    expect(body.config.budget).toBe(5);
    expect(body.config.comboBetTypes).toEqual([]);
  });

  it('should report executions of guarded runs', async () => {
    await app.inject({ method: 'POST', url: `/api/gpi/races/${RACE_ID}/phases/H5/run`, payload: { asOf: T0 } });

    const res = await app.inject({ method: 'GET', url: '/api/gpi/ops/executions' });

    const body = res.json<{ stats: { completed: number }; executions: Array<{ key: string; status: string }> }>();
    expect(body.stats.completed).toBe(1);
    expect(body.executions).toEqual([expect.objectContaining({ key: 'R1C1:H5', status: 'COMPLETED' })]);
  });

  describe('simulate', () => {
    it('should run a phase on inputs from the body without persisting', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/gpi/simulate',
        payload: {
          raceId: RACE_ID,
          phase: 'H5',
          asOf: T0,
          snapshots: [rawSnapshot()],
          enrichment: makeEnrichment(),
          calibration: { raceId: RACE_ID, calibratedAt: T0 - 120_000, runners: RUNNER_PROBABILITIES },
        },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json<DecisionBody & { simulated: boolean; trail: { estimates: unknown[] } }>();
      expect(body.simulated).toBe(true);
      expect(body.reasonCode).toBe('PLAY');
      expect(body.tickets[0].stake).toBe(0.4);
      expect(body.trail.estimates).toHaveLength(6);
      expect(ports.sink.artifacts).toEqual([]);
    });

    it('should abstain when the body lacks enrichment', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/gpi/simulate',
        payload: { raceId: RACE_ID, phase: 'H5', asOf: T0, snapshots: [rawSnapshot()] },
      });

      expect(res.json<DecisionBody>().reasonCode).toBe('ENRICHMENT_MISSING');
    });

    it('should reject a body without a race id', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/gpi/simulate', payload: { phase: 'H5' } });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>()).toEqual({ ok: false, error: 'VALIDATION_ERROR', message: 'raceId: Required' });
    });
  });
});

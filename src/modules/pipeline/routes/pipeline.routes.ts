/**
 * PIPELINE — Routes
 *
 * POST /api/gpi/races/:raceId/phases/:phase/run   run a phase on the configured ports
 * POST /api/gpi/simulate                          run a phase on inputs from the body
 * GET  /api/gpi/races/:raceId/decisions           decision history
 * GET  /api/gpi/config                            active thresholds
 * GET  /api/gpi/ops/executions                    phase run log
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../../common/errors.js';
import type { Clock } from '../../../common/clock.js';
import type { Logger } from '../../../common/logger.js';
import { POLICY_VERSION, type GpiConfig } from '../../gpi-config/gpi-config.types.js';
import {
  CalibratedPayoutModel,
  raceCalibrationSchema,
  type PayoutCalibration,
} from '../../estimator/services/payout.model.js';
import { rawSnapshotSchema } from '../../race-snapshot/contracts/snapshot.schema.js';
import { normalizeSnapshot } from '../../race-snapshot/services/market.service.js';
import { createInMemoryPorts } from '../../tracking/adapters/memory.adapters.js';
import { artifactRecordSchema, officialResultSchema, raceEnrichmentSchema } from '../../tracking/tracking.schema.js';
import type { DecisionHistory } from '../../tracking/tracking.types.js';
import { parsePhase, type Phase } from '../contracts/phase.js';
import { toArtifactView } from '../services/artifact.view.js';
import type { PhaseRunGuard } from '../services/phase.guard.js';
import { PipelineService } from '../services/pipeline.service.js';

export interface GpiRouteDeps {
  pipeline: PipelineService;
  guard: PhaseRunGuard;
  history: DecisionHistory;
  config: GpiConfig;
  payoutCalibration: PayoutCalibration;
  clock: Clock;
}

const runBodySchema = z
  .object({
    asOf: z.number().int().nonnegative().optional(),
  })
  .default({});

const simulateBodySchema = z.object({
  raceId: z.string().min(1),
  phase: z.string(),
  asOf: z.number().int().nonnegative().optional(),
  snapshots: z.array(rawSnapshotSchema).default([]),
  enrichment: raceEnrichmentSchema.optional(),
  calibration: raceCalibrationSchema.optional(),
  result: officialResultSchema.optional(),
  priors: z.array(artifactRecordSchema).default([]),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; ')
    );
  }
  return parsed.data;
}

export async function registerGpiRoutes(fastify: FastifyInstance, deps: GpiRouteDeps): Promise<void> {
  // ═══════════════════════════════════════════════════════════════
  // PHASE RUNS
  // ═══════════════════════════════════════════════════════════════

  fastify.post<{ Params: { raceId: string; phase: string } }>(
    '/api/gpi/races/:raceId/phases/:phase/run',
    async (request) => {
      const { raceId } = request.params;
      const phase = parsePhase(request.params.phase);
      const { asOf } = parseBody(runBodySchema, request.body ?? {});

      const artifact = await deps.guard.execute(raceId, phase, (signal) =>
        deps.pipeline.run({ raceId, phase, asOf: asOf ?? deps.clock.now() }, deps.config, { signal })
      );

      return { ok: true, ...toArtifactView(artifact.decision) };
    }
  );

  // Nothing persisted: ports live for this request only
  fastify.post('/api/gpi/simulate', async (request) => {
    const body = parseBody(simulateBodySchema, request.body);
    const phase = parsePhase(body.phase);

    const ports = createInMemoryPorts();
    for (const raw of body.snapshots) ports.snapshots.put(normalizeSnapshot(raw));
    if (body.enrichment) ports.enrichment.put(body.enrichment);
    if (body.calibration) {
      ports.calibration.put(body.calibration.raceId, new CalibratedPayoutModel(body.calibration, deps.payoutCalibration));
    }
    if (body.result) ports.results.put(body.result);
    for (const prior of body.priors) ports.sink.seed(prior);

    const logger: Logger = request.log;
    const pipeline = new PipelineService({ ...ports, logger });
    const artifact = await pipeline.run(
      { raceId: body.raceId, phase, asOf: body.asOf ?? deps.clock.now() },
      deps.config
    );

    return { ok: true, simulated: true, ...toArtifactView(artifact.decision), trail: artifact.trail };
  });

  // ═══════════════════════════════════════════════════════════════
  // HISTORY & CONFIG
  // ═══════════════════════════════════════════════════════════════

  fastify.get<{ Params: { raceId: string }; Querystring: { phase?: string; limit?: string } }>(
    '/api/gpi/races/:raceId/decisions',
    async (request) => {
      const { raceId } = request.params;
      const phase: Phase | undefined = request.query.phase ? parsePhase(request.query.phase) : undefined;
      const limit = request.query.limit ? parseInt(request.query.limit, 10) : 50;
      if (!Number.isInteger(limit) || limit < 1) {
        throw new ValidationError(`limit must be a positive integer, got ${request.query.limit}`);
      }

      const decisions = await deps.history.list(raceId, { phase, limit });
      return { ok: true, raceId, count: decisions.length, decisions };
    }
  );

  fastify.get('/api/gpi/config', async () => ({
    ok: true,
    policyVersion: POLICY_VERSION,
    config: deps.config,
  }));

  fastify.get('/api/gpi/ops/executions', async () => ({
    ok: true,
    stats: deps.guard.getStats(),
    executions: deps.guard.getExecutionHistory(),
  }));
}

import Fastify, { type FastifyInstance } from 'fastify';
import { AppError } from './common/errors.js';
import { systemClock, type Clock } from './common/clock.js';
import { POLICY_VERSION, type GpiConfig } from './modules/gpi-config/gpi-config.types.js';
import type { PayoutCalibration } from './modules/estimator/services/payout.model.js';
import { registerGpiRoutes } from './modules/pipeline/routes/pipeline.routes.js';
import { PhaseRunGuard } from './modules/pipeline/services/phase.guard.js';
import { PipelineService } from './modules/pipeline/services/pipeline.service.js';
import type { PipelinePorts } from './modules/tracking/tracking.types.js';

export interface AppOptions {
  config: GpiConfig;
  payoutCalibration: PayoutCalibration;
  ports: PipelinePorts;
  logLevel?: string;
  nodeEnv?: string;
  phaseTimeoutMs?: number;
  clock?: Clock;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: AppOptions): FastifyInstance {
  const clock = options.clock ?? systemClock;
  const app = Fastify({
    logger: {
      level: options.logLevel ?? 'info',
    },
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: options.nodeEnv === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    service: 'gpi-decision-engine',
    policyVersion: POLICY_VERSION,
    timestamp: clock.toISOString(clock.now()),
  }));

  const pipeline = new PipelineService({ ...options.ports, logger: app.log });
  const guard = new PhaseRunGuard({ timeoutMs: options.phaseTimeoutMs, logger: app.log, clock });

  app.register(async (fastify) => {
    await registerGpiRoutes(fastify, {
      pipeline,
      guard,
      history: options.ports.history,
      config: options.config,
      payoutCalibration: options.payoutCalibration,
      clock,
    });
  });

  return app;
}

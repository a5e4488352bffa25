/**
 * GPI decision engine entrypoint
 *
 * Run: npm run build && npm start
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { createLogger } from './common/logger.js';
import { errorMessage } from './common/errors.js';
import { loadEnv } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { loadGpiConfig } from './modules/gpi-config/gpi-config.loader.js';
import { loadPayoutCalibration } from './modules/estimator/services/payout.model.js';
import { createMongoPorts } from './modules/tracking/adapters/mongo.adapters.js';

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL, 'gpi-boot');

  // Fatal on any invalid threshold: never start on defaults
  const config = loadGpiConfig({ presetPath: env.GPI_PRESET_PATH });
  const payoutCalibration = loadPayoutCalibration(env.GPI_CALIBRATION_PATH);
  logger.info({ calibration: payoutCalibration.version, budget: config.budget }, 'GPI configuration loaded');

  await connectMongo(env.MONGO_URL, logger);

  const app = buildApp({
    config,
    payoutCalibration,
    ports: createMongoPorts(payoutCalibration),
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
    phaseTimeoutMs: env.PHASE_TIMEOUT_MS,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    await app.close();
    await disconnectMongo();
    process.exit(0);
  };
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await app.listen({ port: env.PORT, host: env.HOST });
}

main().catch((err: unknown) => {
  createLogger('error', 'gpi-boot').error({ error: errorMessage(err) }, 'Startup failed');
  process.exit(1);
});

/**
 * COMMON — Logger contract
 *
 * Same (obj, msg) shape as Fastify's pino logger, so `app.log` can be
 * injected wherever a Logger is expected.
 */

import pino from 'pino';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export function createLogger(level = 'info', name = 'gpi'): Logger {
  return pino({ name, level });
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

import { describe, it, expect } from 'vitest';
import { ConfigInvalidError } from '../../common/errors.js';
import { loadEnv } from '../env.js';

describe('loadEnv', () => {
  it('should apply defaults', () => {
    const env = loadEnv({});

    expect(env.PORT).toBe(8001);
    expect(env.HOST).toBe('0.0.0.0');
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.PHASE_TIMEOUT_MS).toBe(30_000);
    expect(env.GPI_PRESET_PATH).toBeUndefined();
  });

  it('should coerce numeric variables', () => {
    expect(loadEnv({ PORT: '9000', PHASE_TIMEOUT_MS: '5000' })).toEqual(
      expect.objectContaining({ PORT: 9000, PHASE_TIMEOUT_MS: 5000 })
    );
  });

  it('should reject invalid values', () => {
    expect(() => loadEnv({ PORT: 'abc' })).toThrow(ConfigInvalidError);
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(ConfigInvalidError);
  });
});

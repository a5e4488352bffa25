/**
 * PIPELINE — Phase run guard
 *
 * At most one execution per (raceId, phase) in this process, with a
 * timeout that aborts the running invocation. Keeps a bounded execution
 * log for the ops endpoints.
 */

import { v4 as uuidv4 } from 'uuid';
import { PhaseLockedError, PhaseTimeoutError, errorMessage } from '../../../common/errors.js';
import { systemClock, type Clock } from '../../../common/clock.js';
import { silentLogger, type Logger } from '../../../common/logger.js';
import type { Phase } from '../contracts/phase.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type PhaseExecutionStatus = 'RUNNING' | 'COMPLETED' | 'FAILED' | 'TIMEOUT';

export interface PhaseExecution {
  key: string;
  executionId: string;
  status: PhaseExecutionStatus;
  startedAt: number;
  completedAt?: number;
  durationMs?: number;
  error?: string;
}

export interface PhaseRunGuardConfig {
  timeoutMs?: number;
  /** Executions kept in the log */
  historyLimit?: number;
  logger?: Logger;
  clock?: Clock;
}

export function phaseKey(raceId: string, phase: Phase): string {
  return `${raceId}:${phase}`;
}

// ═══════════════════════════════════════════════════════════════
// GUARD
// ═══════════════════════════════════════════════════════════════

export class PhaseRunGuard {
  private readonly timeoutMs: number;
  private readonly historyLimit: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly locks = new Map<string, string>();
  private executions: PhaseExecution[] = [];

  constructor(config: PhaseRunGuardConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.historyLimit = config.historyLimit ?? 500;
    this.logger = config.logger ?? silentLogger;
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Run `fn` under the (raceId, phase) lock. The signal handed to `fn` is
   * aborted on timeout; the caller then gets PhaseTimeoutError while the
   * lock stays taken until `fn` returns.
   */
  async execute<T>(raceId: string, phase: Phase, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const key = phaseKey(raceId, phase);
    if (this.locks.has(key)) {
      this.logger.warn({ key }, 'Phase already running');
      throw new PhaseLockedError(key);
    }

    const executionId = uuidv4();
    this.locks.set(key, executionId);
    const execution: PhaseExecution = { key, executionId, status: 'RUNNING', startedAt: this.clock.now() };
    this.executions.push(execution);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new PhaseTimeoutError(key, this.timeoutMs)), this.timeoutMs);
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    // The lock is held until `fn` itself settles, even after a timeout
    const running = new Promise<T>((resolve) => resolve(fn(controller.signal)));
    const release = (): void => {
      clearTimeout(timer);
      if (this.locks.get(key) === executionId) this.locks.delete(key);
    };
    void running.then(release, release);

    try {
      const result = await Promise.race([running, aborted]);
      this.finish(execution, 'COMPLETED');
      return result;
    } catch (err) {
      const status: PhaseExecutionStatus = err instanceof PhaseTimeoutError ? 'TIMEOUT' : 'FAILED';
      this.finish(execution, status, errorMessage(err));
      this.logger.error({ key, executionId, status, error: errorMessage(err) }, 'Phase execution failed');
      throw err;
    } finally {
      clearTimeout(timer);
      this.trim();
    }
  }

  isLocked(raceId: string, phase: Phase): boolean {
    return this.locks.has(phaseKey(raceId, phase));
  }

  getExecutionHistory(key?: string, limit = 50): PhaseExecution[] {
    const filtered = key ? this.executions.filter((e) => e.key === key) : this.executions;
    return filtered.slice(-limit).map((e) => ({ ...e }));
  }

  getStats(): { running: number; completed: number; failed: number; timeouts: number } {
    return {
      running: this.locks.size,
      completed: this.executions.filter((e) => e.status === 'COMPLETED').length,
      failed: this.executions.filter((e) => e.status === 'FAILED').length,
      timeouts: this.executions.filter((e) => e.status === 'TIMEOUT').length,
    };
  }

  private finish(execution: PhaseExecution, status: PhaseExecutionStatus, error?: string): void {
    const completedAt = this.clock.now();
    execution.status = status;
    execution.completedAt = completedAt;
    execution.durationMs = completedAt - execution.startedAt;
    if (error !== undefined) execution.error = error;
  }

  private trim(): void {
    if (this.executions.length > this.historyLimit) {
      this.executions = this.executions.slice(-this.historyLimit);
    }
  }
}

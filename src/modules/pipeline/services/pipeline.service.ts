/**
 * PIPELINE — Phase state machine
 *
 * H30     market annotation only, never estimates, never tickets
 * H5      enrichment → calibration → MARKET → no-regression → estimates
 *         → leg selection → allocation → GLOBAL → decision
 * RESULT  reconciles the latest H5 decision, never tickets
 *
 * Each phase builds a complete artifact before anything reaches the sink.
 * The abort signal is checked after every awaited port call and once more
 * right before the sink, so a cancelled run persists nothing.
 */

import { DataUnavailableError, ValidationError, errorMessage } from '../../../common/errors.js';
import { deepFreeze, sha256 } from '../../../common/hash.js';
import { silentLogger, type Logger } from '../../../common/logger.js';
import { POLICY_VERSION, type GpiConfig } from '../../gpi-config/gpi-config.types.js';
import type { Estimate, Estimator, PayoutModel } from '../../estimator/estimator.types.js';
import {
  comboSelections,
  defaultEstimator,
  rankEstimates,
  spSelections,
  topRunners,
} from '../../estimator/services/estimator.service.js';
import type { GuardrailReason, GuardrailVerdict } from '../../guardrails/guardrails.types.js';
import {
  buildVerdict,
  checkEstimate,
  computeEvGlobal,
  evaluateGlobal,
  evaluateMarket,
} from '../../guardrails/guardrails.service.js';
import type { DriftEntry, RaceSnapshot } from '../../race-snapshot/contracts/snapshot.types.js';
import { computeDrift } from '../../race-snapshot/services/market.service.js';
import { allocate, totalStake } from '../../staking/allocator.service.js';
import type { AllocationPolicy, DroppedLeg, Ticket } from '../../staking/staking.types.js';
import type {
  ArtifactRecord,
  PipelinePorts,
  RaceEnrichment,
  ReconciliationReport,
} from '../../tracking/tracking.types.js';
import type {
  AbstainCode,
  AbstainDecision,
  DecisionArtifact,
  DecisionCode,
  DecisionTrail,
  PhaseRequest,
  PlayDecision,
} from '../contracts/decision.types.js';
import { assertNever, parsePhase, type Phase } from '../contracts/phase.js';
import { failedReport, noTicketsReport, reconcile } from './reconciliation.service.js';

export interface PipelineServiceDeps extends PipelinePorts {
  logger?: Logger;
  estimator?: Estimator;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/** Prior H5 outcomes a later run may not relax without newer data */
const STRICTER_H5_CODES: ReadonlySet<DecisionCode> = new Set<DecisionCode>([
  'MARKET_REJECTED',
  'NO_QUALIFYING_LEG',
  'GLOBAL_EV_REJECTED',
  'NO_FRESH_DATA',
]);

interface DecisionContext {
  phase: Phase;
  raceId: string;
  meetingId: string | null;
  snapshotCapturedAt: number | null;
  calibratedAt: number | null;
  enrichmentCapturedAt: number | null;
  inputsFingerprint: string;
}

/** Capture times of the inputs a decision was made on */
export type InputTimes = Pick<ArtifactRecord, 'snapshotCapturedAt' | 'calibratedAt' | 'enrichmentCapturedAt'>;

export interface LegChoice {
  chosen?: Estimate;
  reasons: GuardrailReason[];
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function inputsFingerprint(parts: Record<string, unknown>): string {
  return sha256({ policyVersion: POLICY_VERSION, ...parts });
}

function emptyTrail(overrides: Partial<DecisionTrail> = {}): DecisionTrail {
  return {
    verdicts: [],
    estimates: [],
    dropped: [],
    drift: [],
    top5: [],
    overround: null,
    snapshot: null,
    ...overrides,
  };
}

function abstainDecision(
  ctx: DecisionContext,
  reasonCode: AbstainCode,
  message: string,
  reasons: string[],
  evGlobalEstimate: number | null = null,
  roiGlobalEstimate: number | null = null
): AbstainDecision {
  return {
    policyVersion: POLICY_VERSION,
    ...ctx,
    abstain: true,
    reasonCode,
    message,
    reasons,
    evGlobalEstimate,
    roiGlobalEstimate,
    totalStake: 0,
    tickets: [],
  };
}

function playDecision(
  ctx: DecisionContext,
  tickets: Ticket[],
  reasons: string[],
  evGlobalEstimate: number | null,
  roiGlobalEstimate: number | null
): PlayDecision {
  const stake = totalStake(tickets);
  return {
    policyVersion: POLICY_VERSION,
    ...ctx,
    abstain: false,
    reasonCode: 'PLAY',
    message: `play: ${tickets
      .map((t) => `${t.betType} ${t.runners.join('-')} @ ${t.stake.toFixed(2)}`)
      .join(', ')} (total ${stake.toFixed(2)})`,
    reasons,
    evGlobalEstimate,
    roiGlobalEstimate,
    totalStake: stake,
    tickets,
  };
}

function reasonMessages(verdicts: GuardrailVerdict[]): string[] {
  return verdicts.flatMap((v) => v.reasons.map((r) => r.message));
}

function droppedNote(leg: DroppedLeg): string {
  return `${leg.kind} ${leg.betType} ${leg.runners.join('-')} dropped: ${leg.reason} (${leg.note})`;
}

/** Stake-weighted mean of a per-ticket ratio, null without stake */
export function stakeWeighted(tickets: Ticket[], ratio: (estimate: Estimate) => number): number | null {
  const total = tickets.reduce((s, t) => s + t.stake, 0);
  if (total <= 0) return null;
  return tickets.reduce((s, t) => s + ratio(t.estimate) * t.stake, 0) / total;
}

/**
 * Best candidate of one kind that passes its thresholds, walking the
 * ranking (evRatio, then expectedPayout). When none passes, the reasons of
 * the top-ranked candidate explain the dropped leg.
 */
export function pickLeg(estimates: Estimate[], config: GpiConfig): LegChoice {
  const ranked = rankEstimates(estimates);
  for (const candidate of ranked) {
    if (checkEstimate(candidate, config).length === 0) return { chosen: candidate, reasons: [] };
  }
  return { reasons: ranked.length > 0 ? checkEstimate(ranked[0], config) : [] };
}

export function allocationPolicy(raceId: string, config: GpiConfig): AllocationPolicy {
  return {
    budget: config.budget,
    kellyFraction: config.kellyFraction,
    exposureCapFraction: config.exposureCapFraction,
    minStakeIncrement: config.minStakeIncrement,
    maxTickets: config.maxTicketsPerRace,
    scope: `${raceId}:H5`,
  };
}

function isNewer(current: number | null, prior: number | null): boolean {
  return current !== null && prior !== null && current > prior;
}

/** True when any input recorded on the prior has been captured again since */
export function hasFresherInput(prior: InputTimes, current: InputTimes): boolean {
  return (
    isNewer(current.snapshotCapturedAt, prior.snapshotCapturedAt) ||
    isNewer(current.calibratedAt, prior.calibratedAt) ||
    isNewer(current.enrichmentCapturedAt, prior.enrichmentCapturedAt)
  );
}

function missingEnrichment(enrichment: RaceEnrichment | undefined): string[] {
  if (!enrichment) return ['jockeyTrainer', 'chrono'];
  const missing: string[] = [];
  if (!enrichment.jockeyTrainer) missing.push('jockeyTrainer');
  if (!enrichment.chrono) missing.push('chrono');
  return missing;
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class PipelineService {
  private readonly logger: Logger;
  private readonly estimator: Estimator;

  constructor(private readonly deps: PipelineServiceDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.estimator = deps.estimator ?? defaultEstimator;
  }

  async run(request: PhaseRequest, config: GpiConfig, options: RunOptions = {}): Promise<DecisionArtifact> {
    const phase = parsePhase(request.phase);
    const { raceId, asOf } = request;
    if (raceId.trim() === '') throw new ValidationError('raceId is required');
    if (!Number.isFinite(asOf)) throw new ValidationError('asOf must be an epoch timestamp in ms', { asOf });

    const { signal } = options;
    signal?.throwIfAborted();
    this.logger.info({ raceId, phase, asOf }, 'GPI phase starting');

    let artifact: DecisionArtifact;
    switch (phase) {
      case 'H30':
        artifact = await this.runH30(raceId, asOf, config, signal);
        break;
      case 'H5':
        artifact = await this.runH5(raceId, asOf, config, signal);
        break;
      case 'RESULT':
        artifact = await this.runResult(raceId, signal);
        break;
      default:
        return assertNever(phase);
    }

    // Last exit before anything is persisted
    signal?.throwIfAborted();
    const frozen = deepFreeze(artifact);
    await this.deps.sink.emit(frozen);
    if (frozen.trail.reconciliation) {
      await this.deps.sink.recordReconciliation(frozen.trail.reconciliation);
    }

    const { decision } = frozen;
    this.logger.info(
      {
        raceId,
        phase,
        reasonCode: decision.reasonCode,
        tickets: decision.tickets.length,
        totalStake: decision.totalStake,
        reasons: decision.reasons,
      },
      decision.abstain ? 'GPI abstain' : 'GPI play'
    );
    return frozen;
  }

  // ═══════════════════════════════════════════════════════════════
  // H30
  // ═══════════════════════════════════════════════════════════════

  private async runH30(
    raceId: string,
    asOf: number,
    config: GpiConfig,
    signal?: AbortSignal
  ): Promise<DecisionArtifact> {
    const snapshot = await this.fetchSnapshot(raceId, 'H30');
    signal?.throwIfAborted();
    if (snapshot instanceof DataUnavailableError) {
      this.logger.warn({ raceId, phase: 'H30', error: snapshot.message }, 'H30 snapshot unavailable');
      return this.unavailable('H30', raceId, snapshot, { config });
    }

    const fingerprint = inputsFingerprint({ phase: 'H30', raceId, asOf, snapshot, config });
    const ctx = this.contextFor('H30', snapshot, null, fingerprint);
    const market = evaluateMarket(snapshot, { asOf, requireCalibration: false }, config);
    const reasons = reasonMessages([market]);
    const message = market.passed
      ? `preliminary: market ok, overround ${snapshot.overround.toFixed(2)}`
      : `preliminary: market rejected (${reasons.join('; ')})`;

    return {
      decision: abstainDecision(ctx, 'PRELIMINARY', message, reasons),
      trail: emptyTrail({ verdicts: [market], overround: snapshot.overround, snapshot }),
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // H5
  // ═══════════════════════════════════════════════════════════════

  private async runH5(
    raceId: string,
    asOf: number,
    config: GpiConfig,
    signal?: AbortSignal
  ): Promise<DecisionArtifact> {
    const snapshot = await this.fetchSnapshot(raceId, 'H5');
    signal?.throwIfAborted();
    if (snapshot instanceof DataUnavailableError) {
      return this.unavailable('H5', raceId, snapshot, { config });
    }

    const enrichment = await this.deps.enrichment.fetch(raceId);
    signal?.throwIfAborted();
    const missing = missingEnrichment(enrichment);
    if (missing.length > 0) {
      const ctx = this.contextFor(
        'H5',
        snapshot,
        null,
        inputsFingerprint({ phase: 'H5', raceId, snapshot, enrichment: enrichment ?? null, config }),
        enrichment?.capturedAt ?? null
      );
      return {
        decision: abstainDecision(ctx, 'ENRICHMENT_MISSING', 'enrichment missing', [
          `enrichment missing: ${missing.join(', ')}`,
        ]),
        trail: emptyTrail({ overround: snapshot.overround, snapshot }),
      };
    }

    let model: PayoutModel;
    try {
      model = await this.deps.calibration.load(raceId);
    } catch (err) {
      if (!(err instanceof DataUnavailableError)) throw err;
      signal?.throwIfAborted();
      return this.unavailable('H5', raceId, err, { snapshot, enrichment, config });
    }
    signal?.throwIfAborted();

    const fingerprint = inputsFingerprint({
      phase: 'H5',
      raceId,
      asOf,
      snapshot,
      enrichment,
      calibration: model.signature,
      config,
    });
    const ctx = this.contextFor('H5', snapshot, model.calibratedAt, fingerprint, enrichment?.capturedAt ?? null);

    const drift = await this.driftAgainstH30(snapshot, config);
    signal?.throwIfAborted();
    const trail = emptyTrail({
      drift,
      top5: topRunners(snapshot, model),
      overround: snapshot.overround,
      snapshot,
    });

    // MARKET
    const market = evaluateMarket(snapshot, { asOf, calibratedAt: model.calibratedAt, requireCalibration: true }, config);
    trail.verdicts.push(market);
    if (!market.passed) {
      const reasons = reasonMessages([market]);
      return {
        decision: abstainDecision(ctx, 'MARKET_REJECTED', `market rejected: ${reasons.join('; ')}`, reasons),
        trail,
      };
    }

    // No-regression
    const regression = await this.regressionNote(raceId, fingerprint, ctx);
    signal?.throwIfAborted();
    if (regression) {
      return {
        decision: abstainDecision(ctx, 'NO_FRESH_DATA', 'no fresh data: earlier stricter decision stands', [
          regression,
        ]),
        trail,
      };
    }

    // ESTIMATES
    const spEstimates = spSelections(snapshot, config).map((s) => this.estimator.estimate(snapshot, s, model, config));
    const comboEstimates = comboSelections(snapshot, model, config).map((s) =>
      this.estimator.estimate(snapshot, s, model, config)
    );
    trail.estimates.push(...spEstimates, ...comboEstimates);

    const sp = pickLeg(spEstimates, config);
    const combo = pickLeg(comboEstimates, config);
    const estimatesVerdict = buildVerdict('ESTIMATES', [...sp.reasons, ...combo.reasons]);
    trail.verdicts.push(estimatesVerdict);

    const qualifying = [sp.chosen, combo.chosen].filter((e): e is Estimate => e !== undefined);
    if (qualifying.length === 0) {
      const reasons = reasonMessages([estimatesVerdict]);
      return {
        decision: abstainDecision(ctx, 'NO_QUALIFYING_LEG', 'no qualifying leg', reasons),
        trail,
      };
    }

    // STAKING
    const allocation = allocate(qualifying, allocationPolicy(raceId, config));
    trail.dropped.push(...allocation.dropped);
    const legNotes = [...reasonMessages([estimatesVerdict]), ...allocation.dropped.map(droppedNote)];

    if (allocation.tickets.length === 0) {
      return {
        decision: abstainDecision(ctx, 'STAKE_BELOW_INCREMENT', 'no leg sized above the stake increment', legNotes),
        trail,
      };
    }

    // GLOBAL
    const tickets = allocation.tickets;
    const items = tickets.map((t) => ({ kind: t.kind, evRatio: t.estimate.evRatio, stake: t.stake }));
    const globalVerdict = evaluateGlobal(items, config);
    trail.verdicts.push(globalVerdict);
    const evGlobal = computeEvGlobal(items);
    const roiGlobal = stakeWeighted(tickets, (e) => e.roiRatio);

    if (!globalVerdict.passed) {
      const reasons = [...legNotes, ...reasonMessages([globalVerdict])];
      return {
        decision: abstainDecision(ctx, 'GLOBAL_EV_REJECTED', 'global ev rejected', reasons, evGlobal, roiGlobal),
        trail,
      };
    }

    return { decision: playDecision(ctx, tickets, legNotes, evGlobal, roiGlobal), trail };
  }

  // ═══════════════════════════════════════════════════════════════
  // RESULT
  // ═══════════════════════════════════════════════════════════════

  private async runResult(raceId: string, signal?: AbortSignal): Promise<DecisionArtifact> {
    // A later abstaining H5 must not hide the decision that placed tickets
    const prior =
      (await this.deps.history.latestTicketed(raceId, 'H5')) ?? (await this.deps.history.latest(raceId, 'H5'));
    signal?.throwIfAborted();

    let report: ReconciliationReport;
    let published: unknown = null;

    if (!prior) {
      report = noTicketsReport(raceId, 'no H5 decision to reconcile');
    } else if (prior.tickets.length === 0) {
      report = noTicketsReport(raceId, `H5 decision ${prior.reasonCode} has no tickets`);
    } else {
      try {
        const result = await this.deps.results.fetch(raceId);
        published = result;
        report = reconcile(raceId, prior.tickets, result, prior.starters);
      } catch (err) {
        if (signal?.aborted) throw err;
        this.logger.error({ raceId, phase: 'RESULT', error: errorMessage(err) }, 'Reconciliation failed');
        report = failedReport(
          raceId,
          err instanceof DataUnavailableError ? err.message : `reconciliation error: ${errorMessage(err)}`
        );
      }
      signal?.throwIfAborted();
    }

    const ctx: DecisionContext = {
      phase: 'RESULT',
      raceId,
      meetingId: prior?.meetingId ?? null,
      snapshotCapturedAt: null,
      calibratedAt: null,
      enrichmentCapturedAt: null,
      inputsFingerprint: inputsFingerprint({
        phase: 'RESULT',
        raceId,
        h5: prior?.inputsFingerprint ?? null,
        result: published,
        status: report.status,
      }),
    };
    const reasons = report.status === 'RECONCILED' || report.status === 'NO_TICKETS' ? [] : [report.message];

    return {
      decision: abstainDecision(ctx, 'RESULT_PHASE', `result: ${report.message}`, reasons),
      trail: emptyTrail({ reconciliation: report }),
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════

  private async fetchSnapshot(raceId: string, phase: 'H30' | 'H5'): Promise<RaceSnapshot | DataUnavailableError> {
    try {
      return await this.deps.snapshots.fetch(raceId, phase);
    } catch (err) {
      if (err instanceof DataUnavailableError) return err;
      throw err;
    }
  }

  private contextFor(
    phase: Phase,
    snapshot: RaceSnapshot,
    calibratedAt: number | null,
    fingerprint: string,
    enrichmentCapturedAt: number | null = null
  ): DecisionContext {
    return {
      phase,
      raceId: snapshot.raceId,
      meetingId: snapshot.meetingId,
      snapshotCapturedAt: snapshot.capturedAt,
      calibratedAt,
      enrichmentCapturedAt,
      inputsFingerprint: fingerprint,
    };
  }

  private unavailable(
    phase: 'H30' | 'H5',
    raceId: string,
    err: DataUnavailableError,
    inputs: { snapshot?: RaceSnapshot; enrichment?: RaceEnrichment; config: GpiConfig }
  ): DecisionArtifact {
    const { snapshot, enrichment, config } = inputs;
    const fingerprint = inputsFingerprint({
      phase,
      raceId,
      snapshot: snapshot ?? null,
      enrichment: enrichment ?? null,
      unavailable: err.message,
      config,
    });
    const ctx: DecisionContext = snapshot
      ? this.contextFor(phase, snapshot, null, fingerprint, enrichment?.capturedAt ?? null)
      : {
          phase,
          raceId,
          meetingId: null,
          snapshotCapturedAt: null,
          calibratedAt: null,
          enrichmentCapturedAt: null,
          inputsFingerprint: fingerprint,
        };
    return {
      decision: abstainDecision(ctx, 'DATA_UNAVAILABLE', `data unavailable: ${err.message}`, [err.message]),
      trail: emptyTrail({ overround: snapshot?.overround ?? null, snapshot: snapshot ?? null }),
    };
  }

  private async driftAgainstH30(snapshot: RaceSnapshot, config: GpiConfig): Promise<DriftEntry[]> {
    const h30 = await this.fetchSnapshot(snapshot.raceId, 'H30');
    if (h30 instanceof DataUnavailableError) {
      this.logger.warn({ raceId: snapshot.raceId, error: h30.message }, 'No H30 snapshot, drift not computed');
      return [];
    }
    return computeDrift(h30, snapshot, config.spBetType, config.driftThreshold);
  }

  /**
   * A stricter earlier decision (failed H30 market, or an H5 abstain on
   * market, thresholds or staleness) stands until one of the inputs it
   * recorded (snapshot, calibration, enrichment) is captured again.
   * A prior with the same fingerprint saw the same inputs and is ignored.
   */
  private async regressionNote(raceId: string, fingerprint: string, current: InputTimes): Promise<string | undefined> {
    const [h30, h5] = await Promise.all([
      this.deps.history.latest(raceId, 'H30'),
      this.deps.history.latest(raceId, 'H5'),
    ]);
    const priors: ArtifactRecord[] = [];
    if (h30 && h30.marketPassed === false) priors.push(h30);
    if (h5 && STRICTER_H5_CODES.has(h5.reasonCode)) priors.push(h5);

    for (const prior of priors) {
      if (prior.inputsFingerprint === fingerprint || prior.snapshotCapturedAt === null) continue;
      if (current.snapshotCapturedAt !== null && !hasFresherInput(prior, current)) {
        const label = prior.phase === 'H30' ? 'H30 market rejection' : `H5 ${prior.reasonCode}`;
        return `${label} stands: snapshot captured at ${new Date(
          current.snapshotCapturedAt
        ).toISOString()} is not newer than ${new Date(prior.snapshotCapturedAt).toISOString()}`;
      }
    }
    return undefined;
  }
}

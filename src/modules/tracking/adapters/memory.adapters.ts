/**
 * TRACKING — In-memory adapters
 *
 * Back the simulate endpoint and the tests. Same contracts as the MongoDB
 * adapters, no persistence beyond the process.
 */

import { DataUnavailableError } from '../../../common/errors.js';
import { sha256 } from '../../../common/hash.js';
import type { PayoutModel } from '../../estimator/estimator.types.js';
import type { RaceSnapshot, SnapshotPhase } from '../../race-snapshot/contracts/snapshot.types.js';
import type { DecisionArtifact } from '../../pipeline/contracts/decision.types.js';
import type { Phase } from '../../pipeline/contracts/phase.js';
import { toArtifactRecord } from '../artifact.record.js';
import type {
  ArtifactRecord,
  ArtifactSink,
  CalibrationSource,
  DecisionHistory,
  EnrichmentSource,
  OfficialResult,
  PipelinePorts,
  RaceEnrichment,
  ReconciliationReport,
  ResultsSource,
  SnapshotSource,
} from '../tracking.types.js';

export class InMemorySnapshotSource implements SnapshotSource {
  private readonly snapshots = new Map<string, RaceSnapshot>();

  put(snapshot: RaceSnapshot): this {
    this.snapshots.set(`${snapshot.raceId}:${snapshot.phase}`, snapshot);
    return this;
  }

  async fetch(raceId: string, phase: SnapshotPhase): Promise<RaceSnapshot> {
    const snapshot = this.snapshots.get(`${raceId}:${phase}`);
    if (!snapshot) throw new DataUnavailableError(`No ${phase} snapshot for ${raceId}`, { raceId, phase });
    return snapshot;
  }
}

export class InMemoryEnrichmentSource implements EnrichmentSource {
  private readonly entries = new Map<string, RaceEnrichment>();

  put(enrichment: RaceEnrichment): this {
    this.entries.set(enrichment.raceId, enrichment);
    return this;
  }

  async fetch(raceId: string): Promise<RaceEnrichment | undefined> {
    return this.entries.get(raceId);
  }
}

export class InMemoryCalibrationSource implements CalibrationSource {
  private readonly models = new Map<string, PayoutModel>();

  put(raceId: string, model: PayoutModel): this {
    this.models.set(raceId, model);
    return this;
  }

  async load(raceId: string): Promise<PayoutModel> {
    const model = this.models.get(raceId);
    if (!model) throw new DataUnavailableError(`No calibration for ${raceId}`, { raceId });
    return model;
  }
}

export class InMemoryResultsSource implements ResultsSource {
  private readonly results = new Map<string, OfficialResult>();

  put(result: OfficialResult): this {
    this.results.set(result.raceId, result);
    return this;
  }

  async fetch(raceId: string): Promise<OfficialResult> {
    const result = this.results.get(raceId);
    if (!result) throw new DataUnavailableError(`No official result for ${raceId}`, { raceId });
    return result;
  }
}

/**
 * Sink and history in one: emitted artifacts become the history.
 * Re-emitting the same decision on the same (raceId, phase, fingerprint)
 * replaces the entry and moves it to the end, like the MongoDB upsert.
 */
export class InMemoryArtifactStore implements ArtifactSink, DecisionHistory {
  readonly artifacts: DecisionArtifact[] = [];
  readonly reconciliations: ReconciliationReport[] = [];
  private readonly seeded: ArtifactRecord[] = [];

  async emit(artifact: DecisionArtifact): Promise<void> {
    const { raceId, phase, inputsFingerprint } = artifact.decision;
    const digest = sha256(artifact.decision);
    const index = this.artifacts.findIndex(
      (a) =>
        a.decision.raceId === raceId &&
        a.decision.phase === phase &&
        a.decision.inputsFingerprint === inputsFingerprint &&
        sha256(a.decision) === digest
    );
    if (index >= 0) this.artifacts.splice(index, 1);
    this.artifacts.push(artifact);
  }

  async recordReconciliation(report: ReconciliationReport): Promise<void> {
    this.reconciliations.push(report);
  }

  /** Seed a prior decision without running the pipeline */
  seed(record: ArtifactRecord): this {
    this.seeded.push(record);
    return this;
  }

  private records(raceId: string): ArtifactRecord[] {
    return [...this.seeded, ...this.artifacts.map(toArtifactRecord)].filter((r) => r.raceId === raceId);
  }

  async latest(raceId: string, phase: Phase): Promise<ArtifactRecord | undefined> {
    const matching = this.records(raceId).filter((r) => r.phase === phase);
    return matching[matching.length - 1];
  }

  async latestTicketed(raceId: string, phase: Phase): Promise<ArtifactRecord | undefined> {
    const matching = this.records(raceId).filter((r) => r.phase === phase && r.tickets.length > 0);
    return matching[matching.length - 1];
  }

  async list(raceId: string, options: { phase?: Phase; limit?: number } = {}): Promise<ArtifactRecord[]> {
    const { phase, limit = 50 } = options;
    return this.records(raceId)
      .filter((r) => phase === undefined || r.phase === phase)
      .reverse()
      .slice(0, limit);
  }
}

export interface InMemoryPorts extends PipelinePorts {
  snapshots: InMemorySnapshotSource;
  enrichment: InMemoryEnrichmentSource;
  calibration: InMemoryCalibrationSource;
  results: InMemoryResultsSource;
  sink: InMemoryArtifactStore;
  history: InMemoryArtifactStore;
}

export function createInMemoryPorts(): InMemoryPorts {
  const store = new InMemoryArtifactStore();
  return {
    snapshots: new InMemorySnapshotSource(),
    enrichment: new InMemoryEnrichmentSource(),
    calibration: new InMemoryCalibrationSource(),
    results: new InMemoryResultsSource(),
    sink: store,
    history: store,
  };
}

/**
 * TRACKING — MongoDB adapters
 *
 * Every document read back is validated before it reaches the pipeline;
 * a malformed document is treated as missing data.
 */

import type { ZodError } from 'zod';
import { DataUnavailableError } from '../../../common/errors.js';
import type { PayoutModel } from '../../estimator/estimator.types.js';
import {
  CalibratedPayoutModel,
  raceCalibrationSchema,
  type PayoutCalibration,
} from '../../estimator/services/payout.model.js';
import { rawSnapshotSchema } from '../../race-snapshot/contracts/snapshot.schema.js';
import type { RaceSnapshot, SnapshotPhase } from '../../race-snapshot/contracts/snapshot.types.js';
import { normalizeSnapshot } from '../../race-snapshot/services/market.service.js';
import { RaceSnapshotModel } from '../../race-snapshot/storage/snapshot.model.js';
import type { DecisionArtifact } from '../../pipeline/contracts/decision.types.js';
import type { Phase } from '../../pipeline/contracts/phase.js';
import { toArtifactRecord } from '../artifact.record.js';
import { DecisionArtifactModel, ReconciliationModel } from '../storage/artifact.model.js';
import { OfficialResultModel, RaceCalibrationModel, RaceEnrichmentModel } from '../storage/inputs.models.js';
import { artifactRecordSchema, officialResultSchema, raceEnrichmentSchema } from '../tracking.schema.js';
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

function issuesOf(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

export class MongoSnapshotSource implements SnapshotSource {
  async fetch(raceId: string, phase: SnapshotPhase): Promise<RaceSnapshot> {
    const doc = await RaceSnapshotModel.findOne({ raceId, phase }).lean();
    if (!doc) throw new DataUnavailableError(`No ${phase} snapshot for ${raceId}`, { raceId, phase });

    const parsed = rawSnapshotSchema.safeParse(doc);
    if (!parsed.success) {
      throw new DataUnavailableError(`Malformed ${phase} snapshot for ${raceId}: ${issuesOf(parsed.error)}`, {
        raceId,
        phase,
      });
    }
    return normalizeSnapshot(parsed.data);
  }
}

export class MongoEnrichmentSource implements EnrichmentSource {
  async fetch(raceId: string): Promise<RaceEnrichment | undefined> {
    const doc = await RaceEnrichmentModel.findOne({ raceId }).lean();
    if (!doc) return undefined;
    const parsed = raceEnrichmentSchema.safeParse(doc);
    return parsed.success ? parsed.data : undefined;
  }
}

export class MongoCalibrationSource implements CalibrationSource {
  constructor(private readonly payoutCalibration: PayoutCalibration) {}

  async load(raceId: string): Promise<PayoutModel> {
    const doc = await RaceCalibrationModel.findOne({ raceId }).lean();
    if (!doc) throw new DataUnavailableError(`No calibration for ${raceId}`, { raceId });

    const parsed = raceCalibrationSchema.safeParse(doc);
    if (!parsed.success) {
      throw new DataUnavailableError(`Malformed calibration for ${raceId}: ${issuesOf(parsed.error)}`, { raceId });
    }
    return new CalibratedPayoutModel(parsed.data, this.payoutCalibration);
  }
}

export class MongoResultsSource implements ResultsSource {
  async fetch(raceId: string): Promise<OfficialResult> {
    const doc = await OfficialResultModel.findOne({ raceId }).lean();
    if (!doc) throw new DataUnavailableError(`No official result for ${raceId}`, { raceId });

    const parsed = officialResultSchema.safeParse(doc);
    if (!parsed.success) {
      throw new DataUnavailableError(`Malformed result for ${raceId}: ${issuesOf(parsed.error)}`, { raceId });
    }
    return parsed.data;
  }
}

export class MongoArtifactStore implements ArtifactSink, DecisionHistory {
  async emit(artifact: DecisionArtifact): Promise<void> {
    const record = toArtifactRecord(artifact);
    await DecisionArtifactModel.updateOne(
      {
        raceId: record.raceId,
        phase: record.phase,
        inputsFingerprint: record.inputsFingerprint,
        decisionDigest: record.decisionDigest,
      },
      {
        $set: {
          ...record,
          // Frozen graphs are cloned before mongoose casts them
          decision: structuredClone(artifact.decision),
          trail: structuredClone(artifact.trail),
        },
      },
      { upsert: true }
    );
  }

  async recordReconciliation(report: ReconciliationReport): Promise<void> {
    await ReconciliationModel.updateOne({ raceId: report.raceId }, { $set: structuredClone(report) }, { upsert: true });
  }

  private toRecords(docs: unknown[]): ArtifactRecord[] {
    const records: ArtifactRecord[] = [];
    for (const doc of docs) {
      const parsed = artifactRecordSchema.safeParse(doc);
      if (parsed.success) records.push(parsed.data);
    }
    return records;
  }

  async latest(raceId: string, phase: Phase): Promise<ArtifactRecord | undefined> {
    const docs = await DecisionArtifactModel.find({ raceId, phase }).sort({ updatedAt: -1 }).limit(1).lean();
    return this.toRecords(docs)[0];
  }

  async latestTicketed(raceId: string, phase: Phase): Promise<ArtifactRecord | undefined> {
    const docs = await DecisionArtifactModel.find({ raceId, phase, 'tickets.0': { $exists: true } })
      .sort({ updatedAt: -1 })
      .limit(1)
      .lean();
    return this.toRecords(docs)[0];
  }

  async list(raceId: string, options: { phase?: Phase; limit?: number } = {}): Promise<ArtifactRecord[]> {
    const { phase, limit = 50 } = options;
    const query = phase ? { raceId, phase } : { raceId };
    const docs = await DecisionArtifactModel.find(query).sort({ updatedAt: -1 }).limit(limit).lean();
    return this.toRecords(docs);
  }
}

export function createMongoPorts(payoutCalibration: PayoutCalibration): PipelinePorts {
  const store = new MongoArtifactStore();
  return {
    snapshots: new MongoSnapshotSource(),
    enrichment: new MongoEnrichmentSource(),
    calibration: new MongoCalibrationSource(payoutCalibration),
    results: new MongoResultsSource(),
    sink: store,
    history: store,
  };
}

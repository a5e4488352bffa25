/**
 * TRACKING — Decision artifact storage
 *
 * One document per (raceId, phase, inputsFingerprint, decisionDigest).
 * A re-run reaching the same decision on identical inputs upserts the same
 * document; a different decision is stored beside it, never over it.
 */

import mongoose, { Schema } from 'mongoose';
import type { ArtifactRecord, ReconciliationReport } from '../tracking.types.js';

export interface DecisionArtifactDoc extends ArtifactRecord {
  decision: unknown;
  trail: unknown;
}

const TicketSummarySchema = new Schema(
  {
    id: { type: String, required: true },
    kind: { type: String, required: true, enum: ['SP', 'COMBO'] },
    betType: { type: String, required: true },
    stake: { type: Number, required: true },
    runners: { type: [String], default: [] },
  },
  { _id: false }
);

const DecisionArtifactSchema = new Schema<DecisionArtifactDoc>(
  {
    raceId: { type: String, required: true, index: true },
    meetingId: { type: String, default: null },
    phase: { type: String, required: true, enum: ['H30', 'H5', 'RESULT'] },
    abstain: { type: Boolean, required: true },
    reasonCode: { type: String, required: true, index: true },
    message: { type: String, required: true },
    inputsFingerprint: { type: String, required: true },
    decisionDigest: { type: String, required: true },
    snapshotCapturedAt: { type: Number, default: null },
    calibratedAt: { type: Number, default: null },
    enrichmentCapturedAt: { type: Number, default: null },
    marketPassed: { type: Boolean, default: null },
    starters: { type: Number, default: null },
    totalStake: { type: Number, required: true },
    tickets: { type: [TicketSummarySchema], default: [] },

    decision: { type: Schema.Types.Mixed, required: true },
    trail: { type: Schema.Types.Mixed, required: true },
  },
  {
    collection: 'gpi_decision_artifacts',
    timestamps: true,
    minimize: false,
  }
);

DecisionArtifactSchema.index({ raceId: 1, phase: 1, inputsFingerprint: 1, decisionDigest: 1 }, { unique: true });
DecisionArtifactSchema.index({ raceId: 1, phase: 1, updatedAt: -1 });

export const DecisionArtifactModel = mongoose.model<DecisionArtifactDoc>(
  'GpiDecisionArtifact',
  DecisionArtifactSchema
);

const ReconciledTicketSchema = new Schema(
  {
    id: { type: String, required: true },
    betType: { type: String, required: true },
    runners: { type: [String], default: [] },
    stake: { type: Number, required: true },
    won: { type: Boolean, required: true },
    dividend: { type: Number, default: null },
    return: { type: Number, required: true },
  },
  { _id: false }
);

const ReconciliationSchema = new Schema<ReconciliationReport>(
  {
    raceId: { type: String, required: true, unique: true },
    status: { type: String, required: true, enum: ['RECONCILED', 'INCOMPLETE', 'NO_TICKETS', 'FAILED'] },
    message: { type: String, required: true },
    tickets: { type: [ReconciledTicketSchema], default: [] },
    totalStake: { type: Number, required: true },
    totalReturn: { type: Number, required: true },
    profit: { type: Number, required: true },
    roi: { type: Number, default: null },
  },
  { collection: 'gpi_reconciliations', timestamps: true }
);

export const ReconciliationModel = mongoose.model<ReconciliationReport>('GpiReconciliation', ReconciliationSchema);

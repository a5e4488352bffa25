/**
 * TRACKING — MongoDB models for pipeline inputs
 *
 * Enrichment, calibration and official results, one document per race.
 * Written by the acquisition side, read by the adapters.
 */

import mongoose, { Schema } from 'mongoose';
import type { RaceCalibration } from '../../estimator/services/payout.model.js';
import type { OfficialResult, RaceEnrichment } from '../tracking.types.js';

const RaceEnrichmentSchema = new Schema<RaceEnrichment>(
  {
    raceId: { type: String, required: true, unique: true },
    capturedAt: { type: Number, required: true },
    jockeyTrainer: { type: Schema.Types.Mixed },
    chrono: { type: Schema.Types.Mixed },
  },
  { collection: 'gpi_race_enrichment', timestamps: true, minimize: false }
);

export const RaceEnrichmentModel = mongoose.model<RaceEnrichment>('GpiRaceEnrichment', RaceEnrichmentSchema);

const RaceCalibrationSchema = new Schema<RaceCalibration>(
  {
    raceId: { type: String, required: true, unique: true },
    calibratedAt: { type: Number, required: true },
    runners: { type: Schema.Types.Mixed, required: true },
  },
  { collection: 'gpi_race_calibration', timestamps: true, minimize: false }
);

export const RaceCalibrationModel = mongoose.model<RaceCalibration>('GpiRaceCalibration', RaceCalibrationSchema);

const OfficialResultSchema = new Schema<OfficialResult>(
  {
    raceId: { type: String, required: true, unique: true },
    arrival: { type: [String], required: true },
    dividends: { type: Schema.Types.Mixed, required: true },
    placeDividends: { type: Schema.Types.Mixed },
    starters: { type: Number },
    publishedAt: { type: Number, required: true },
  },
  { collection: 'gpi_official_results', timestamps: true, minimize: false }
);

export const OfficialResultModel = mongoose.model<OfficialResult>('GpiOfficialResult', OfficialResultSchema);

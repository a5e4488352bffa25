/**
 * RACE SNAPSHOT — MongoDB model
 *
 * Written by the acquisition side, one document per (raceId, phase).
 * Only read here.
 */

import mongoose, { Schema } from 'mongoose';
import type { RawRaceSnapshot } from '../contracts/snapshot.types.js';

const RunnerSchema = new Schema(
  {
    id: { type: String, required: true },
    number: { type: Number, required: true },
    name: { type: String, required: true },
    winOdds: { type: Number, required: true },
    placeOdds: { type: Number },
    scratched: { type: Boolean, required: true, default: false },
  },
  { _id: false }
);

const RaceSnapshotSchema = new Schema<RawRaceSnapshot>(
  {
    meetingId: { type: String, required: true, index: true },
    raceId: { type: String, required: true },
    phase: { type: String, required: true, enum: ['H30', 'H5'] },
    capturedAt: { type: Number, required: true },
    race: {
      discipline: { type: String },
      label: { type: String },
      handicap: { type: Boolean },
    },
    inputs: {
      odds: { type: Number, required: true },
      runners: { type: Number, required: true },
      scratches: { type: Number, required: true },
    },
    runners: { type: [RunnerSchema], default: [] },
    overround: { type: Number },
  },
  {
    collection: 'gpi_race_snapshots',
    timestamps: true,
  }
);

RaceSnapshotSchema.index({ raceId: 1, phase: 1 }, { unique: true });

export const RaceSnapshotModel = mongoose.model<RawRaceSnapshot>('GpiRaceSnapshot', RaceSnapshotSchema);

/**
 * TRACKING MODULE — Index
 */

export * from './tracking.types.js';
export { toArtifactRecord } from './artifact.record.js';
export { artifactRecordSchema, officialResultSchema, raceEnrichmentSchema } from './tracking.schema.js';
export {
  createInMemoryPorts,
  InMemoryArtifactStore,
  InMemoryCalibrationSource,
  InMemoryEnrichmentSource,
  InMemoryResultsSource,
  InMemorySnapshotSource,
  type InMemoryPorts,
} from './adapters/memory.adapters.js';
export { createMongoPorts, MongoArtifactStore } from './adapters/mongo.adapters.js';

/**
 * RACE SNAPSHOT MODULE — Index
 */

export * from './contracts/snapshot.types.js';
export { rawSnapshotSchema, runnerSchema } from './contracts/snapshot.schema.js';
export {
  activeRunners,
  classifyDrift,
  computeDrift,
  computeOverround,
  findRunner,
  isUsableOdds,
  normalizeSnapshot,
  spMarketOdds,
} from './services/market.service.js';

/**
 * PIPELINE MODULE — Index
 */

export * from './contracts/decision.types.js';
export { PHASES, isPhase, parsePhase, type Phase } from './contracts/phase.js';
export { toArtifactView } from './services/artifact.view.js';
export { PhaseRunGuard, phaseKey, type PhaseExecution, type PhaseRunGuardConfig } from './services/phase.guard.js';
export {
  allocationPolicy,
  inputsFingerprint,
  pickLeg,
  PipelineService,
  stakeWeighted,
  type PipelineServiceDeps,
  type RunOptions,
} from './services/pipeline.service.js';
export { failedReport, isWinningTicket, noTicketsReport, placesPaid, reconcile } from './services/reconciliation.service.js';
export { registerGpiRoutes, type GpiRouteDeps } from './routes/pipeline.routes.js';

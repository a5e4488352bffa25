import { sha256 } from '../../common/hash.js';
import type { DecisionArtifact } from '../pipeline/contracts/decision.types.js';
import type { Ticket } from '../staking/staking.types.js';
import { activeRunners } from '../race-snapshot/services/market.service.js';
import type { ArtifactRecord } from './tracking.types.js';

export function toArtifactRecord(artifact: DecisionArtifact): ArtifactRecord {
  const { decision, trail } = artifact;
  const market = trail.verdicts.find((v) => v.stage === 'MARKET');
  const tickets: Ticket[] = decision.tickets;
  return {
    raceId: decision.raceId,
    meetingId: decision.meetingId,
    phase: decision.phase,
    abstain: decision.abstain,
    reasonCode: decision.reasonCode,
    message: decision.message,
    inputsFingerprint: decision.inputsFingerprint,
    decisionDigest: sha256(decision),
    snapshotCapturedAt: decision.snapshotCapturedAt,
    calibratedAt: decision.calibratedAt,
    enrichmentCapturedAt: decision.enrichmentCapturedAt,
    marketPassed: market ? market.passed : null,
    starters: trail.snapshot ? activeRunners(trail.snapshot).length : null,
    totalStake: decision.totalStake,
    tickets: tickets.map((t) => ({
      id: t.id,
      kind: t.kind,
      betType: t.betType,
      stake: t.stake,
      runners: [...t.runners],
    })),
  };
}

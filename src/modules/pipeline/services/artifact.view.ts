import { roundTo } from '../../../common/numbers.js';
import type { Ticket } from '../../staking/staking.types.js';
import type { Decision, DecisionView } from '../contracts/decision.types.js';

function round2(value: number | null): number | null {
  return value === null ? null : roundTo(value, 2);
}

/** Presentation copy; the stored decision keeps unrounded ratios */
export function toArtifactView(decision: Decision): DecisionView {
  const tickets: Ticket[] = decision.tickets;
  return {
    policyVersion: decision.policyVersion,
    phase: decision.phase,
    meetingId: decision.meetingId,
    raceId: decision.raceId,
    abstain: decision.abstain,
    reasonCode: decision.reasonCode,
    message: decision.message,
    reasons: [...decision.reasons],
    evGlobalEstimate: round2(decision.evGlobalEstimate),
    roiGlobalEstimate: round2(decision.roiGlobalEstimate),
    totalStake: roundTo(decision.totalStake, 2),
    inputsFingerprint: decision.inputsFingerprint,
    tickets: tickets.map((t) => ({
      id: t.id,
      kind: t.kind,
      betType: t.betType,
      stake: roundTo(t.stake, 2),
      runners: [...t.runners],
      evRatio: roundTo(t.estimate.evRatio, 2),
      roiRatio: roundTo(t.estimate.roiRatio, 2),
      expectedPayout: roundTo(t.estimate.expectedPayout, 2),
    })),
  };
}

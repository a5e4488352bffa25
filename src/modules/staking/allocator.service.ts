/**
 * STAKING — Allocator
 *
 * Turns at most one SP and one COMBO estimate into tickets:
 *   1. one candidate per kind, SP first, capped at maxTickets
 *   2. raw stake = budget · kellyFraction · f*, clamped to [0, budget]
 *   3. SP + COMBO over budget → COMBO shrinks first
 *   4. per-runner exposure across tickets ≤ exposureCapFraction · budget
 *   5. round down to minStakeIncrement
 * Legs that end below one increment are dropped with a reason.
 */

import { v5 as uuidv5 } from 'uuid';
import { AllocationFailureError } from '../../common/errors.js';
import type { Estimate } from '../estimator/estimator.types.js';
import { estimateKey, rankEstimates } from '../estimator/services/estimator.service.js';
import { clamp, floorToIncrement, kellyFraction } from './kelly.js';
import type { AllocationPolicy, AllocationResult, DropReason, DroppedLeg, Ticket } from './staking.types.js';

const TICKET_NAMESPACE = '6f1c1f7e-3b0a-5d43-9a57-1e0c2f8b7d21';

export function ticketId(scope: string, estimate: Pick<Estimate, 'kind' | 'betType' | 'involvedRunners'>): string {
  return uuidv5(`${scope}:${estimate.kind}:${estimateKey(estimate)}`, TICKET_NAMESPACE);
}

export function validatePolicy(policy: AllocationPolicy): void {
  const { budget, kellyFraction: kf, exposureCapFraction, minStakeIncrement, maxTickets } = policy;
  if (!Number.isFinite(budget) || budget <= 0) {
    throw new AllocationFailureError(`budget must be a positive amount, got ${budget}`);
  }
  if (!Number.isFinite(minStakeIncrement) || minStakeIncrement <= 0) {
    throw new AllocationFailureError(`minStakeIncrement must be positive, got ${minStakeIncrement}`);
  }
  if (!Number.isFinite(kf) || kf <= 0 || kf > 1) {
    throw new AllocationFailureError(`kellyFraction must be in (0, 1], got ${kf}`);
  }
  if (!Number.isFinite(exposureCapFraction) || exposureCapFraction <= 0 || exposureCapFraction > 1) {
    throw new AllocationFailureError(`exposureCapFraction must be in (0, 1], got ${exposureCapFraction}`);
  }
  if (!Number.isInteger(maxTickets) || maxTickets < 1) {
    throw new AllocationFailureError(`maxTickets must be a positive integer, got ${maxTickets}`);
  }
}

function drop(estimate: Estimate, reason: DropReason, note: string): DroppedLeg {
  return {
    kind: estimate.kind,
    betType: estimate.betType,
    runners: [...estimate.involvedRunners],
    reason,
    note,
  };
}

/** Best candidate per kind, SP before COMBO, at most maxTickets */
export function selectLegs(
  estimates: Estimate[],
  maxTickets: number
): { legs: Estimate[]; dropped: DroppedLeg[] } {
  const dropped: DroppedLeg[] = [];
  const usable: Estimate[] = [];

  for (const e of estimates) {
    if (e.failure) dropped.push(drop(e, 'ESTIMATION_FAILURE', e.failure.detail));
    else usable.push(e);
  }

  const legs: Estimate[] = [];
  for (const kind of ['SP', 'COMBO'] as const) {
    const [best, ...rest] = rankEstimates(usable.filter((e) => e.kind === kind));
    if (!best) continue;
    legs.push(best);
    for (const other of rest) {
      dropped.push(drop(other, 'DUPLICATE_KIND', `kept ${estimateKey(best)}`));
    }
  }

  for (const leg of legs.slice(maxTickets)) {
    dropped.push(drop(leg, 'TICKET_CAP', `maxTickets ${maxTickets}`));
  }
  return { legs: legs.slice(0, maxTickets), dropped };
}

export function rawKellyStake(estimate: Estimate, policy: AllocationPolicy): number {
  const f = kellyFraction(estimate.hitProbability, estimate.payoutOdds);
  return clamp(policy.budget * policy.kellyFraction * f, 0, policy.budget);
}

export function allocate(estimates: Estimate[], policy: AllocationPolicy): AllocationResult {
  validatePolicy(policy);

  const { legs, dropped } = selectLegs(estimates, policy.maxTickets);
  const cap = policy.exposureCapFraction * policy.budget;
  const tickets: Ticket[] = [];

  const sp = legs.find((e) => e.kind === 'SP');
  const combo = legs.find((e) => e.kind === 'COMBO');

  let spStake = 0;
  if (sp) {
    const raw = rawKellyStake(sp, policy);
    if (raw <= 0) {
      dropped.push(drop(sp, 'ZERO_KELLY', 'no positive Kelly edge at payout odds'));
    } else {
      const capped = Math.min(raw, cap);
      spStake = floorToIncrement(capped, policy.minStakeIncrement);
      if (spStake < policy.minStakeIncrement) {
        spStake = 0;
        dropped.push(
          drop(sp, capped < raw ? 'EXPOSURE_CAP' : 'BELOW_INCREMENT', `raw stake ${raw.toFixed(4)} rounds to zero`)
        );
      } else {
        tickets.push({
          id: ticketId(policy.scope, sp),
          kind: 'SP',
          betType: sp.betType,
          stake: spStake,
          runners: [...sp.involvedRunners],
          estimate: sp,
        });
      }
    }
  }

  if (combo) {
    const raw = rawKellyStake(combo, policy);
    if (raw <= 0) {
      dropped.push(drop(combo, 'ZERO_KELLY', 'no positive Kelly edge at payout odds'));
    } else {
      const budgetRoom = Math.max(0, policy.budget - spStake);
      const spRunners = new Set(sp && spStake > 0 ? sp.involvedRunners : []);
      const exposureRoom = Math.min(
        ...combo.involvedRunners.map((r) => Math.max(0, cap - (spRunners.has(r) ? spStake : 0)))
      );
      const bounded = Math.min(raw, budgetRoom);
      const capped = Math.min(bounded, exposureRoom);
      const stake = floorToIncrement(capped, policy.minStakeIncrement);

      if (stake < policy.minStakeIncrement) {
        const reason: DropReason = capped < bounded ? 'EXPOSURE_CAP' : 'BELOW_INCREMENT';
        dropped.push(drop(combo, reason, `stake ${capped.toFixed(4)} below increment ${policy.minStakeIncrement}`));
      } else {
        tickets.push({
          id: ticketId(policy.scope, combo),
          kind: 'COMBO',
          betType: combo.betType,
          stake,
          runners: [...combo.involvedRunners],
          estimate: combo,
        });
      }
    }
  }

  return { tickets, dropped };
}

export function totalStake(tickets: Pick<Ticket, 'stake'>[]): number {
  return Number(tickets.reduce((s, t) => s + t.stake, 0).toFixed(10));
}

/** Stake per runner summed across tickets */
export function runnerExposure(tickets: Pick<Ticket, 'stake' | 'runners'>[]): Map<string, number> {
  const exposure = new Map<string, number>();
  for (const t of tickets) {
    for (const r of t.runners) exposure.set(r, (exposure.get(r) ?? 0) + t.stake);
  }
  return exposure;
}

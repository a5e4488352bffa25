/**
 * PIPELINE — RESULT reconciliation
 *
 * Settles the tickets of the latest H5 decision against the official
 * arrival. Pure; the pipeline hands the report to the sink.
 */

import { roundTo, sum } from '../../../common/numbers.js';
import type { BetType } from '../../gpi-config/gpi-config.types.js';
import type {
  OfficialResult,
  ReconciledTicket,
  ReconciliationReport,
  TicketSummary,
} from '../../tracking/tracking.types.js';

/** Fewer than 8 starters pays two places, otherwise three */
export function placesPaid(starters: number | null | undefined): number {
  return starters !== null && starters !== undefined && starters < 8 ? 2 : 3;
}

function allWithin(runners: string[], top: string[]): boolean {
  return runners.length > 0 && runners.every((r) => top.includes(r));
}

export function isWinningTicket(betType: BetType, runners: string[], arrival: string[], places: number): boolean {
  switch (betType) {
    case 'SIMPLE_GAGNANT':
      return runners.length === 1 && arrival[0] === runners[0];
    case 'SIMPLE_PLACE':
      return runners.length === 1 && arrival.slice(0, places).includes(runners[0]);
    case 'COUPLE_GAGNANT':
      return runners.length === 2 && allWithin(runners, arrival.slice(0, 2));
    case 'COUPLE_PLACE':
      return runners.length === 2 && allWithin(runners, arrival.slice(0, 3));
    case 'TRIO':
      return runners.length === 3 && allWithin(runners, arrival.slice(0, 3));
    case 'MULTI':
      return runners.length === 4 && allWithin(runners, arrival.slice(0, 4));
  }
}

function dividendFor(ticket: TicketSummary, result: OfficialResult): number | undefined {
  if (ticket.betType === 'SIMPLE_PLACE') {
    return result.placeDividends?.[ticket.runners[0]] ?? result.dividends.SIMPLE_PLACE;
  }
  return result.dividends[ticket.betType];
}

function summarize(
  raceId: string,
  status: ReconciliationReport['status'],
  message: string,
  tickets: ReconciledTicket[]
): ReconciliationReport {
  const totalStake = roundTo(sum(tickets.map((t) => t.stake)), 2);
  const totalReturn = roundTo(sum(tickets.map((t) => t.return)), 2);
  const profit = roundTo(totalReturn - totalStake, 2);
  return {
    raceId,
    status,
    message,
    tickets,
    totalStake,
    totalReturn,
    profit,
    roi: totalStake > 0 ? profit / totalStake : null,
  };
}

export function reconcile(
  raceId: string,
  tickets: TicketSummary[],
  result: OfficialResult,
  starters: number | null
): ReconciliationReport {
  const places = placesPaid(result.starters ?? starters);
  const missing: string[] = [];

  const settled = tickets.map((ticket): ReconciledTicket => {
    const won = isWinningTicket(ticket.betType, ticket.runners, result.arrival, places);
    const dividend = won ? dividendFor(ticket, result) : undefined;
    if (won && dividend === undefined) missing.push(ticket.id);
    return {
      id: ticket.id,
      betType: ticket.betType,
      runners: [...ticket.runners],
      stake: ticket.stake,
      won,
      dividend: dividend ?? null,
      return: dividend === undefined ? 0 : roundTo(ticket.stake * dividend, 2),
    };
  });

  if (missing.length > 0) {
    return summarize(raceId, 'INCOMPLETE', `dividend missing for winning ticket(s) ${missing.join(', ')}`, settled);
  }

  const report = summarize(raceId, 'RECONCILED', '', settled);
  const winners = settled.filter((t) => t.won).length;
  return {
    ...report,
    message: `reconciled ${settled.length} ticket(s), ${winners} won: return ${report.totalReturn.toFixed(2)} for stake ${report.totalStake.toFixed(2)}`,
  };
}

export function noTicketsReport(raceId: string, message: string): ReconciliationReport {
  return summarize(raceId, 'NO_TICKETS', message, []);
}

export function failedReport(raceId: string, message: string): ReconciliationReport {
  return summarize(raceId, 'FAILED', message, []);
}

import type { AggregateResult, SubscriberId } from '../types.js';

export interface OutcomeSummary {
  total: number;
  delivered: number;
  failed: number;
  timedOut: number;
}

export function summarizeOutcomes(result: AggregateResult): OutcomeSummary {
  const summary: OutcomeSummary = { total: 0, delivered: 0, failed: 0, timedOut: 0 };
  for (const outcome of result.outcomes.values()) {
    summary.total++;
    if (outcome.status === 'delivered') summary.delivered++;
    else if (outcome.status === 'failed') summary.failed++;
    else summary.timedOut++;
  }
  return summary;
}

/**
 * Subscribers that did not receive the event (failed or timed out), in
 * snapshot order. Retrying them is up to the caller.
 */
export function failedSubscribers(result: AggregateResult): SubscriberId[] {
  const ids: SubscriberId[] = [];
  for (const [id, outcome] of result.outcomes) {
    if (outcome.status !== 'delivered') ids.push(id);
  }
  return ids;
}

export function formatSummary(summary: OutcomeSummary): string {
  return `${summary.delivered}/${summary.total} delivered, ${summary.failed} failed, ${summary.timedOut} timed out`;
}

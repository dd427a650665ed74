import type { AggregatedMetrics, CallMetric, CompletionOperation } from '../types';

const round3 = (value: number): number => Math.round(value * 1000) / 1000;

/**
 * Accumulates completion call metrics for a single pipeline run.
 * Create one per run; never share an instance between requests.
 */
export class MetricsAggregator {
  private records: CallMetric[] = [];

  record(metric: CallMetric): void {
    this.records.push(metric);
  }

  summary(wallClockSeconds?: number): AggregatedMetrics {
    let totalLatency = 0;
    let totalTokens = 0;

    for (const record of this.records) {
      totalLatency += record.latencySeconds;
      totalTokens += record.tokensUsed;
    }

    const callCount = this.records.length;

    return {
      totalLatency: round3(totalLatency),
      totalTokens,
      callCount,
      avgLatency: callCount === 0 ? 0 : round3(totalLatency / callCount),
      ...(wallClockSeconds !== undefined && { wallClockSeconds: round3(wallClockSeconds) }),
    };
  }

  /**
   * Token totals per pipeline step, e.g. { brainstorm: 120, draft: 900 }
   */
  tokensByOperation(): Partial<Record<CompletionOperation, number>> {
    const byOperation: Partial<Record<CompletionOperation, number>> = {};

    for (const record of this.records) {
      byOperation[record.operation] = (byOperation[record.operation] ?? 0) + record.tokensUsed;
    }

    return byOperation;
  }

  getRecords(): CallMetric[] {
    return [...this.records];
  }
}

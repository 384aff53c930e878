/**
 * Agent metrics
 *
 * Per-agent call outcomes, used to tell whether an agent makes fewer
 * mistakes as a session goes on. Kept in memory for the life of the service.
 */

/** Calls compared at each end of an agent's history */
export const LEARNING_WINDOW = 10;

/** Below this many calls the first and last windows overlap */
export const MIN_OPERATIONS_FOR_TREND = 2 * LEARNING_WINDOW;

export interface OperationRecord {
  method: string;
  success: boolean;
  /** JSON-RPC error code when the call failed */
  errorCode?: number;
  durationMs: number;
  timestamp: number;
}

export type LearningStatus =
  | "insufficient_data"
  | "excellent_learning"
  | "good_learning"
  | "slight_improvement"
  | "stable"
  | "slight_regression"
  | "significant_regression";

export interface AgentMetricsSummary {
  agentId: string;
  totalOperations: number;
  successfulOperations: number;
  failedOperations: number;
  successRate: number;
  errorRate: number;
  errorRateFirst10: number;
  errorRateLast10: number;
  /** Positive when the last window has fewer errors than the first */
  improvementPercent: number;
  learningStatus: LearningStatus;
  averageDurationMs: number;
  /** Failures keyed by JSON-RPC error code */
  errorsByCode: Record<string, number>;
}

function round(value: number, digits: number): number {
  const scale = 10 ** digits;
  return Math.round(value * scale) / scale;
}

function errorRate(records: readonly OperationRecord[]): number {
  if (records.length === 0) return 0;
  return records.filter((r) => !r.success).length / records.length;
}

function learningStatus(total: number, improvement: number): LearningStatus {
  if (total < MIN_OPERATIONS_FOR_TREND) return "insufficient_data";
  if (improvement > 50) return "excellent_learning";
  if (improvement > 25) return "good_learning";
  if (improvement > 0) return "slight_improvement";
  if (improvement === 0) return "stable";
  if (improvement > -25) return "slight_regression";
  return "significant_regression";
}

export class AgentMetricsTracker {
  private readonly records = new Map<string, OperationRecord[]>();

  record(agentId: string, record: OperationRecord): void {
    const list = this.records.get(agentId);
    if (list) {
      list.push(record);
    } else {
      this.records.set(agentId, [record]);
    }
  }

  agents(): string[] {
    return [...this.records.keys()].sort();
  }

  /**
   * Summary for one agent; all zeros for an agent never seen
   */
  summary(agentId: string): AgentMetricsSummary {
    const records = this.records.get(agentId) ?? [];
    const total = records.length;
    const successful = records.filter((r) => r.success).length;

    const errorsByCode: Record<string, number> = {};
    for (const r of records) {
      if (r.success || r.errorCode === undefined) continue;
      const code = String(r.errorCode);
      errorsByCode[code] = (errorsByCode[code] ?? 0) + 1;
    }

    const first = errorRate(records.slice(0, LEARNING_WINDOW));
    const last = errorRate(records.slice(-LEARNING_WINDOW));
    const improvement =
      total < MIN_OPERATIONS_FOR_TREND || first === 0 ? 0 : ((first - last) / first) * 100;
    const successRate = total === 0 ? 0 : successful / total;

    return {
      agentId,
      totalOperations: total,
      successfulOperations: successful,
      failedOperations: total - successful,
      successRate: round(successRate, 4),
      errorRate: total === 0 ? 0 : round(1 - successRate, 4),
      errorRateFirst10: round(first, 4),
      errorRateLast10: round(last, 4),
      improvementPercent: round(improvement, 2),
      learningStatus: learningStatus(total, improvement),
      averageDurationMs:
        total === 0 ? 0 : round(records.reduce((sum, r) => sum + r.durationMs, 0) / total, 2),
      errorsByCode,
    };
  }
}

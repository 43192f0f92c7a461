/**
 * Inference usage tracker.
 *
 * Records every call to the inference backend with its latency and outcome.
 * Kept in memory only; oldest records are dropped past `maxRecords`.
 */
import { randomUUID } from "node:crypto";

export interface UsageRecord {
  id: string;
  timestamp: Date;
  model: string;
  sessionId: string;
  streamed: boolean;
  promptMessages: number;
  outputChars: number;
  latencyMs: number;
  success: boolean;
  errorCode?: string;
}

export interface ModelStats {
  calls: number;
  outputChars: number;
  averageLatencyMs: number;
}

export interface UsageStats {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  streamedCalls: number;
  totalOutputChars: number;
  averageLatencyMs: number;
  byModel: Record<string, ModelStats>;
}

export interface TimeRange {
  start: Date;
  end: Date;
}

export class UsageTracker {
  private records: UsageRecord[] = [];
  private maxRecords: number;

  constructor(options: { maxRecords?: number } = {}) {
    this.maxRecords = options.maxRecords ?? 10000;
  }

  /**
   * Track an inference call.
   */
  trackCall(record: Omit<UsageRecord, "id" | "timestamp">): UsageRecord {
    const fullRecord: UsageRecord = {
      ...record,
      id: randomUUID(),
      timestamp: new Date(),
    };

    this.records.push(fullRecord);

    if (this.records.length > this.maxRecords) {
      this.records = this.records.slice(-this.maxRecords);
    }

    return fullRecord;
  }

  /**
   * Get usage statistics, optionally for a time range.
   */
  getUsageStats(timeRange?: TimeRange): UsageStats {
    const filtered = timeRange
      ? this.records.filter((r) => r.timestamp >= timeRange.start && r.timestamp <= timeRange.end)
      : this.records;

    const stats: UsageStats = {
      totalCalls: filtered.length,
      successfulCalls: filtered.filter((r) => r.success).length,
      failedCalls: filtered.filter((r) => !r.success).length,
      streamedCalls: filtered.filter((r) => r.streamed).length,
      totalOutputChars: 0,
      averageLatencyMs: 0,
      byModel: {},
    };

    if (filtered.length === 0) return stats;

    let totalLatency = 0;
    const latencyByModel: Record<string, number> = {};

    for (const record of filtered) {
      stats.totalOutputChars += record.outputChars;
      totalLatency += record.latencyMs;

      if (!stats.byModel[record.model]) {
        stats.byModel[record.model] = { calls: 0, outputChars: 0, averageLatencyMs: 0 };
      }
      const model = stats.byModel[record.model];
      model.calls++;
      model.outputChars += record.outputChars;
      latencyByModel[record.model] = (latencyByModel[record.model] ?? 0) + record.latencyMs;
    }

    for (const [name, model] of Object.entries(stats.byModel)) {
      model.averageLatencyMs = latencyByModel[name] / model.calls;
    }

    stats.averageLatencyMs = totalLatency / filtered.length;
    return stats;
  }

  getRecords(): UsageRecord[] {
    return [...this.records];
  }

  clear(): void {
    this.records = [];
  }
}

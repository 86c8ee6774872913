/**
 * History Types
 */

/** One persisted observation of a node. Immutable once written. */
export interface Sample {
  nodeId: string;
  /** Epoch ms */
  timestamp: number;
  batteryLevel?: number;
  voltage?: number;
  isCharging?: boolean;
  uptimeSeconds?: number;
}

export type SampleTelemetry = Omit<Sample, 'nodeId' | 'timestamp'>;

/** Tree-oriented form: every sample persisted by one append */
export interface HistorySnapshot {
  timestamp: string;
  nodes: Record<string, SampleTelemetry>;
}

export interface HistorySummary {
  totalRecords: number;
  uniqueNodes: number;
  dateRange: { start: string; end: string } | null;
  latestTimestamp: string | null;
}

export interface BatteryTrend {
  nodeId: string;
  /** Least-squares slope, percent per hour; negative means draining */
  percentPerHour: number;
  points: number;
  /** Hours until 0% at the current slope, when draining */
  hoursToEmpty: number | null;
}

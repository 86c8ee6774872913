/**
 * Alert Types
 */

export type AlertKind = 'LowBattery' | 'Stale';
export type AlertLevel = 'warning' | 'critical';

export interface Alert {
  nodeId: string;
  kind: AlertKind;
  level: AlertLevel;
  /** Epoch ms when this alert was first raised; kept while it stays active */
  since: number;
}

export interface AlertThresholds {
  /** LowBattery raises below this level (percent) */
  batteryThreshold: number;
  /** LowBattery clears at or above batteryThreshold + batteryMargin */
  batteryMargin: number;
  /** At or below this level the alert is critical */
  criticalBatteryLevel: number;
  /** A heard node goes Stale when silent for longer than this */
  activeThresholdHours: number;
}

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  batteryThreshold: 15,
  batteryMargin: 5,
  criticalBatteryLevel: 5,
  activeThresholdHours: 2,
};

export interface AlertTransitions {
  raised: Alert[];
  cleared: Alert[];
}

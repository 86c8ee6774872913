/**
 * Alert Evaluator
 *
 * Pure functions over a registry snapshot. An alert, once raised, stays
 * up until its condition clears by the configured margin, so a battery
 * hovering at the threshold doesn't flap.
 */

import { NodeView } from '../registry/types';
import { Alert, AlertKind, AlertLevel, AlertThresholds, AlertTransitions } from './types';

export function alertKey(alert: Pick<Alert, 'nodeId' | 'kind'>): string {
  return `${alert.nodeId}:${alert.kind}`;
}

function batteryLevelOf(battery: number, thresholds: AlertThresholds): AlertLevel {
  return battery <= thresholds.criticalBatteryLevel ? 'critical' : 'warning';
}

/**
 * Decide whether LowBattery is active for a node.
 *   not alerting: raise when battery < threshold and not charging
 *   alerting:     clear when charging, or battery >= threshold + margin
 * With no battery reading the previous decision stands.
 */
function lowBatteryActive(node: NodeView, wasActive: boolean, thresholds: AlertThresholds): boolean {
  if (node.isCharging === true) return false;
  const battery = node.batteryLevel;
  if (battery === undefined) return wasActive;
  if (wasActive) return battery < thresholds.batteryThreshold + thresholds.batteryMargin;
  return battery < thresholds.batteryThreshold;
}

/** Seen active before, silent for longer than the active window */
function staleActive(node: NodeView, wasActive: boolean, thresholds: AlertThresholds): boolean {
  if (!wasActive || node.secondsSinceHeard === null) return false;
  return node.secondsSinceHeard > thresholds.activeThresholdHours * 3600;
}

/**
 * Compute the alert set for `snapshot` given the previous set. Alerts for
 * nodes missing from the snapshot are dropped. Stale is only raised for
 * nodes in `seenActive`, or already Stale, so a node first reported with
 * an old lastHeard is not called stale.
 */
export function evaluateAlerts(
  snapshot: readonly NodeView[],
  thresholds: AlertThresholds,
  previous: readonly Alert[],
  now: number,
  seenActive: ReadonlySet<string> = new Set(),
): Alert[] {
  const prevByKey = new Map(previous.map((a) => [alertKey(a), a]));
  const next: Alert[] = [];

  const keep = (nodeId: string, kind: AlertKind, level: AlertLevel): void => {
    const prior = prevByKey.get(alertKey({ nodeId, kind }));
    next.push({ nodeId, kind, level, since: prior?.since ?? now });
  };

  for (const node of snapshot) {
    const wasLow = prevByKey.has(alertKey({ nodeId: node.nodeId, kind: 'LowBattery' }));
    if (lowBatteryActive(node, wasLow, thresholds)) {
      const prior = prevByKey.get(alertKey({ nodeId: node.nodeId, kind: 'LowBattery' }));
      const level = node.batteryLevel !== undefined
        ? batteryLevelOf(node.batteryLevel, thresholds)
        : prior?.level ?? 'warning';
      keep(node.nodeId, 'LowBattery', level);
    }

    const wasSeenActive = seenActive.has(node.nodeId)
      || prevByKey.has(alertKey({ nodeId: node.nodeId, kind: 'Stale' }));
    if (staleActive(node, wasSeenActive, thresholds)) {
      keep(node.nodeId, 'Stale', 'warning');
    }
  }

  return next;
}

/** Alerts that appeared and disappeared between two evaluations. */
export function diffAlerts(previous: readonly Alert[], next: readonly Alert[]): AlertTransitions {
  const prevKeys = new Set(previous.map(alertKey));
  const nextKeys = new Set(next.map(alertKey));
  return {
    raised: next.filter((a) => !prevKeys.has(alertKey(a))),
    cleared: previous.filter((a) => !nextKeys.has(alertKey(a))),
  };
}

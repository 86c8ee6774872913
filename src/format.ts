/**
 * Console formatting for the node table.
 *
 *   !a1b2c3d4  Ridge Repeater            - RAK4631               :  87%, 4.012V : up    12.5 hrs
 *   !0000beef  Base Camp                 - HELTEC_V3             :  Chg, 4.190V : up     0.3 hrs
 */

import { Alert } from './alerts/types';
import { NodeView } from './registry/types';

export function displayName(node: Pick<NodeView, 'longName' | 'shortName'>): string {
  return node.longName ?? node.shortName ?? '(unnamed)';
}

export function formatBattery(node: Pick<NodeView, 'batteryLevel' | 'isCharging' | 'voltage'>): string {
  let level: string;
  if (node.isCharging === true) level = ' Chg';
  else if (node.batteryLevel !== undefined) level = `${String(Math.round(node.batteryLevel)).padStart(3)}%`;
  else level = '   ?';

  const voltage = node.voltage !== undefined ? node.voltage.toFixed(3) : '-.---';
  return `${level}, ${voltage}V`;
}

export function formatUptime(uptimeSeconds: number | undefined): string {
  const hours = uptimeSeconds !== undefined ? (uptimeSeconds / 3600).toFixed(1) : '-';
  return `up ${hours.padStart(7)} hrs`;
}

/** Full metrics line for one node */
export function formatNodeLine(node: NodeView): string {
  let line = `${node.nodeId}  ${displayName(node).padEnd(25)} - ${node.hardwareModel.padEnd(21)} : ${formatBattery(node)} : ${formatUptime(node.uptimeSeconds)}`;
  if (node.batteryAlert) line += '  [LOW]';
  if (!node.isActive && node.lastHeard !== undefined) line += '  [inactive]';
  return line;
}

/** Short identity line, used for favourite and non-favourite listings */
export function formatNodeSummary(node: NodeView): string {
  return `${node.nodeId}  ${displayName(node).padEnd(20)} - ${node.hardwareModel.padEnd(15)}`;
}

function hasMetrics(node: NodeView): boolean {
  return node.batteryLevel !== undefined || node.voltage !== undefined
    || node.isCharging !== undefined || node.uptimeSeconds !== undefined;
}

/** Metrics table for every node that has reported telemetry. */
export function formatNodeTable(nodes: readonly NodeView[]): string[] {
  return nodes.filter(hasMetrics).map(formatNodeLine);
}

export function formatAlert(alert: Alert): string {
  const label = alert.kind === 'LowBattery' ? 'low battery' : 'not heard recently';
  return `${alert.level.toUpperCase()} ${alert.nodeId}: ${label} since ${new Date(alert.since).toISOString()}`;
}

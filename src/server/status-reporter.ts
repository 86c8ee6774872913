/**
 * Status Reporter
 *
 * Builds status snapshots for the /health endpoint and the CLI.
 */

import { ConnectionState } from '../connection/types';
import { LinkStats } from '../connection/link-stats';
import { Alert } from '../alerts/types';
import { NodeView } from '../registry/types';
import { TickResult } from '../sampler/sampler';

export interface StatusSnapshot {
  status: 'ok' | 'degraded';
  uptime: number;
  uptimeHuman: string;
  connection: ConnectionState;
  link: LinkStats;
  sampler: {
    running: boolean;
    intervalMs: number;
    lastTickAt: number | null;
    lastTickOk: boolean | null;
    lastTickError: string | null;
  };
  nodes: {
    total: number;
    active: number;
    favorites: number;
    batteryAlerts: number;
  };
  alerts: {
    warning: number;
    critical: number;
  };
  memory: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
  pid: number;
}

export interface StatusReporterDeps {
  getConnectionState: () => ConnectionState;
  getLinkStats: () => LinkStats;
  getNodes: () => NodeView[];
  getAlerts: () => Alert[];
  getLastTick: () => TickResult | null;
  isSampling: () => boolean;
  intervalMs: number;
  getStartedAt: () => number;
  now?: () => number;
}

export function formatUptime(uptimeSec: number): string {
  const days = Math.floor(uptimeSec / 86400);
  const hours = Math.floor((uptimeSec % 86400) / 3600);
  const mins = Math.floor((uptimeSec % 3600) / 60);
  const secs = uptimeSec % 60;
  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (mins > 0) parts.push(`${mins}m`);
  parts.push(`${secs}s`);
  return parts.join(' ');
}

export class StatusReporter {
  private deps: StatusReporterDeps;

  constructor(deps: StatusReporterDeps) {
    this.deps = deps;
  }

  getStatus(): StatusSnapshot {
    const now = (this.deps.now ?? Date.now)();
    const startedAt = this.deps.getStartedAt();
    const uptimeSec = startedAt > 0 ? Math.max(0, Math.floor((now - startedAt) / 1000)) : 0;

    const connection = this.deps.getConnectionState();
    const nodes = this.deps.getNodes();
    const alerts = this.deps.getAlerts();
    const lastTick = this.deps.getLastTick();
    const mem = process.memoryUsage();

    return {
      status: connection.status === 'connected' ? 'ok' : 'degraded',
      uptime: uptimeSec,
      uptimeHuman: formatUptime(uptimeSec),
      connection,
      link: this.deps.getLinkStats(),
      sampler: {
        running: this.deps.isSampling(),
        intervalMs: this.deps.intervalMs,
        lastTickAt: lastTick?.at ?? null,
        lastTickOk: lastTick?.ok ?? null,
        lastTickError: lastTick?.error ?? lastTick?.persistError ?? null,
      },
      nodes: {
        total: nodes.length,
        active: nodes.filter((n) => n.isActive).length,
        favorites: nodes.filter((n) => n.isFavorite).length,
        batteryAlerts: nodes.filter((n) => n.batteryAlert).length,
      },
      alerts: {
        warning: alerts.filter((a) => a.level === 'warning').length,
        critical: alerts.filter((a) => a.level === 'critical').length,
      },
      memory: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal,
      },
      pid: process.pid,
    };
  }
}

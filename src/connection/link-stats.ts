/**
 * LinkStats — lightweight telemetry about the gateway link
 *
 * Maintained by the ConnectionManager, read by the status reporter.
 */

import { TransportKind } from '../link/types';

export interface LinkStats {
  transport: TransportKind | null;
  endpoint: string | null;
  connected: boolean;
  connectAttempts: number;
  connectCount: number;
  /** Cycles that ended up on a later candidate than the first */
  fallbackCount: number;
  linkLostCount: number;
  lastConnectedAt: number | null;
  lastDisconnectedAt: number | null;
  lastFetchAt: number | null;
  lastError: string | null;
  lastErrorAt: number | null;
}

export function createLinkStats(): LinkStats {
  return {
    transport: null,
    endpoint: null,
    connected: false,
    connectAttempts: 0,
    connectCount: 0,
    fallbackCount: 0,
    linkLostCount: 0,
    lastConnectedAt: null,
    lastDisconnectedAt: null,
    lastFetchAt: null,
    lastError: null,
    lastErrorAt: null,
  };
}

/**
 * Connection Types
 *
 * Process-wide connection state, owned and mutated only by the
 * ConnectionManager. Everyone else reads it through status().
 */

import { TransportKind } from '../link/types';

export type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting'; transport: TransportKind; endpoint: string }
  | { status: 'connected'; transport: TransportKind; endpoint: string; since: number }
  | { status: 'failed'; reason: string };

/** What the caller would like to connect to */
export interface ConnectPreferences {
  /** When set, serial is tried first and TCP is the fallback */
  serialPort?: string;
  baudRate?: number;
  tcpHost: string;
  tcpPort: number;
}

export type FetchErrorKind = 'NotConnected' | 'LinkLost' | 'Timeout';

/**
 * Failure of fetchNodes(). Transport details stay behind the
 * ConnectionManager; callers only learn that the link is gone.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;

  constructor(kind: FetchErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.kind = kind;
  }
}

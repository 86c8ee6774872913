/**
 * Connection Manager
 *
 * Owns the single link to the gateway and the process-wide connection
 * state. Picks candidates, opens them in order with one attempt each,
 * and drops back to 'disconnected' the moment a fetch or liveness check
 * fails. It never reconnects on its own: the next explicit connect() or
 * sampler tick starts a fresh cycle.
 *
 * Events:
 *   'stateChange' (state: ConnectionState, prev: ConnectionState)
 *   'linkLost' (reason: string)
 */

import { EventEmitter } from 'events';
import { getLogger } from '../logger';
import { RawNodeReport } from '../gateway/types';
import { DEFAULT_BAUD_RATE } from '../link/serial-link';
import { Link, LinkError, LinkFactory, LinkHandle, LinkTarget, describeTarget } from '../link/types';
import { LinkStats, createLinkStats } from './link-stats';
import { withTimeout } from './timeout';
import { ConnectPreferences, ConnectionState, FetchError } from './types';

export interface ConnectionManagerOptions {
  linkFactory: LinkFactory;
  connectTimeoutMs?: number;
  fetchTimeoutMs?: number;
  now?: () => number;
}

/** Serial first when one was requested, TCP as the fallback or the only candidate. */
export function buildCandidates(preferred: ConnectPreferences): LinkTarget[] {
  const candidates: LinkTarget[] = [];
  if (preferred.serialPort) {
    candidates.push({
      kind: 'serial',
      path: preferred.serialPort,
      baudRate: preferred.baudRate ?? DEFAULT_BAUD_RATE,
    });
  }
  candidates.push({ kind: 'tcp', host: preferred.tcpHost, port: preferred.tcpPort });
  return candidates;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ConnectionManager extends EventEmitter {
  private linkFactory: LinkFactory;
  private connectTimeoutMs: number;
  private fetchTimeoutMs: number;
  private now: () => number;
  private log = getLogger('ConnectionManager');

  private state: ConnectionState = { status: 'disconnected' };
  private link: Link | null = null;
  private handle: LinkHandle | null = null;
  private unwatchHandle: (() => void) | null = null;
  private inFlight: Promise<ConnectionState> | null = null;
  /** Bumped by disconnect() so an in-flight connect knows to back out */
  private generation = 0;
  private _lastError: string | null = null;
  private _stats: LinkStats = createLinkStats();

  constructor(options: ConnectionManagerOptions) {
    super();
    this.linkFactory = options.linkFactory;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 15000;
    this.now = options.now ?? Date.now;
  }

  /** Current state; never blocks */
  status(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state.status === 'connected';
  }

  /** Reason of the most recent connect or fetch failure */
  get lastError(): string | null {
    return this._lastError;
  }

  stats(): LinkStats {
    return { ...this._stats };
  }

  /**
   * Connect using the candidate ordering for `preferred`. Resolves with the
   * resulting state; failures end in 'failed' rather than a rejection.
   * Already connected: resolves immediately without touching the transport.
   */
  connect(preferred: ConnectPreferences): Promise<ConnectionState> {
    if (this.state.status === 'connected' && this.link && this.handle && this.link.isAlive(this.handle)) {
      return Promise.resolve(this.state);
    }
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.runConnectCycle(preferred).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Release the transport and go to 'disconnected'. Safe to call any time. */
  async disconnect(): Promise<void> {
    this.generation++;
    await this.releaseHandle();
    this.setState({ status: 'disconnected' });
  }

  /**
   * Ask the gateway for its node list. Any transport failure releases the
   * link and leaves the state at 'disconnected'.
   */
  async fetchNodes(): Promise<RawNodeReport[]> {
    const { link, handle } = this;
    if (this.state.status !== 'connected' || !link || !handle) {
      throw new FetchError('NotConnected', 'not connected to a gateway');
    }

    if (!link.isAlive(handle)) {
      const reason = `${describeTarget(link.target)} failed its liveness check`;
      await this.dropLink(handle, reason);
      throw new FetchError('LinkLost', reason);
    }

    try {
      const reports = await withTimeout(
        link.fetchRawNodes(handle),
        this.fetchTimeoutMs,
        () => new FetchError('Timeout', `node fetch from ${describeTarget(link.target)} exceeded ${this.fetchTimeoutMs}ms`),
      );
      this._stats.lastFetchAt = this.now();
      return reports;
    } catch (err) {
      const fetchErr = err instanceof FetchError
        ? err
        : new FetchError('LinkLost', `link lost during fetch: ${errorMessage(err)}`, { cause: err });
      await this.dropLink(handle, fetchErr.message);
      throw fetchErr;
    }
  }

  // --- Connect cycle ---

  private async runConnectCycle(preferred: ConnectPreferences): Promise<ConnectionState> {
    const generation = this.generation;
    // Scoped acquisition: any previous handle is gone before a new one opens
    await this.releaseHandle();

    const candidates = buildCandidates(preferred);
    const failures: string[] = [];

    for (let i = 0; i < candidates.length; i++) {
      if (generation !== this.generation) return this.state;

      const target = candidates[i];
      const endpoint = describeTarget(target);
      const link = this.linkFactory(target);
      this.setState({ status: 'connecting', transport: target.kind, endpoint });
      this._stats.connectAttempts++;

      let handle: LinkHandle;
      try {
        handle = await this.openWithTimeout(link);
      } catch (err) {
        const kind = err instanceof LinkError ? err.kind : 'Refused';
        const message = `${endpoint} ${kind}: ${errorMessage(err)}`;
        failures.push(message);
        this.recordError(message);
        if (i < candidates.length - 1) {
          this.log.warn({ endpoint, kind }, 'Connect attempt failed, trying next candidate');
        } else {
          this.log.warn({ endpoint, kind }, 'Connect attempt failed');
        }
        continue;
      }

      if (generation !== this.generation) {
        // disconnect() arrived while we were opening
        await this.closeQuietly(link, handle);
        return this.state;
      }

      this.attach(link, handle);
      if (i > 0) this._stats.fallbackCount++;
      this._stats.connectCount++;
      this._stats.lastConnectedAt = this.now();
      this._stats.connected = true;
      this._stats.transport = target.kind;
      this._stats.endpoint = endpoint;
      this.log.info({ endpoint }, 'Connected to gateway');
      this.setState({ status: 'connected', transport: target.kind, endpoint, since: this.now() });
      return this.state;
    }

    const reason = failures.join('; ') || 'no connection candidates';
    this.setState({ status: 'failed', reason });
    return this.state;
  }

  private async openWithTimeout(link: Link): Promise<LinkHandle> {
    const opening = link.open();
    try {
      return await withTimeout(
        opening,
        this.connectTimeoutMs,
        () => new LinkError('Timeout', `open did not complete within ${this.connectTimeoutMs}ms`),
      );
    } catch (err) {
      // An open that finishes after the timeout still owns a transport
      void opening.then(
        (late) => this.closeQuietly(link, late),
        () => undefined,
      );
      throw err;
    }
  }

  private attach(link: Link, handle: LinkHandle): void {
    this.link = link;
    this.handle = handle;
    const onClose = (): void => {
      if (this.handle !== handle) return;
      this.dropLink(handle, `${describeTarget(link.target)} closed by peer`).catch((err) => {
        this.log.error({ error: errorMessage(err) }, 'Failed to release link after close');
      });
    };
    handle.stream.once('close', onClose);
    this.unwatchHandle = () => handle.stream.off('close', onClose);
  }

  // --- Release ---

  /** Drop the given handle if it is still the current one. */
  private async dropLink(handle: LinkHandle, reason: string): Promise<void> {
    if (this.handle !== handle) return;
    this.recordError(reason);
    this._stats.linkLostCount++;
    this.log.warn({ reason }, 'Gateway link lost');
    await this.releaseHandle();
    this.setState({ status: 'disconnected' });
    this.emit('linkLost', reason);
  }

  /** Releases the current handle exactly once; later calls find nothing to do. */
  private async releaseHandle(): Promise<void> {
    const { link, handle } = this;
    this.link = null;
    this.handle = null;
    if (this.unwatchHandle) {
      this.unwatchHandle();
      this.unwatchHandle = null;
    }
    if (!link || !handle) return;

    this._stats.connected = false;
    this._stats.lastDisconnectedAt = this.now();
    await this.closeQuietly(link, handle);
  }

  private async closeQuietly(link: Link, handle: LinkHandle): Promise<void> {
    try {
      await link.close(handle);
    } catch (err) {
      this.log.warn({ endpoint: describeTarget(link.target), error: errorMessage(err) }, 'Error closing link');
    }
  }

  private recordError(message: string): void {
    this._lastError = message;
    this._stats.lastError = message;
    this._stats.lastErrorAt = this.now();
  }

  private setState(next: ConnectionState): void {
    const prev = this.state;
    if (prev.status === next.status && next.status === 'disconnected') return;
    this.state = next;
    this.log.debug({ from: prev.status, to: next.status }, 'Connection state change');
    this.emit('stateChange', next, prev);
  }
}

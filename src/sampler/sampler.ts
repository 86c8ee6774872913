/**
 * Sampler
 *
 * The periodic driver. Each tick is one bounded unit of work:
 *
 *   connect (if needed) -> fetchNodes -> ingest -> evaluate alerts -> persist
 *
 * Every node with telemetry is offered to the history store, which keeps
 * only what differs from the last sample it wrote. A value that could not
 * be written, or was held back by the save interval, is offered again on
 * the next tick. A failed step ends the tick, is reported through events,
 * and the next tick starts over; the loop itself never stops on an error.
 *
 * Events:
 *   'tick' (result: TickResult)           every tick, successful or not
 *   'tickFailed' (result: TickResult)     connect or fetch failed
 *   'persistFailed' (err: Error)          samples could not be written
 *   'alertRaised' (alert: Alert)          not-alerting -> alerting
 *   'alertCleared' (alert: Alert)
 */

import { EventEmitter } from 'events';
import { getLogger } from '../logger';
import { ConnectionManager } from '../connection/connection-manager';
import { ConnectPreferences, ConnectionState } from '../connection/types';
import { NodeRegistry } from '../registry/node-registry';
import { NodeView } from '../registry/types';
import { HistoryStore } from '../history/history-store';
import { Sample } from '../history/types';
import { diffAlerts, evaluateAlerts } from '../alerts/evaluator';
import { Alert, AlertThresholds, DEFAULT_ALERT_THRESHOLDS } from '../alerts/types';
import { RawNodeReport } from '../gateway/types';

export type TickStage = 'connect' | 'fetch';

export interface TickResult {
  ok: boolean;
  at: number;
  durationMs: number;
  connection: ConnectionState;
  reports: number;
  changed: string[];
  persisted: number;
  alerts: Alert[];
  raised: Alert[];
  cleared: Alert[];
  /** Set when connect or fetch failed */
  failedStage?: TickStage;
  error?: string;
  /** Set when the tick succeeded but writing history did not */
  persistError?: string;
}

export interface SamplerOptions {
  connection: ConnectionManager;
  registry: NodeRegistry;
  history: HistoryStore;
  connectPreferences: ConnectPreferences;
  alertThresholds?: Partial<AlertThresholds>;
  intervalMs?: number;
  now?: () => number;
}

export const DEFAULT_INTERVAL_MS = 30_000;

function hasTelemetry(node: NodeView): boolean {
  return node.batteryLevel !== undefined
    || node.voltage !== undefined
    || node.isCharging !== undefined
    || node.uptimeSeconds !== undefined;
}

export function sampleFromNode(node: NodeView, timestamp: number): Sample {
  const sample: Sample = { nodeId: node.nodeId, timestamp };
  if (node.batteryLevel !== undefined) sample.batteryLevel = node.batteryLevel;
  if (node.voltage !== undefined) sample.voltage = node.voltage;
  if (node.isCharging !== undefined) sample.isCharging = node.isCharging;
  if (node.uptimeSeconds !== undefined) sample.uptimeSeconds = node.uptimeSeconds;
  return sample;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Sampler extends EventEmitter {
  private connection: ConnectionManager;
  private registry: NodeRegistry;
  private history: HistoryStore;
  private preferences: ConnectPreferences;
  private thresholds: AlertThresholds;
  readonly intervalMs: number;
  private now: () => number;
  private log = getLogger('Sampler');

  private timer: ReturnType<typeof setTimeout> | null = null;
  private _running = false;
  /** Bumped by start() so a chain from an earlier start cannot reschedule */
  private runId = 0;
  private inFlight: Promise<TickResult> | null = null;
  private alerts: Alert[] = [];
  private _lastTick: TickResult | null = null;
  private seenActive = new Set<string>();

  constructor(options: SamplerOptions) {
    super();
    this.connection = options.connection;
    this.registry = options.registry;
    this.history = options.history;
    this.preferences = options.connectPreferences;
    this.thresholds = { ...DEFAULT_ALERT_THRESHOLDS, ...options.alertThresholds };
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this._running;
  }

  get lastTick(): TickResult | null {
    return this._lastTick;
  }

  /** Alerts active after the most recent successful tick */
  currentAlerts(): Alert[] {
    return [...this.alerts];
  }

  /** Start ticking: first tick right away, then every intervalMs after the previous one ends. */
  start(): void {
    if (this._running) return;
    this._running = true;
    this.runId++;
    this.log.info({ intervalMs: this.intervalMs }, 'Sampler started');
    this.schedule(0, this.runId);
  }

  stop(): void {
    if (!this._running) return;
    this._running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.log.info('Sampler stopped');
  }

  /** Run one tick and return the registry afterwards. */
  async sampleOnce(): Promise<NodeView[]> {
    await this.tick();
    return this.registry.listAll();
  }

  /**
   * Run one tick now. Never rejects. Overlapping calls share the tick that
   * is already running.
   */
  tick(): Promise<TickResult> {
    if (!this.inFlight) {
      this.inFlight = this.runTick().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  // --- Internals ---

  private schedule(delayMs: number, runId: number): void {
    const next = (): void => {
      if (this._running && runId === this.runId) this.schedule(this.intervalMs, runId);
    };
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().then(next, (err: unknown) => {
        this.log.error({ error: errorMessage(err) }, 'Tick rejected unexpectedly');
        next();
      });
    }, delayMs);
  }

  private async runTick(): Promise<TickResult> {
    const at = this.now();
    const result: TickResult = {
      ok: false,
      at,
      durationMs: 0,
      connection: this.connection.status(),
      reports: 0,
      changed: [],
      persisted: 0,
      alerts: this.currentAlerts(),
      raised: [],
      cleared: [],
    };

    const reports = await this.connectAndFetch(result);
    if (reports) {
      this.process(reports, at, result);
      result.ok = true;
    }

    result.connection = this.connection.status();
    result.durationMs = this.now() - at;
    this._lastTick = result;

    if (!result.ok) {
      this.log.warn({ stage: result.failedStage, error: result.error }, 'Tick failed');
      this.emit('tickFailed', result);
    } else {
      this.log.debug({ reports: result.reports, changed: result.changed.length, persisted: result.persisted }, 'Tick complete');
    }
    this.emit('tick', result);
    return result;
  }

  private async connectAndFetch(result: TickResult): Promise<RawNodeReport[] | null> {
    if (!this.connection.isConnected()) {
      const state = await this.connection.connect(this.preferences);
      if (state.status !== 'connected') {
        result.failedStage = 'connect';
        result.error = state.status === 'failed' ? state.reason : (this.connection.lastError ?? `connection is ${state.status}`);
        return null;
      }
    }

    try {
      return await this.connection.fetchNodes();
    } catch (err) {
      result.failedStage = 'fetch';
      result.error = errorMessage(err);
      return null;
    }
  }

  private process(reports: RawNodeReport[], at: number, result: TickResult): void {
    const changed = this.registry.ingest(reports, at);
    const snapshot = this.registry.listAll();
    result.reports = reports.length;
    result.changed = [...changed];

    for (const node of snapshot) {
      if (node.isActive) this.seenActive.add(node.nodeId);
    }

    const previous = this.alerts;
    const next = evaluateAlerts(snapshot, this.thresholds, previous, at, this.seenActive);
    const { raised, cleared } = diffAlerts(previous, next);
    this.alerts = next;
    result.alerts = [...next];
    result.raised = raised;
    result.cleared = cleared;
    for (const alert of raised) {
      this.log.warn({ nodeId: alert.nodeId, kind: alert.kind, level: alert.level }, 'Alert raised');
      this.emit('alertRaised', alert);
    }
    for (const alert of cleared) {
      this.log.info({ nodeId: alert.nodeId, kind: alert.kind }, 'Alert cleared');
      this.emit('alertCleared', alert);
    }

    const samples = snapshot
      .filter(hasTelemetry)
      .map((node) => sampleFromNode(node, at));
    if (samples.length === 0) return;

    try {
      result.persisted = this.history.append(samples).length;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      result.persistError = error.message;
      this.log.error({ error: error.message }, 'Failed to persist samples');
      this.emit('persistFailed', error);
    }
  }
}

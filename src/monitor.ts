/**
 * MeshMonitor
 *
 * Composition root. Builds the hardware table, decoder, link factory,
 * connection manager, registry, history store and sampler from a Config,
 * and optionally exposes them over HTTP.
 */

import * as path from 'path';
import { Config } from './config-schema';
import { getLogger } from './logger';
import { ConnectionManager } from './connection/connection-manager';
import { ConnectPreferences, ConnectionState } from './connection/types';
import { HardwareModelTable, loadHardwareModels } from './gateway/hardware-models';
import { NdjsonNodeDecoder } from './gateway/ndjson-decoder';
import { NodeReportDecoder } from './gateway/types';
import { HistoryStore } from './history/history-store';
import { createLinkFactory } from './link';
import { LinkFactory } from './link/types';
import { NodeRegistry } from './registry/node-registry';
import { NodeView } from './registry/types';
import { Sampler, TickResult } from './sampler/sampler';
import { MonitorHttpServer } from './server/http-server';
import { StatusReporter, StatusSnapshot } from './server/status-reporter';

export interface MeshMonitorOptions {
  /** Replaces the transport layer entirely (tests, alternative gateways) */
  linkFactory?: LinkFactory;
  decoder?: NodeReportDecoder;
  hardwareModels?: HardwareModelTable;
  /** Base for a relative history.dataDir; defaults to the working directory */
  baseDir?: string;
  now?: () => number;
}

export function connectPreferencesFrom(config: Config): ConnectPreferences {
  const { connection } = config;
  return {
    serialPort: connection.serialPort,
    baudRate: connection.baudRate,
    tcpHost: connection.tcpHost,
    tcpPort: connection.tcpPort,
  };
}

export class MeshMonitor {
  readonly connection: ConnectionManager;
  readonly registry: NodeRegistry;
  readonly history: HistoryStore;
  readonly sampler: Sampler;
  readonly preferences: ConnectPreferences;

  private config: Config;
  private now: () => number;
  private statusReporter: StatusReporter;
  private httpServer?: MonitorHttpServer;
  private startedAt = 0;
  private log = getLogger('Monitor');

  constructor(config: Config, options: MeshMonitorOptions = {}) {
    this.config = config;
    this.now = options.now ?? Date.now;
    this.preferences = connectPreferencesFrom(config);

    const hardwareModels = options.hardwareModels ?? loadHardwareModels(undefined, config.hardwareModels);
    const decoder = options.decoder ?? new NdjsonNodeDecoder();
    const linkFactory = options.linkFactory ?? createLinkFactory(decoder, {
      connectTimeoutMs: config.connection.connectTimeoutMs,
    });

    this.connection = new ConnectionManager({
      linkFactory,
      connectTimeoutMs: config.connection.connectTimeoutMs,
      fetchTimeoutMs: config.connection.fetchTimeoutMs,
      now: this.now,
    });

    this.registry = new NodeRegistry({
      hardwareModels,
      thresholds: {
        activeThresholdHours: config.alerts.activeThresholdHours,
        batteryAlertThreshold: config.alerts.batteryThreshold,
      },
      now: this.now,
    });
    for (const nodeId of config.favorites) {
      this.registry.setFavorite(nodeId, true);
    }

    this.history = new HistoryStore({
      dataDir: path.resolve(options.baseDir ?? process.cwd(), config.history.dataDir),
      minSaveIntervalSeconds: config.history.minSaveIntervalSeconds,
    });

    this.sampler = new Sampler({
      connection: this.connection,
      registry: this.registry,
      history: this.history,
      connectPreferences: this.preferences,
      alertThresholds: config.alerts,
      intervalMs: config.sampling.intervalSeconds * 1000,
      now: this.now,
    });

    this.statusReporter = new StatusReporter({
      getConnectionState: () => this.connection.status(),
      getLinkStats: () => this.connection.stats(),
      getNodes: () => this.registry.listAll(),
      getAlerts: () => this.sampler.currentAlerts(),
      getLastTick: () => this.sampler.lastTick,
      isSampling: () => this.sampler.running,
      intervalMs: this.sampler.intervalMs,
      getStartedAt: () => this.startedAt,
      now: this.now,
    });

    this.wireLogging();
  }

  /** Connect with the configured preferences. */
  connect(): Promise<ConnectionState> {
    return this.connection.connect(this.preferences);
  }

  disconnect(): Promise<void> {
    return this.connection.disconnect();
  }

  /** One tick, then the node table. */
  runOnce(): Promise<NodeView[]> {
    return this.sampler.sampleOnce();
  }

  tick(): Promise<TickResult> {
    return this.sampler.tick();
  }

  /** Start continuous sampling and, when enabled, the HTTP API. Returns the HTTP port if listening. */
  async start(): Promise<number | null> {
    this.startedAt = this.now();
    let port: number | null = null;
    if (this.config.http.enabled) {
      this.httpServer = this.createHttpServer();
      port = await this.httpServer.start(this.config.http.port, this.config.http.host);
    }
    this.sampler.start();
    this.log.info({ mode: 'continuous', intervalSeconds: this.config.sampling.intervalSeconds }, 'Monitor started');
    return port;
  }

  async stop(): Promise<void> {
    this.sampler.stop();
    if (this.httpServer) {
      await this.httpServer.stop();
      this.httpServer = undefined;
    }
    await this.connection.disconnect();
    this.log.info('Monitor stopped');
  }

  getStatus(): StatusSnapshot {
    return this.statusReporter.getStatus();
  }

  createHttpServer(): MonitorHttpServer {
    return new MonitorHttpServer({
      getStatus: () => this.getStatus(),
      listNodes: () => this.registry.listAll(),
      listFavorites: () => this.registry.listFavorites(),
      getNode: (nodeId) => this.registry.get(nodeId),
      setFavorite: (nodeId, isFavorite) => this.registry.setFavorite(nodeId, isFavorite),
      queryHistory: (nodeId, from, to) => Array.from(this.history.queryRange(nodeId, from, to)),
      batteryTrend: (nodeId, from, to) => this.history.batteryTrend(nodeId, from, to),
      getHistorySummary: () => this.history.summary(),
      getAlerts: () => this.sampler.currentAlerts(),
      connect: () => this.connect(),
      disconnect: () => this.disconnect(),
      now: this.now,
    });
  }

  private wireLogging(): void {
    this.connection.on('stateChange', (state: ConnectionState) => {
      if (state.status === 'failed') {
        this.log.warn({ reason: state.reason }, 'Could not reach the gateway');
      }
    });
    this.connection.on('linkLost', () => {
      if (this.sampler.running) this.log.info('Reconnecting on the next tick');
    });
  }
}

/**
 * Monitor HTTP Server
 *
 * Read-mostly JSON API over the running monitor:
 * - Health checks (/ping, /health)
 * - Node table, favourites and per-node history (/api/nodes/*)
 * - Active alerts and history summary
 * - Explicit connect / disconnect of the gateway link
 */

import * as http from 'http';
import { getLogger } from '../logger';
import { ConnectionState } from '../connection/types';
import { NodeView } from '../registry/types';
import { Alert } from '../alerts/types';
import { BatteryTrend, HistorySummary, Sample } from '../history/types';
import { StatusSnapshot } from './status-reporter';

export interface HttpServerDeps {
  getStatus: () => StatusSnapshot;
  listNodes: () => NodeView[];
  listFavorites: () => NodeView[];
  getNode: (nodeId: string) => NodeView | undefined;
  setFavorite: (nodeId: string, isFavorite: boolean) => NodeView;
  queryHistory: (nodeId: string, from: number, to: number) => Sample[];
  batteryTrend: (nodeId: string, from: number, to: number) => BatteryTrend | null;
  getHistorySummary: () => HistorySummary;
  getAlerts: () => Alert[];
  connect: () => Promise<ConnectionState>;
  disconnect: () => Promise<void>;
  now?: () => number;
}

/** Accepts epoch milliseconds or an ISO-8601 string. */
export function parseTimeParam(value: string | null): number | null | undefined {
  if (value === null || value === '') return undefined;
  if (/^\d+$/.test(value)) return Number(value);
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body, null, 2));
}

const NODE_ROUTE = /^\/api\/nodes\/([^/]+)(\/history|\/favorite)?$/;

export class MonitorHttpServer {
  private server?: http.Server;
  private deps: HttpServerDeps;
  private log = getLogger('HttpServer');

  constructor(deps: HttpServerDeps) {
    this.deps = deps;
  }

  /** Listen and resolve with the bound port (useful with port 0). */
  start(port: number, host = '127.0.0.1'): Promise<number> {
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.log.error({ url: req.url, error: message }, 'Request handler failed');
        if (!res.headersSent) sendJson(res, 500, { error: message });
        else res.end();
      });
    });
    this.server = server;

    server.on('error', (err: NodeJS.ErrnoException) => {
      this.log.error({ error: err.message }, 'HTTP server error');
    });

    return new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        const address = server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        this.log.info({ host, port: bound }, 'HTTP server started');
        resolve(bound);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) return Promise.resolve();
    return new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  getServer(): http.Server | undefined {
    return this.server;
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = url.pathname;

    if (method === 'GET' && pathname === '/ping') {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('pong');
      return;
    }

    if (method === 'GET' && pathname === '/health') {
      const status = this.deps.getStatus();
      sendJson(res, status.status === 'ok' ? 200 : 503, status);
      return;
    }

    if (method === 'GET' && pathname === '/api/nodes') {
      sendJson(res, 200, this.deps.listNodes());
      return;
    }

    if (method === 'GET' && pathname === '/api/nodes/favorites') {
      sendJson(res, 200, this.deps.listFavorites());
      return;
    }

    if (method === 'GET' && pathname === '/api/alerts') {
      sendJson(res, 200, this.deps.getAlerts());
      return;
    }

    if (method === 'GET' && pathname === '/api/history/summary') {
      sendJson(res, 200, this.deps.getHistorySummary());
      return;
    }

    if (method === 'POST' && pathname === '/api/connect') {
      const state = await this.deps.connect();
      sendJson(res, state.status === 'connected' ? 200 : 502, state);
      return;
    }

    if (method === 'POST' && pathname === '/api/disconnect') {
      await this.deps.disconnect();
      sendJson(res, 200, { status: 'disconnected' });
      return;
    }

    const match = NODE_ROUTE.exec(pathname);
    if (match) {
      this.handleNodeRoute(method, decodeURIComponent(match[1]), match[2], url.searchParams, res);
      return;
    }

    res.writeHead(404);
    res.end();
  }

  private handleNodeRoute(
    method: string,
    nodeId: string,
    sub: string | undefined,
    params: URLSearchParams,
    res: http.ServerResponse,
  ): void {
    if (sub === undefined && method === 'GET') {
      const node = this.deps.getNode(nodeId);
      if (!node) {
        sendJson(res, 404, { error: `Unknown node: ${nodeId}` });
        return;
      }
      sendJson(res, 200, node);
      return;
    }

    if (sub === '/history' && method === 'GET') {
      const from = parseTimeParam(params.get('from'));
      const to = parseTimeParam(params.get('to'));
      if (from === null || to === null) {
        sendJson(res, 400, { error: 'from and to must be epoch milliseconds or ISO-8601 timestamps' });
        return;
      }
      const fromMs = from ?? 0;
      const toMs = to ?? (this.deps.now ?? Date.now)();
      sendJson(res, 200, {
        nodeId,
        from: fromMs,
        to: toMs,
        samples: this.deps.queryHistory(nodeId, fromMs, toMs),
        trend: this.deps.batteryTrend(nodeId, fromMs, toMs),
      });
      return;
    }

    if (sub === '/favorite' && (method === 'PUT' || method === 'DELETE')) {
      const node = this.deps.setFavorite(nodeId, method === 'PUT');
      sendJson(res, 200, node);
      return;
    }

    sendJson(res, 405, { error: `${method} not supported here` });
  }
}

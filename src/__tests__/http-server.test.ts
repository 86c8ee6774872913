import { describe, it, before, after, beforeEach } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { MonitorHttpServer, HttpServerDeps, parseTimeParam } from '../server/http-server';
import { StatusReporter, formatUptime } from '../server/status-reporter';
import { NodeRegistry } from '../registry/node-registry';
import { ConnectionState } from '../connection/types';
import { createLinkStats } from '../connection/link-stats';
import { Alert } from '../alerts/types';
import { Sample } from '../history/types';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');

const statusBody = z.object({ status: z.string(), uptime: z.number(), uptimeHuman: z.string() });
const nodeBody = z.object({ nodeId: z.string(), longName: z.string().optional(), isFavorite: z.boolean() });
const summaryBody = z.object({ totalRecords: z.number() });

async function readJson<T>(res: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  return schema.parse(await res.json());
}

describe('parseTimeParam', () => {
  it('should treat a missing value as unset', () => {
    assert.strictEqual(parseTimeParam(null), undefined);
    assert.strictEqual(parseTimeParam(''), undefined);
  });

  it('should read epoch milliseconds and ISO-8601', () => {
    assert.strictEqual(parseTimeParam('1700000000000'), 1_700_000_000_000);
    assert.strictEqual(parseTimeParam('2026-03-01T12:00:00Z'), NOW);
  });

  it('should reject anything else', () => {
    assert.strictEqual(parseTimeParam('yesterday'), null);
  });
});

describe('formatUptime', () => {
  it('should show only the units that matter', () => {
    assert.strictEqual(formatUptime(0), '0s');
    assert.strictEqual(formatUptime(3725), '1h 2m 5s');
    assert.strictEqual(formatUptime(90061), '1d 1h 1m 1s');
  });
});

describe('MonitorHttpServer', () => {
  let server: MonitorHttpServer;
  let base: string;
  let registry: NodeRegistry;
  let state: ConnectionState;
  let alerts: Alert[];
  let samples: Sample[];
  let historyQueries: Array<[string, number, number]>;

  before(async () => {
    registry = new NodeRegistry({ now: () => NOW });
    const reporter = new StatusReporter({
      getConnectionState: () => state,
      getLinkStats: () => createLinkStats(),
      getNodes: () => registry.listAll(),
      getAlerts: () => alerts,
      getLastTick: () => null,
      isSampling: () => true,
      intervalMs: 30_000,
      getStartedAt: () => NOW - 65_000,
      now: () => NOW,
    });
    const deps: HttpServerDeps = {
      getStatus: () => reporter.getStatus(),
      listNodes: () => registry.listAll(),
      listFavorites: () => registry.listFavorites(),
      getNode: (nodeId) => registry.get(nodeId),
      setFavorite: (nodeId, isFavorite) => registry.setFavorite(nodeId, isFavorite),
      queryHistory: (nodeId, from, to) => {
        historyQueries.push([nodeId, from, to]);
        return samples.filter((s) => s.nodeId === nodeId && s.timestamp >= from && s.timestamp <= to);
      },
      batteryTrend: () => null,
      getHistorySummary: () => ({ totalRecords: samples.length, uniqueNodes: 1, dateRange: null, latestTimestamp: null }),
      getAlerts: () => alerts,
      connect: async () => {
        state = { status: 'failed', reason: 'tcp://127.0.0.1:4403 Refused: connect ECONNREFUSED' };
        return state;
      },
      disconnect: async () => {
        state = { status: 'disconnected' };
      },
      now: () => NOW,
    };
    server = new MonitorHttpServer(deps);
    const port = await server.start(0);
    base = `http://127.0.0.1:${port}`;
  });

  after(async () => {
    await server.stop();
  });

  beforeEach(() => {
    state = { status: 'connected', transport: 'tcp', endpoint: 'tcp://127.0.0.1:4403', since: NOW };
    alerts = [];
    samples = [];
    historyQueries = [];
  });

  it('should answer /ping', async () => {
    const res = await fetch(`${base}/ping`);
    assert.strictEqual(res.status, 200);
    assert.strictEqual(await res.text(), 'pong');
  });

  it('should report health as 200 while connected', async () => {
    const res = await fetch(`${base}/health`);
    const body = await readJson(res, statusBody);
    assert.strictEqual(res.status, 200);
    assert.strictEqual(body.status, 'ok');
    assert.strictEqual(body.uptime, 65);
    assert.strictEqual(body.uptimeHuman, '1m 5s');
  });

  it('should report health as 503 while disconnected', async () => {
    state = { status: 'disconnected' };
    const res = await fetch(`${base}/health`);
    assert.strictEqual(res.status, 503);
    assert.strictEqual((await readJson(res, statusBody)).status, 'degraded');
  });

  it('should list nodes and favourites', async () => {
    registry.ingest([{ nodeId: '!00000011', batteryLevel: 70 }, { nodeId: '!00000012', batteryLevel: 40 }]);
    registry.setFavorite('!00000012', true);

    const all = await readJson(await fetch(`${base}/api/nodes`), z.array(nodeBody));
    const favorites = await readJson(await fetch(`${base}/api/nodes/favorites`), z.array(nodeBody));

    assert.ok(all.some((n) => n.nodeId === '!00000011'));
    assert.deepStrictEqual(favorites.map((n) => n.nodeId), ['!00000012']);
  });

  it('should return one node or 404', async () => {
    registry.ingest([{ nodeId: '!00000021', longName: 'Summit', batteryLevel: 55 }]);

    const found = await fetch(`${base}/api/nodes/${encodeURIComponent('!00000021')}`);
    assert.strictEqual(found.status, 200);
    assert.strictEqual((await readJson(found, nodeBody)).longName, 'Summit');

    const missing = await fetch(`${base}/api/nodes/${encodeURIComponent('!deadbeef')}`);
    assert.strictEqual(missing.status, 404);
    assert.deepStrictEqual(await missing.json(), { error: 'Unknown node: !deadbeef' });
  });

  it('should mark and unmark a favourite', async () => {
    const id = encodeURIComponent('!00000031');
    const put = await fetch(`${base}/api/nodes/${id}/favorite`, { method: 'PUT' });
    assert.strictEqual(put.status, 200);
    assert.strictEqual((await readJson(put, nodeBody)).isFavorite, true);
    assert.strictEqual(registry.get('!00000031')?.isFavorite, true);

    const del = await fetch(`${base}/api/nodes/${id}/favorite`, { method: 'DELETE' });
    assert.strictEqual((await readJson(del, nodeBody)).isFavorite, false);
  });

  it('should reject other methods on node routes', async () => {
    const res = await fetch(`${base}/api/nodes/${encodeURIComponent('!00000031')}/favorite`, { method: 'POST' });
    assert.strictEqual(res.status, 405);
    assert.deepStrictEqual(await res.json(), { error: 'POST not supported here' });
  });

  it('should serve history between the requested bounds', async () => {
    samples = [
      { nodeId: '!00000041', timestamp: NOW - 7_200_000, batteryLevel: 60 },
      { nodeId: '!00000041', timestamp: NOW - 3_600_000, batteryLevel: 58 },
    ];
    const id = encodeURIComponent('!00000041');

    const res = await fetch(`${base}/api/nodes/${id}/history?from=2026-03-01T10:30:00Z&to=${NOW}`);
    const body = await res.json();

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(body, {
      nodeId: '!00000041',
      from: NOW - 5_400_000,
      to: NOW,
      samples: [{ nodeId: '!00000041', timestamp: NOW - 3_600_000, batteryLevel: 58 }],
      trend: null,
    });
  });

  it('should default history bounds to everything up to now', async () => {
    await fetch(`${base}/api/nodes/${encodeURIComponent('!00000041')}/history`);
    assert.deepStrictEqual(historyQueries, [['!00000041', 0, NOW]]);
  });

  it('should reject unreadable history bounds', async () => {
    const res = await fetch(`${base}/api/nodes/${encodeURIComponent('!00000041')}/history?from=soon`);
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(historyQueries, []);
  });

  it('should list active alerts and the history summary', async () => {
    alerts = [{ nodeId: '!00000051', kind: 'Stale', level: 'warning', since: NOW }];
    samples = [{ nodeId: '!00000051', timestamp: NOW }];

    assert.deepStrictEqual(await (await fetch(`${base}/api/alerts`)).json(), alerts);
    assert.strictEqual((await readJson(await fetch(`${base}/api/history/summary`), summaryBody)).totalRecords, 1);
  });

  it('should answer connect with 502 when the gateway is unreachable', async () => {
    const res = await fetch(`${base}/api/connect`, { method: 'POST' });
    assert.strictEqual(res.status, 502);
    assert.strictEqual((await readJson(res, statusBody.pick({ status: true }))).status, 'failed');
  });

  it('should disconnect on request', async () => {
    const res = await fetch(`${base}/api/disconnect`, { method: 'POST' });
    assert.deepStrictEqual(await res.json(), { status: 'disconnected' });
    assert.deepStrictEqual(state, { status: 'disconnected' });
  });

  it('should answer 404 for unknown paths', async () => {
    const res = await fetch(`${base}/nope`);
    assert.strictEqual(res.status, 404);
    assert.strictEqual(await res.text(), '');
  });
});

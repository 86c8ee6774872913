import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'fs';
import * as path from 'path';
import { Sampler, TickResult, sampleFromNode } from '../sampler/sampler';
import { ConnectionManager } from '../connection/connection-manager';
import { NodeRegistry } from '../registry/node-registry';
import { HistoryStore } from '../history/history-store';
import { Alert } from '../alerts/types';
import { RawNodeReport } from '../gateway/types';
import { FakeBehavior, FakeLinkFactory } from './fake-link';

const TEST_DIR = path.join(__dirname, '../../.test-sampler');
const T0 = 1_700_000_000_000;
const HOUR = 3_600_000;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface Rig {
  factory: FakeLinkFactory;
  connection: ConnectionManager;
  registry: NodeRegistry;
  history: HistoryStore;
  sampler: Sampler;
}

describe('Sampler', () => {
  let clock: number;
  let reports: RawNodeReport[];
  let rig: Rig;

  function build(tcp: FakeBehavior = { fetch: () => reports }, dataDir = TEST_DIR, minSaveIntervalSeconds = 0): Rig {
    const factory = new FakeLinkFactory({ tcp });
    const now = (): number => clock;
    const connection = new ConnectionManager({ linkFactory: factory.create, now });
    const registry = new NodeRegistry({ now });
    const history = new HistoryStore({ dataDir, minSaveIntervalSeconds });
    const sampler = new Sampler({
      connection,
      registry,
      history,
      connectPreferences: { tcpHost: '127.0.0.1', tcpPort: 4403 },
      intervalMs: 20,
      now,
    });
    return { factory, connection, registry, history, sampler };
  }

  beforeEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
    clock = T0;
    reports = [
      { nodeId: '!00000001', batteryLevel: 80, uptimeSeconds: 100 },
      { nodeId: '!00000002', batteryLevel: 60, uptimeSeconds: 200 },
    ];
    rig = build();
  });

  afterEach(async () => {
    rig.sampler.stop();
    await rig.connection.disconnect();
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('should connect, fetch, ingest and persist in one tick', async () => {
    const result = await rig.sampler.tick();

    assert.strictEqual(result.ok, true);
    assert.strictEqual(result.at, T0);
    assert.strictEqual(result.connection.status, 'connected');
    assert.strictEqual(result.reports, 2);
    assert.deepStrictEqual(result.changed, ['!00000001', '!00000002']);
    assert.strictEqual(result.persisted, 2);
    assert.strictEqual(rig.registry.size, 2);
    assert.deepStrictEqual(
      [...rig.history.queryRange('!00000001', T0, T0)],
      [{ nodeId: '!00000001', timestamp: T0, batteryLevel: 80, uptimeSeconds: 100 }],
    );
  });

  it('should persist only nodes whose telemetry changed', async () => {
    await rig.sampler.tick();
    clock += 30_000;
    reports = [
      { nodeId: '!00000001', batteryLevel: 80, uptimeSeconds: 100 },
      { nodeId: '!00000002', batteryLevel: 59, uptimeSeconds: 230 },
    ];

    const result = await rig.sampler.tick();

    assert.deepStrictEqual(result.changed, ['!00000002']);
    assert.strictEqual(result.persisted, 1);
    assert.strictEqual(rig.history.summary().totalRecords, 3);
  });

  it('should persist a repeated reading once and the next change', async () => {
    const persisted: number[] = [];
    for (const uptimeSeconds of [10, 10, 20]) {
      reports = [{ nodeId: '!0000000a', uptimeSeconds }];
      persisted.push((await rig.sampler.tick()).persisted);
      clock += 30_000;
    }

    assert.deepStrictEqual(persisted, [1, 0, 1]);
    const rows = [...rig.history.queryRange('!0000000a', T0, T0 + HOUR)];
    assert.deepStrictEqual(rows.map((s) => [s.timestamp, s.uptimeSeconds]), [[T0, 10], [T0 + 60_000, 20]]);
  });

  it('should write a value held back by the save interval on a later tick', async () => {
    rig = build({ fetch: () => reports }, TEST_DIR, 60);
    const persisted: number[] = [];
    const run = async (offsetMs: number, uptimeSeconds: number): Promise<void> => {
      clock = T0 + offsetMs;
      reports = [{ nodeId: '!0000000a', uptimeSeconds }];
      persisted.push((await rig.sampler.tick()).persisted);
    };

    await run(0, 10);
    await run(30_000, 20);
    await run(90_000, 20);
    await run(150_000, 20);

    assert.deepStrictEqual(persisted, [1, 0, 1, 0]);
    const rows = [...rig.history.queryRange('!0000000a', T0, T0 + HOUR)];
    assert.deepStrictEqual(rows.map((s) => s.uptimeSeconds), [10, 20]);
    assert.strictEqual(rows[1].timestamp, T0 + 90_000);
  });

  it('should not persist a presence-only node', async () => {
    reports = [{ nodeId: '!00000003', longName: 'Quiet' }];
    const result = await rig.sampler.tick();

    assert.deepStrictEqual(result.changed, ['!00000003']);
    assert.strictEqual(result.persisted, 0);
  });

  it('should report a failed connect and carry on', async () => {
    rig = build({ openError: 'NotFound' });
    const failed: TickResult[] = [];
    rig.sampler.on('tickFailed', (result: TickResult) => failed.push(result));

    const result = await rig.sampler.tick();

    assert.strictEqual(result.ok, false);
    assert.strictEqual(result.failedStage, 'connect');
    assert.strictEqual(result.error, 'tcp://127.0.0.1:4403 NotFound: fake NotFound');
    assert.strictEqual(result.connection.status, 'failed');
    assert.deepStrictEqual(failed, [result]);
    assert.strictEqual(rig.sampler.lastTick, result);
  });

  it('should report a failed fetch and reconnect on the next tick', async () => {
    rig = build({ fetch: () => new Error('boom') });

    const first = await rig.sampler.tick();
    assert.strictEqual(first.failedStage, 'fetch');
    assert.strictEqual(first.error, 'link lost during fetch: boom');
    assert.strictEqual(first.connection.status, 'disconnected');

    rig.factory.link('tcp').behavior.fetch = () => reports;
    const second = await rig.sampler.tick();

    assert.strictEqual(second.ok, true);
    assert.strictEqual(rig.factory.link('tcp').opens, 2);
  });

  it('should raise and clear alerts across ticks', async () => {
    const raised: Alert[] = [];
    const cleared: Alert[] = [];
    rig.sampler.on('alertRaised', (alert: Alert) => raised.push(alert));
    rig.sampler.on('alertCleared', (alert: Alert) => cleared.push(alert));

    reports = [{ nodeId: '!00000001', batteryLevel: 10 }];
    const first = await rig.sampler.tick();
    assert.deepStrictEqual(raised, [{ nodeId: '!00000001', kind: 'LowBattery', level: 'warning', since: T0 }]);
    assert.deepStrictEqual(first.alerts, raised);

    clock += 30_000;
    reports = [{ nodeId: '!00000001', batteryLevel: 18 }];
    await rig.sampler.tick();
    assert.strictEqual(cleared.length, 0);
    assert.strictEqual(rig.sampler.currentAlerts().length, 1);

    clock += 30_000;
    reports = [{ nodeId: '!00000001', batteryLevel: 20 }];
    const third = await rig.sampler.tick();
    assert.deepStrictEqual(cleared.map((a) => a.kind), ['LowBattery']);
    assert.deepStrictEqual(third.cleared, cleared);
    assert.deepStrictEqual(rig.sampler.currentAlerts(), []);
  });

  it('should keep the alert set through a failed tick', async () => {
    reports = [{ nodeId: '!00000001', batteryLevel: 10 }];
    await rig.sampler.tick();

    rig.factory.link('tcp').behavior.fetch = () => new Error('boom');
    const failed = await rig.sampler.tick();

    assert.strictEqual(failed.ok, false);
    assert.strictEqual(failed.alerts.length, 1);
    assert.strictEqual(rig.sampler.currentAlerts().length, 1);
  });

  it('should stay ok and emit persistFailed when history cannot be written', async () => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
    const blocker = path.join(TEST_DIR, 'not-a-dir');
    fs.writeFileSync(blocker, '', 'utf-8');
    rig = build({ fetch: () => reports }, blocker);
    const errors: Error[] = [];
    rig.sampler.on('persistFailed', (err: Error) => errors.push(err));

    const result = await rig.sampler.tick();

    assert.strictEqual(result.ok, true);
    assert.strictEqual(result.persisted, 0);
    assert.strictEqual(typeof result.persistError, 'string');
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(rig.registry.size, 2);
  });

  it('should retry persistence on the next tick after a failure', async () => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
    const blocker = path.join(TEST_DIR, 'not-a-dir');
    fs.writeFileSync(blocker, '', 'utf-8');
    rig = build({ fetch: () => reports }, blocker);

    const first = await rig.sampler.tick();
    assert.strictEqual(typeof first.persistError, 'string');

    fs.rmSync(blocker);
    clock += 30_000;
    const second = await rig.sampler.tick();

    assert.deepStrictEqual(second.changed, []);
    assert.strictEqual(second.persistError, undefined);
    assert.strictEqual(second.persisted, 2);
    assert.deepStrictEqual(
      [...rig.history.queryRange('!00000001', T0, T0 + HOUR)],
      [{ nodeId: '!00000001', timestamp: T0 + 30_000, batteryLevel: 80, uptimeSeconds: 100 }],
    );
  });

  it('should not raise Stale for a node first reported long silent', async () => {
    reports = [{ nodeId: '!0000000b', batteryLevel: 80, lastHeard: T0 - 5 * HOUR }];
    const result = await rig.sampler.tick();

    assert.strictEqual(rig.registry.get('!0000000b')?.isActive, false);
    assert.deepStrictEqual(result.alerts, []);
  });

  it('should raise Stale once an active node falls silent', async () => {
    reports = [{ nodeId: '!0000000b', batteryLevel: 80, lastHeard: T0 }];
    await rig.sampler.tick();

    clock += 3 * HOUR;
    const result = await rig.sampler.tick();

    assert.deepStrictEqual(result.raised, [{ nodeId: '!0000000b', kind: 'Stale', level: 'warning', since: clock }]);
  });

  it('should share one tick between overlapping calls', async () => {
    rig = build({ fetch: () => reports, openDelayMs: 20 });

    const a = rig.sampler.tick();
    const b = rig.sampler.tick();

    assert.strictEqual(a, b);
    await a;
    assert.strictEqual(rig.factory.link('tcp').fetches, 1);
  });

  it('should return the registry from sampleOnce', async () => {
    const nodes = await rig.sampler.sampleOnce();
    assert.deepStrictEqual(nodes.map((n) => n.nodeId), ['!00000001', '!00000002']);
  });

  it('should tick right away on start and keep going until stopped', async () => {
    const ticks: TickResult[] = [];
    const second = new Promise<void>((resolve) => {
      rig.sampler.on('tick', (result: TickResult) => {
        ticks.push(result);
        if (ticks.length === 2) resolve();
      });
    });

    rig.sampler.start();
    assert.strictEqual(rig.sampler.running, true);
    await second;
    rig.sampler.stop();

    assert.strictEqual(rig.sampler.running, false);
    assert.ok(ticks.every((t) => t.ok));
  });

  it('should run a single loop after a restart during a tick', async () => {
    rig = build({ fetch: () => reports, openDelayMs: 30 });
    let ticks = 0;
    rig.sampler.on('tick', () => ticks++);

    rig.sampler.start();
    await delay(5);
    rig.sampler.stop();
    rig.sampler.start();
    await delay(120);
    rig.sampler.stop();
    await delay(5);

    const atStop = ticks;
    assert.ok(atStop > 0);
    await delay(80);
    assert.strictEqual(ticks, atStop);
  });
});

describe('sampleFromNode', () => {
  it('should copy only the telemetry that is present', () => {
    const sample = sampleFromNode({
      nodeId: '!00000001',
      hardwareModel: 'TBEAM',
      batteryLevel: 50,
      isCharging: false,
      isFavorite: true,
      isActive: true,
      batteryAlert: false,
      secondsSinceHeard: 0,
    }, T0);
    assert.deepStrictEqual(sample, { nodeId: '!00000001', timestamp: T0, batteryLevel: 50, isCharging: false });
  });
});

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Duplex } from 'stream';
import {
  LineSplitter,
  NODES_REQUEST,
  NdjsonNodeDecoder,
  nodeIdFromNum,
  toRawNodeReport,
} from '../gateway/ndjson-decoder';
import { LinkError } from '../link/types';

/** A duplex whose writes are captured and whose reads are pushed by the test */
function fakeGateway(onRequest: (stream: Duplex, request: string) => void): { stream: Duplex; writes: string[] } {
  const writes: string[] = [];
  const stream: Duplex = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      const text = chunk.toString('utf-8');
      writes.push(text);
      callback();
      setImmediate(() => onRequest(stream, text));
    },
  });
  return { stream, writes };
}

describe('LineSplitter', () => {
  it('should hold a partial line until its newline arrives', () => {
    const splitter = new LineSplitter();
    assert.deepStrictEqual(splitter.feed('{"a":1}\n{"b"'), ['{"a":1}']);
    assert.deepStrictEqual(splitter.feed(':2}\n'), ['{"b":2}']);
  });

  it('should drop blank lines and carriage returns', () => {
    const splitter = new LineSplitter();
    assert.deepStrictEqual(splitter.feed('\r\n{"a":1}\r\n\n'), ['{"a":1}']);
  });

  it('should throw ProtocolError on an overlong line', () => {
    const splitter = new LineSplitter(8);
    assert.throws(
      () => splitter.feed('0123456789'),
      (err: unknown) => err instanceof LinkError && err.kind === 'ProtocolError',
    );
  });
});

describe('toRawNodeReport', () => {
  it('should map user fields, metrics and lastHeard', () => {
    const report = toRawNodeReport({
      num: 0xa1b2c3d4,
      user: { id: '!a1b2c3d4', longName: 'Ridge Repeater', shortName: 'RDG', hwModel: 'RAK4631' },
      deviceMetrics: { batteryLevel: 87, voltage: 4.012, uptimeSeconds: 45000 },
      lastHeard: 1_700_000_000,
    });
    assert.deepStrictEqual(report, {
      nodeId: '!a1b2c3d4',
      longName: 'Ridge Repeater',
      shortName: 'RDG',
      hardwareModel: 'RAK4631',
      batteryLevel: 87,
      isCharging: false,
      voltage: 4.012,
      uptimeSeconds: 45000,
      lastHeard: 1_700_000_000_000,
    });
  });

  it('should treat a battery level above 100 as external power', () => {
    const report = toRawNodeReport({ user: { id: '!0000beef' }, deviceMetrics: { batteryLevel: 101, voltage: 4.19 } });
    assert.strictEqual(report.isCharging, true);
    assert.strictEqual(report.batteryLevel, undefined);
    assert.strictEqual(report.voltage, 4.19);
  });

  it('should keep exactly 100 as a battery level', () => {
    const report = toRawNodeReport({ user: { id: '!0000beef' }, deviceMetrics: { batteryLevel: 100 } });
    assert.strictEqual(report.batteryLevel, 100);
    assert.strictEqual(report.isCharging, false);
  });

  it('should derive the id from num when user.id is missing', () => {
    assert.strictEqual(toRawNodeReport({ num: 48879 }).nodeId, '!0000beef');
    assert.strictEqual(nodeIdFromNum(0xa1b2c3d4), '!a1b2c3d4');
  });

  it('should keep numeric hardware codes as numbers', () => {
    assert.strictEqual(toRawNodeReport({ num: 1, user: { hwModel: 43 } }).hardwareModel, 43);
  });

  it('should ignore non-numeric metrics and a zero lastHeard', () => {
    const report = toRawNodeReport({
      num: 1,
      deviceMetrics: { batteryLevel: 'high', voltage: null },
      lastHeard: 0,
    });
    assert.deepStrictEqual(report, { nodeId: '!00000001' });
  });

  it('should reject a node without any id', () => {
    assert.throws(
      () => toRawNodeReport({ user: { longName: 'Nameless' } }),
      (err: unknown) => err instanceof LinkError && err.kind === 'ProtocolError',
    );
  });
});

describe('NdjsonNodeDecoder', () => {
  const decoder = new NdjsonNodeDecoder();

  it('should send one request and collect nodes until end', async () => {
    const { stream, writes } = fakeGateway((s) => {
      s.push('{"type":"node","node":{"num":1,"deviceMetrics":{"batteryLevel":50}}}\n{"type":"no');
      s.push('de","node":{"num":2}}\n');
      s.push('{"type":"end"}\n');
    });

    const reports = await decoder.requestNodes(stream);
    assert.deepStrictEqual(writes, [NODES_REQUEST]);
    assert.deepStrictEqual(reports.map((r) => r.nodeId), ['!00000001', '!00000002']);
    assert.strictEqual(reports[0].batteryLevel, 50);
  });

  it('should resolve with an empty list when the gateway knows no nodes', async () => {
    const { stream } = fakeGateway((s) => s.push('{"type":"end"}\n'));
    assert.deepStrictEqual(await decoder.requestNodes(stream), []);
  });

  it('should reject with ProtocolError on a line that is not JSON', async () => {
    const { stream } = fakeGateway((s) => s.push('garbage\n'));
    await assert.rejects(
      decoder.requestNodes(stream),
      (err: unknown) => err instanceof LinkError && err.kind === 'ProtocolError',
    );
  });

  it('should reject with ProtocolError on an unknown message type', async () => {
    const { stream } = fakeGateway((s) => s.push('{"type":"weather"}\n'));
    await assert.rejects(
      decoder.requestNodes(stream),
      (err: unknown) => err instanceof LinkError && err.kind === 'ProtocolError',
    );
  });

  it('should reject with Refused when the stream closes mid-list', async () => {
    const { stream } = fakeGateway((s) => {
      s.push('{"type":"node","node":{"num":1}}\n');
      s.destroy();
    });
    await assert.rejects(
      decoder.requestNodes(stream),
      (err: unknown) => err instanceof LinkError && err.kind === 'Refused',
    );
  });

  it('should stop listening once the list ends', async () => {
    const { stream } = fakeGateway((s) => s.push('{"type":"end"}\n'));
    await decoder.requestNodes(stream);
    assert.strictEqual(stream.listenerCount('data'), 0);
    assert.strictEqual(stream.listenerCount('close'), 0);
  });
});

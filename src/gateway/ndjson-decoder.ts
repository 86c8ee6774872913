/**
 * NDJSON Node-List Decoder
 *
 * Talks to a gateway bridge that exposes the radio's node database as
 * newline-delimited JSON. One exchange:
 *
 *   -> {"type":"nodes"}
 *   <- {"type":"node","node":{"num":...,"user":{...},"deviceMetrics":{...},"lastHeard":...}}
 *   <- ... one line per node ...
 *   <- {"type":"end"}
 *
 * Node objects keep the gateway's node-database shape. A battery level
 * above 100 is the device's "on external power" marker and becomes
 * isCharging with no battery level. lastHeard arrives in epoch seconds.
 */

import { Duplex } from 'stream';
import { z } from 'zod';
import { NodeReportDecoder, RawNodeReport } from './types';
import { LinkError } from '../link/types';

export const NODES_REQUEST = JSON.stringify({ type: 'nodes' }) + '\n';

const EXTERNAL_POWER_LEVEL = 100;

const userSchema = z.object({
  id: z.unknown(),
  longName: z.unknown(),
  shortName: z.unknown(),
  hwModel: z.unknown(),
}).partial();

export const gatewayNodeSchema = z.object({
  num: z.number().int().nonnegative().optional(),
  user: userSchema.optional(),
  deviceMetrics: z.record(z.unknown()).optional(),
  lastHeard: z.unknown().optional(),
});

export type GatewayNode = z.infer<typeof gatewayNodeSchema>;

const messageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('node'), node: gatewayNodeSchema }),
  z.object({ type: z.literal('end') }),
]);

type GatewayMessage = z.infer<typeof messageSchema>;

/** Splits a byte stream into lines, holding partial lines across chunks. */
export class LineSplitter {
  private pending = '';
  private readonly maxLineLength: number;

  constructor(maxLineLength = 64 * 1024) {
    this.maxLineLength = maxLineLength;
  }

  feed(chunk: Buffer | string): string[] {
    this.pending += typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
    const parts = this.pending.split('\n');
    this.pending = parts.pop() ?? '';
    if (this.pending.length > this.maxLineLength) {
      throw new LinkError('ProtocolError', `line exceeds ${this.maxLineLength} bytes without a newline`);
    }
    return parts.map((line) => line.trim()).filter((line) => line.length > 0);
  }
}

function numberField(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function stringField(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Node id in the gateway's "!hex" form */
export function nodeIdFromNum(num: number): string {
  return '!' + num.toString(16).padStart(8, '0');
}

/** Convert one gateway node-database entry into a report. */
export function toRawNodeReport(node: GatewayNode): RawNodeReport {
  const nodeId = stringField(node.user?.id) ?? (node.num !== undefined ? nodeIdFromNum(node.num) : undefined);
  if (!nodeId) {
    throw new LinkError('ProtocolError', 'node entry has neither user.id nor num');
  }

  const report: RawNodeReport = { nodeId };

  const longName = stringField(node.user?.longName);
  if (longName !== undefined) report.longName = longName;
  const shortName = stringField(node.user?.shortName);
  if (shortName !== undefined) report.shortName = shortName;

  const hwModel = node.user?.hwModel;
  if (typeof hwModel === 'string' || typeof hwModel === 'number') report.hardwareModel = hwModel;

  const metrics = node.deviceMetrics ?? {};
  const batteryLevel = numberField(metrics.batteryLevel);
  if (batteryLevel !== undefined) {
    if (batteryLevel > EXTERNAL_POWER_LEVEL) {
      report.isCharging = true;
    } else {
      report.batteryLevel = batteryLevel;
      report.isCharging = false;
    }
  }
  const voltage = numberField(metrics.voltage);
  if (voltage !== undefined) report.voltage = voltage;
  const uptimeSeconds = numberField(metrics.uptimeSeconds);
  if (uptimeSeconds !== undefined) report.uptimeSeconds = uptimeSeconds;

  const lastHeard = numberField(node.lastHeard);
  if (lastHeard !== undefined && lastHeard > 0) report.lastHeard = lastHeard * 1000;

  return report;
}

function parseMessage(line: string): GatewayMessage {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    throw new LinkError('ProtocolError', `invalid JSON from gateway: ${line.slice(0, 80)}`, { cause: err });
  }
  const result = messageSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new LinkError('ProtocolError', `unexpected gateway message: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
  }
  return result.data;
}

export class NdjsonNodeDecoder implements NodeReportDecoder {
  readonly name = 'ndjson';

  requestNodes(stream: Duplex): Promise<RawNodeReport[]> {
    return new Promise<RawNodeReport[]>((resolve, reject) => {
      const splitter = new LineSplitter();
      const reports: RawNodeReport[] = [];
      let settled = false;

      const finish = (err: Error | null): void => {
        if (settled) return;
        settled = true;
        stream.off('data', onData);
        stream.off('close', onClose);
        stream.off('error', onError);
        if (err) reject(err);
        else resolve(reports);
      };

      const onData = (chunk: Buffer | string): void => {
        try {
          for (const line of splitter.feed(chunk)) {
            const message = parseMessage(line);
            if (message.type === 'end') {
              finish(null);
              return;
            }
            reports.push(toRawNodeReport(message.node));
          }
        } catch (err) {
          finish(err instanceof Error ? err : new LinkError('ProtocolError', String(err)));
        }
      };

      const onClose = (): void => {
        finish(new LinkError('Refused', 'gateway closed the stream before the node list ended'));
      };

      const onError = (err: Error): void => {
        finish(new LinkError('Refused', `stream error during node request: ${err.message}`, { cause: err }));
      };

      stream.on('data', onData);
      stream.on('close', onClose);
      stream.on('error', onError);
      stream.write(NODES_REQUEST, (err) => {
        if (err) onError(err);
      });
    });
  }
}

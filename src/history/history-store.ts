/**
 * History Store
 *
 * Append-only persistence of per-node samples as JSON lines in the data
 * directory:
 *
 *   samples.jsonl    one sample per line (row form)
 *   snapshots.jsonl  one {timestamp, nodes} object per append (tree form)
 *
 * A sample is only written when uptime, battery level or charging state
 * differ from the last sample written for that node, so idle nodes don't
 * pile up duplicate rows. Writes are synchronous appends: once append()
 * returns, the next queryRange() sees the rows.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { getLogger } from '../logger';
import { TrendPoint, slopePerHour } from './trend';
import { BatteryTrend, HistorySnapshot, HistorySummary, Sample, SampleTelemetry } from './types';

export const SAMPLES_FILE = 'samples.jsonl';
export const SNAPSHOTS_FILE = 'snapshots.jsonl';

const telemetrySchema = z.object({
  batteryLevel: z.number().min(0).max(100).optional(),
  voltage: z.number().min(0).optional(),
  isCharging: z.boolean().optional(),
  uptimeSeconds: z.number().int().min(0).optional(),
});

const sampleRecordSchema = telemetrySchema.extend({
  nodeId: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
});

const snapshotRecordSchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  nodes: z.record(telemetrySchema),
});

type SampleRecord = z.infer<typeof sampleRecordSchema>;

export interface HistoryStoreOptions {
  dataDir?: string;
  /** Minimum spacing between two persisted samples of one node; 0 disables */
  minSaveIntervalSeconds?: number;
}

export type TimeBound = number | Date;

function toMs(bound: TimeBound): number {
  return typeof bound === 'number' ? bound : bound.getTime();
}

function telemetryOf(sample: Sample): SampleTelemetry {
  const t: SampleTelemetry = {};
  if (sample.batteryLevel !== undefined) t.batteryLevel = sample.batteryLevel;
  if (sample.voltage !== undefined) t.voltage = sample.voltage;
  if (sample.isCharging !== undefined) t.isCharging = sample.isCharging;
  if (sample.uptimeSeconds !== undefined) t.uptimeSeconds = sample.uptimeSeconds;
  return t;
}

function toRecord(sample: Sample): SampleRecord {
  return {
    nodeId: sample.nodeId,
    timestamp: new Date(sample.timestamp).toISOString(),
    ...telemetryOf(sample),
  };
}

function fromRecord(record: SampleRecord): Sample {
  const { nodeId, timestamp, ...telemetry } = record;
  return { nodeId, timestamp: Date.parse(timestamp), ...telemetry };
}

/** Tree form of a batch of samples; the latest sample per node wins. */
export function buildSnapshot(samples: readonly Sample[]): HistorySnapshot {
  const nodes: Record<string, SampleTelemetry> = {};
  let latest = 0;
  for (const sample of samples) {
    nodes[sample.nodeId] = telemetryOf(sample);
    latest = Math.max(latest, sample.timestamp);
  }
  return { timestamp: new Date(latest).toISOString(), nodes };
}

/** True when the sample carries a change worth recording */
export function differsFrom(sample: Sample, last: Sample | undefined): boolean {
  if (!last) return true;
  return sample.uptimeSeconds !== last.uptimeSeconds
    || sample.batteryLevel !== last.batteryLevel
    || sample.isCharging !== last.isCharging;
}

export class HistoryStore {
  readonly dataDir: string;
  private samplesPath: string;
  private snapshotsPath: string;
  private minSaveIntervalMs: number;
  private lastPersisted = new Map<string, Sample>();
  /** Rows already written whose snapshot line is not yet */
  private pendingSnapshot: Sample[] = [];
  private log = getLogger('HistoryStore');

  constructor(options: HistoryStoreOptions = {}) {
    this.dataDir = options.dataDir ?? path.join(process.cwd(), 'data');
    this.samplesPath = path.join(this.dataDir, SAMPLES_FILE);
    this.snapshotsPath = path.join(this.dataDir, SNAPSHOTS_FILE);
    this.minSaveIntervalMs = (options.minSaveIntervalSeconds ?? 0) * 1000;
    this.restoreLastPersisted();
  }

  /**
   * Apply the filtering policy and append what survives. Returns the
   * samples actually written. Storage errors propagate to the caller.
   *
   * Rows are written before the snapshot line. When only the snapshot
   * write fails, its samples are folded into the snapshot of the next
   * append, which retries it even when it accepts nothing new.
   */
  append(samples: readonly Sample[]): Sample[] {
    const accepted = this.filter(samples);

    if (accepted.length > 0) {
      this.ensureDir();
      const rows = accepted.map((s) => JSON.stringify(toRecord(s))).join('\n') + '\n';
      this.fenceTornTail(this.samplesPath);
      fs.appendFileSync(this.samplesPath, rows, 'utf-8');

      for (const sample of accepted) {
        this.lastPersisted.set(sample.nodeId, sample);
      }
      this.pendingSnapshot.push(...accepted);
    }

    if (this.pendingSnapshot.length > 0) {
      this.ensureDir();
      this.fenceTornTail(this.snapshotsPath);
      fs.appendFileSync(this.snapshotsPath, JSON.stringify(buildSnapshot(this.pendingSnapshot)) + '\n', 'utf-8');
      this.pendingSnapshot = [];
    }

    if (accepted.length > 0) {
      this.log.debug({ written: accepted.length, offered: samples.length }, 'Appended samples');
    }
    return accepted;
  }

  /** The subset of `samples` the filtering policy would persist, in order. */
  filter(samples: readonly Sample[]): Sample[] {
    const last = new Map(this.lastPersisted);
    const accepted: Sample[] = [];
    for (const sample of samples) {
      const prev = last.get(sample.nodeId);
      if (!differsFrom(sample, prev)) continue;
      if (prev && this.minSaveIntervalMs > 0 && sample.timestamp - prev.timestamp < this.minSaveIntervalMs) continue;
      accepted.push(sample);
      last.set(sample.nodeId, sample);
    }
    return accepted;
  }

  /** Most recently persisted sample for a node */
  lastSample(nodeId: string): Sample | undefined {
    return this.lastPersisted.get(nodeId);
  }

  /**
   * Samples of one node with from <= timestamp <= to, ascending. Nothing is
   * read until iteration starts, and each iteration reads afresh.
   */
  queryRange(nodeId: string, from: TimeBound, to: TimeBound): Iterable<Sample> {
    const fromMs = toMs(from);
    const toMsBound = toMs(to);
    return {
      [Symbol.iterator]: () => this.rangeIterator(nodeId, fromMs, toMsBound),
    };
  }

  batteryTrend(nodeId: string, from: TimeBound, to: TimeBound): BatteryTrend | null {
    const points: TrendPoint[] = [];
    for (const sample of this.queryRange(nodeId, from, to)) {
      if (sample.batteryLevel !== undefined && sample.isCharging !== true) {
        points.push({ t: sample.timestamp, value: sample.batteryLevel });
      }
    }
    const slope = slopePerHour(points);
    if (slope === null) return null;

    const latest = points[points.length - 1].value;
    return {
      nodeId,
      percentPerHour: slope,
      points: points.length,
      hoursToEmpty: slope < 0 ? latest / -slope : null,
    };
  }

  latestSnapshot(): HistorySnapshot | null {
    let latest: HistorySnapshot | null = null;
    for (const line of this.readLines(this.snapshotsPath)) {
      const parsed = this.parseLine(line, snapshotRecordSchema);
      if (parsed) latest = parsed;
    }
    return latest;
  }

  summary(): HistorySummary {
    let total = 0;
    let start = Infinity;
    let end = -Infinity;
    const nodes = new Set<string>();
    for (const sample of this.readAll()) {
      total++;
      nodes.add(sample.nodeId);
      start = Math.min(start, sample.timestamp);
      end = Math.max(end, sample.timestamp);
    }
    if (total === 0) {
      return { totalRecords: 0, uniqueNodes: 0, dateRange: null, latestTimestamp: null };
    }
    const endIso = new Date(end).toISOString();
    return {
      totalRecords: total,
      uniqueNodes: nodes.size,
      dateRange: { start: new Date(start).toISOString(), end: endIso },
      latestTimestamp: endIso,
    };
  }

  // --- Internals ---

  private *rangeIterator(nodeId: string, fromMs: number, toMs: number): Generator<Sample> {
    const matches: Sample[] = [];
    let ordered = true;
    for (const sample of this.readAll()) {
      if (sample.nodeId !== nodeId || sample.timestamp < fromMs || sample.timestamp > toMs) continue;
      if (matches.length > 0 && sample.timestamp < matches[matches.length - 1].timestamp) ordered = false;
      matches.push(sample);
    }
    // Wall-clock steps backwards can leave rows out of order on disk
    if (!ordered) matches.sort((a, b) => a.timestamp - b.timestamp);
    yield* matches;
  }

  private *readAll(): Generator<Sample> {
    for (const line of this.readLines(this.samplesPath)) {
      const record = this.parseLine(line, sampleRecordSchema);
      if (record) yield fromRecord(record);
    }
  }

  private readLines(filePath: string): string[] {
    if (!fs.existsSync(filePath)) return [];
    return fs.readFileSync(filePath, 'utf-8').split('\n').filter((line) => line.trim().length > 0);
  }

  /** Unparseable lines (a torn tail after a crash) are skipped, not fatal. */
  private parseLine<T>(line: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      this.log.warn({ line: line.slice(0, 80) }, 'Skipping unreadable history line');
      return null;
    }
    const result = schema.safeParse(json);
    if (!result.success) {
      this.log.warn({ line: line.slice(0, 80) }, 'Skipping invalid history record');
      return null;
    }
    return result.data;
  }

  private restoreLastPersisted(): void {
    for (const sample of this.readAll()) {
      const prev = this.lastPersisted.get(sample.nodeId);
      if (!prev || sample.timestamp >= prev.timestamp) {
        this.lastPersisted.set(sample.nodeId, sample);
      }
    }
    if (this.lastPersisted.size > 0) {
      this.log.info({ nodes: this.lastPersisted.size }, 'Restored last persisted samples');
    }
  }

  private ensureDir(): void {
    if (!fs.existsSync(this.dataDir)) {
      fs.mkdirSync(this.dataDir, { recursive: true });
    }
  }

  /** A file not ending in a newline had a write cut short; start on a fresh line. */
  private fenceTornTail(filePath: string): void {
    if (!fs.existsSync(filePath)) return;
    const { size } = fs.statSync(filePath);
    if (size === 0) return;

    const fd = fs.openSync(filePath, 'r');
    try {
      const last = Buffer.alloc(1);
      fs.readSync(fd, last, 0, 1, size - 1);
      if (last[0] === 0x0a) return;
    } finally {
      fs.closeSync(fd);
    }
    this.log.warn({ file: path.basename(filePath) }, 'Found torn trailing record, fencing it off');
    fs.appendFileSync(filePath, '\n', 'utf-8');
  }
}

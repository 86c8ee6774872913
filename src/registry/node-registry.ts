/**
 * Node Registry
 *
 * Canonical in-memory table of every node the gateway has told us about.
 * Reports are merged field by field: a field missing from a report keeps
 * its previous value, and a field outside its physical range is dropped
 * while the previous value stays. Nodes are never removed, only aged out
 * through isActive.
 *
 * ingest() and setFavorite() build the new record off to the side and swap
 * it in with a single Map.set, so readers only ever see whole records.
 */

import { getLogger } from '../logger';
import { RawNodeReport } from '../gateway/types';
import { HardwareModelTable, UNKNOWN_HARDWARE } from '../gateway/hardware-models';
import { DEFAULT_REGISTRY_THRESHOLDS, MeshNode, NodeView, RegistryThresholds } from './types';

const MS_PER_HOUR = 3600 * 1000;
/** Device clocks may run slightly ahead of ours */
const LAST_HEARD_FUTURE_SKEW_MS = 5 * 60 * 1000;

export interface NodeRegistryOptions {
  hardwareModels?: HardwareModelTable;
  thresholds?: Partial<RegistryThresholds>;
  now?: () => number;
}

function isValidBattery(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value >= 0 && value <= 100;
}

function isValidVoltage(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value >= 0;
}

function isValidUptime(value: number | undefined): value is number {
  return value !== undefined && Number.isInteger(value) && value >= 0;
}

function nonEmpty(value: string | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export class NodeRegistry {
  private nodes = new Map<string, MeshNode>();
  /** Nodes that have appeared in at least one report (placeholders have not) */
  private reported = new Set<string>();
  private hardwareModels: HardwareModelTable;
  private thresholds: RegistryThresholds;
  private now: () => number;
  private log = getLogger('NodeRegistry');

  constructor(options: NodeRegistryOptions = {}) {
    this.hardwareModels = options.hardwareModels ?? new HardwareModelTable();
    this.thresholds = { ...DEFAULT_REGISTRY_THRESHOLDS, ...options.thresholds };
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.nodes.size;
  }

  getThresholds(): RegistryThresholds {
    return { ...this.thresholds };
  }

  /**
   * Merge a batch of reports. Returns the ids whose battery, uptime or
   * charging state changed, plus nodes reported for the first time.
   */
  ingest(reports: readonly RawNodeReport[], now: number = this.now()): Set<string> {
    const changed = new Set<string>();

    for (const report of reports) {
      if (!nonEmpty(report.nodeId)) {
        this.log.warn('Skipping report without a node id');
        continue;
      }

      const nodeId = report.nodeId;
      const prev = this.nodes.get(nodeId);
      const next: MeshNode = prev
        ? { ...prev }
        : { nodeId, hardwareModel: UNKNOWN_HARDWARE, isFavorite: false };

      this.mergeReport(next, report, now);

      const isNew = !this.reported.has(nodeId);
      const material = isNew
        || prev?.batteryLevel !== next.batteryLevel
        || prev?.uptimeSeconds !== next.uptimeSeconds
        || prev?.isCharging !== next.isCharging;

      this.nodes.set(nodeId, next);
      this.reported.add(nodeId);
      if (material) changed.add(nodeId);
    }

    return changed;
  }

  /**
   * Mark or unmark a node as favourite. Unknown ids get a placeholder so a
   * node can be watched before it is ever heard.
   */
  setFavorite(nodeId: string, isFavorite: boolean): NodeView {
    const prev = this.nodes.get(nodeId);
    const next: MeshNode = prev
      ? { ...prev, isFavorite }
      : { nodeId, hardwareModel: UNKNOWN_HARDWARE, isFavorite };
    this.nodes.set(nodeId, next);
    return this.toView(next, this.now());
  }

  get(nodeId: string): NodeView | undefined {
    const node = this.nodes.get(nodeId);
    return node ? this.toView(node, this.now()) : undefined;
  }

  listAll(): NodeView[] {
    const now = this.now();
    return Array.from(this.nodes.values(), (node) => this.toView(node, now));
  }

  listFavorites(): NodeView[] {
    return this.listAll().filter((node) => node.isFavorite);
  }

  listNonFavorites(): NodeView[] {
    return this.listAll().filter((node) => !node.isFavorite);
  }

  // --- Internals ---

  private mergeReport(node: MeshNode, report: RawNodeReport, now: number): void {
    if (nonEmpty(report.longName)) node.longName = report.longName;
    if (nonEmpty(report.shortName)) node.shortName = report.shortName;

    const model = this.hardwareModels.resolve(report.hardwareModel);
    if (model !== undefined) node.hardwareModel = model;

    let hasTelemetry = false;

    if (isValidBattery(report.batteryLevel)) {
      node.batteryLevel = report.batteryLevel;
      hasTelemetry = true;
    } else if (report.batteryLevel !== undefined) {
      this.discard(node.nodeId, 'batteryLevel', report.batteryLevel);
    }

    if (isValidVoltage(report.voltage)) {
      node.voltage = report.voltage;
      hasTelemetry = true;
    } else if (report.voltage !== undefined) {
      this.discard(node.nodeId, 'voltage', report.voltage);
    }

    if (typeof report.isCharging === 'boolean') {
      node.isCharging = report.isCharging;
      hasTelemetry = true;
    }

    if (isValidUptime(report.uptimeSeconds)) {
      node.uptimeSeconds = report.uptimeSeconds;
      hasTelemetry = true;
    } else if (report.uptimeSeconds !== undefined) {
      this.discard(node.nodeId, 'uptimeSeconds', report.uptimeSeconds);
    }

    const heardAt = this.resolveLastHeard(report, hasTelemetry, now);
    if (heardAt !== undefined && (node.lastHeard === undefined || heardAt > node.lastHeard)) {
      node.lastHeard = heardAt;
    }
  }

  /**
   * A device-supplied contact time wins; otherwise telemetry in the report
   * means the node was heard now. Presence-only reports don't count.
   */
  private resolveLastHeard(report: RawNodeReport, hasTelemetry: boolean, now: number): number | undefined {
    const reported = report.lastHeard;
    if (reported !== undefined) {
      if (Number.isFinite(reported) && reported > 0 && reported <= now + LAST_HEARD_FUTURE_SKEW_MS) {
        return Math.min(reported, now);
      }
      this.discard(report.nodeId, 'lastHeard', reported);
    }
    return hasTelemetry ? now : undefined;
  }

  private discard(nodeId: string, field: string, value: unknown): void {
    this.log.debug({ nodeId, field, value }, 'Discarding out-of-range field');
  }

  private toView(node: MeshNode, now: number): NodeView {
    const secondsSinceHeard = node.lastHeard !== undefined
      ? Math.max(0, Math.floor((now - node.lastHeard) / 1000))
      : null;
    const activeWindowMs = this.thresholds.activeThresholdHours * MS_PER_HOUR;
    const isActive = node.lastHeard !== undefined && now - node.lastHeard <= activeWindowMs;
    const batteryAlert = node.batteryLevel !== undefined
      && node.batteryLevel < this.thresholds.batteryAlertThreshold
      && node.isCharging !== true;

    return { ...node, isActive, batteryAlert, secondsSinceHeard };
  }
}

/**
 * Hardware model names
 *
 * Gateways report the hardware model either as a numeric code or as the
 * model's enum name. Both are resolved against a lookup table loaded from
 * data/hardware-models.json, extended by config overrides. Anything the
 * table doesn't know becomes the "Unknown" sentinel.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export const UNKNOWN_HARDWARE = 'Unknown';

/** Codes that mean "not set" on the device */
const UNSET_NAMES = new Set(['UNSET']);

export const DEFAULT_HARDWARE_TABLE_PATH = path.join(__dirname, '..', '..', 'data', 'hardware-models.json');

const tableFileSchema = z.record(z.string().regex(/^\d+$/, 'keys must be numeric codes'), z.string().min(1));

export class HardwareModelTable {
  private byCode: Map<number, string>;
  private names: Set<string>;

  constructor(entries: Record<string, string> = {}) {
    this.byCode = new Map();
    for (const [code, name] of Object.entries(entries)) {
      this.byCode.set(Number(code), name);
    }
    this.names = new Set(this.byCode.values());
  }

  get size(): number {
    return this.byCode.size;
  }

  /**
   * Resolve a reported model. Returns undefined only when nothing was
   * reported, so callers can keep a previously known model.
   */
  resolve(value: string | number | undefined): string | undefined {
    if (value === undefined) return undefined;

    if (typeof value === 'number') {
      return this.nameOrUnknown(Number.isInteger(value) ? this.byCode.get(value) : undefined);
    }

    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
      return this.nameOrUnknown(this.byCode.get(Number(trimmed)));
    }
    return this.nameOrUnknown(this.names.has(trimmed) ? trimmed : undefined);
  }

  private nameOrUnknown(name: string | undefined): string {
    if (name === undefined || UNSET_NAMES.has(name)) return UNKNOWN_HARDWARE;
    return name;
  }
}

/**
 * Load the table from disk and apply overrides (code → name).
 * A missing file yields an overrides-only table; a malformed one throws.
 */
export function loadHardwareModels(
  filePath: string = DEFAULT_HARDWARE_TABLE_PATH,
  overrides: Record<string, string> = {},
): HardwareModelTable {
  let entries: Record<string, string> = {};
  if (fs.existsSync(filePath)) {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    entries = tableFileSchema.parse(raw);
  }
  return new HardwareModelTable({ ...entries, ...overrides });
}

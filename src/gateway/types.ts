/**
 * Gateway decoder boundary
 *
 * The mesh radio's own protocol is decoded outside the core. Whatever
 * decodes it hands over plain node records in this shape.
 */

import { Duplex } from 'stream';

/** One node as reported by the gateway. Every field but the id is optional. */
export interface RawNodeReport {
  nodeId: string;
  longName?: string;
  shortName?: string;
  /** Numeric model code or model name, resolved against the hardware table */
  hardwareModel?: string | number;
  batteryLevel?: number;
  voltage?: number;
  isCharging?: boolean;
  /** Epoch milliseconds */
  lastHeard?: number;
  uptimeSeconds?: number;
}

/**
 * Turns one request/response exchange on an open byte stream into node
 * records. Implementations reject with a LinkError of kind 'ProtocolError'
 * on malformed input.
 */
export interface NodeReportDecoder {
  readonly name: string;
  requestNodes(stream: Duplex): Promise<RawNodeReport[]>;
}

/**
 * Link Types
 *
 * A Link owns one physical transport to the gateway. Serial and TCP are
 * variants of the same tagged target; everything above the link factory
 * sees only the uniform Link capability set.
 */

import { Duplex } from 'stream';
import { RawNodeReport } from '../gateway/types';

export type TransportKind = 'serial' | 'tcp';

export interface SerialTarget {
  kind: 'serial';
  path: string;
  baudRate: number;
}

export interface TcpTarget {
  kind: 'tcp';
  host: string;
  port: number;
}

export type LinkTarget = SerialTarget | TcpTarget;

/** Human-readable endpoint, e.g. "tcp://192.168.0.114:4403" or "serial:///dev/ttyUSB0" */
export function describeTarget(target: LinkTarget): string {
  switch (target.kind) {
    case 'serial': return `serial://${target.path}`;
    case 'tcp': return `tcp://${target.host}:${target.port}`;
  }
}

export type LinkErrorKind = 'NotFound' | 'Refused' | 'Timeout' | 'ProtocolError';

export class LinkError extends Error {
  readonly kind: LinkErrorKind;

  constructor(kind: LinkErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkError';
    this.kind = kind;
  }
}

/** Opaque token for an open transport. Only the link that issued it may use it. */
export interface LinkHandle {
  readonly id: number;
  readonly target: LinkTarget;
  readonly openedAt: number;
  readonly stream: Duplex;
  readonly alive: boolean;
}

/**
 * Uniform transport capability set. A link never retries; retry and
 * fallback belong to the ConnectionManager.
 */
export interface Link {
  readonly target: LinkTarget;
  open(): Promise<LinkHandle>;
  close(handle: LinkHandle): Promise<void>;
  isAlive(handle: LinkHandle): boolean;
  fetchRawNodes(handle: LinkHandle): Promise<RawNodeReport[]>;
}

export type LinkFactory = (target: LinkTarget) => Link;

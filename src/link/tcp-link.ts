/**
 * TCP Link
 *
 * One net.Socket to the gateway's TCP port (4403 on stock firmware).
 * open() resolves once the socket connects and rejects with a LinkError
 * classified from the socket's error code.
 */

import * as net from 'net';
import { NodeReportDecoder, RawNodeReport } from '../gateway/types';
import { StreamHandle } from './stream-handle';
import { Link, LinkError, LinkErrorKind, LinkHandle, TcpTarget, describeTarget } from './types';

export const DEFAULT_TCP_PORT = 4403;

const NOT_FOUND_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH', 'EADDRNOTAVAIL']);
const REFUSED_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'EPIPE', 'ECONNABORTED']);

export function classifySocketError(err: NodeJS.ErrnoException): LinkErrorKind {
  const code = err.code ?? '';
  if (NOT_FOUND_CODES.has(code)) return 'NotFound';
  if (REFUSED_CODES.has(code)) return 'Refused';
  if (code === 'ETIMEDOUT') return 'Timeout';
  return 'Refused';
}

export interface TcpLinkOptions {
  /** Upper bound for the TCP handshake; the ConnectionManager adds its own */
  connectTimeoutMs?: number;
}

export class TcpLink implements Link {
  readonly target: TcpTarget;
  private decoder: NodeReportDecoder;
  private connectTimeoutMs: number;

  constructor(target: TcpTarget, decoder: NodeReportDecoder, options: TcpLinkOptions = {}) {
    this.target = target;
    this.decoder = decoder;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
  }

  open(): Promise<LinkHandle> {
    const { host, port } = this.target;
    return new Promise<LinkHandle>((resolve, reject) => {
      const sock = new net.Socket();

      const fail = (err: LinkError): void => {
        sock.removeAllListeners();
        sock.destroy();
        reject(err);
      };

      sock.setTimeout(this.connectTimeoutMs);
      sock.once('timeout', () => {
        fail(new LinkError('Timeout', `no TCP handshake with ${describeTarget(this.target)} within ${this.connectTimeoutMs}ms`));
      });
      sock.once('error', (err: NodeJS.ErrnoException) => {
        fail(new LinkError(classifySocketError(err), `${describeTarget(this.target)}: ${err.message}`, { cause: err }));
      });
      sock.once('connect', () => {
        sock.removeAllListeners('timeout');
        sock.removeAllListeners('error');
        sock.setTimeout(0);
        sock.setKeepAlive(true);
        resolve(new StreamHandle(this.target, sock));
      });

      sock.connect(port, host);
    });
  }

  async close(handle: LinkHandle): Promise<void> {
    if (handle instanceof StreamHandle) handle.markClosed();
    const sock = handle.stream;
    if (sock.destroyed) return;
    await new Promise<void>((resolve) => {
      sock.once('close', () => resolve());
      sock.destroy();
    });
  }

  isAlive(handle: LinkHandle): boolean {
    return handle.alive;
  }

  fetchRawNodes(handle: LinkHandle): Promise<RawNodeReport[]> {
    if (!handle.alive) {
      return Promise.reject(new LinkError('Refused', `${describeTarget(this.target)} is no longer connected`));
    }
    return this.decoder.requestNodes(handle.stream);
  }
}

/**
 * Serial Link
 *
 * The gateway plugged in over USB. Uses the serialport package; the port
 * factory is injectable so tests can run against serialport's mock binding.
 */

import { Duplex } from 'stream';
import { SerialPort } from 'serialport';
import { getLogger } from '../logger';
import { NodeReportDecoder, RawNodeReport } from '../gateway/types';
import { StreamHandle } from './stream-handle';
import { Link, LinkError, LinkErrorKind, LinkHandle, SerialTarget, describeTarget } from './types';

export const DEFAULT_BAUD_RATE = 115200;

/** The subset of SerialPort the link relies on */
export interface SerialPortLike extends Duplex {
  readonly isOpen: boolean;
  open(callback?: (err: Error | null) => void): void;
  close(callback?: (err: Error | null) => void): void;
}

export interface SerialPortFactoryOptions {
  path: string;
  baudRate: number;
  autoOpen: false;
}

export type SerialPortFactory = (options: SerialPortFactoryOptions) => SerialPortLike;

export const defaultSerialPortFactory: SerialPortFactory = (options) => new SerialPort(options);

export function classifySerialError(err: Error): LinkErrorKind {
  const msg = err.message;
  if (/no such file|does not exist|not found|ENOENT|cannot find/i.test(msg)) return 'NotFound';
  if (/busy|lock|access denied|permission denied|EACCES|EBUSY/i.test(msg)) return 'Refused';
  if (/timed? ?out/i.test(msg)) return 'Timeout';
  return 'Refused';
}

export interface SerialLinkOptions {
  createPort?: SerialPortFactory;
}

export class SerialLink implements Link {
  readonly target: SerialTarget;
  private decoder: NodeReportDecoder;
  private createPort: SerialPortFactory;
  private log = getLogger('SerialLink');

  constructor(target: SerialTarget, decoder: NodeReportDecoder, options: SerialLinkOptions = {}) {
    this.target = target;
    this.decoder = decoder;
    this.createPort = options.createPort ?? defaultSerialPortFactory;
  }

  open(): Promise<LinkHandle> {
    return new Promise<LinkHandle>((resolve, reject) => {
      let port: SerialPortLike;
      try {
        port = this.createPort({ path: this.target.path, baudRate: this.target.baudRate, autoOpen: false });
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        reject(new LinkError(classifySerialError(error), `${describeTarget(this.target)}: ${error.message}`, { cause: error }));
        return;
      }

      port.open((err) => {
        if (err) {
          reject(new LinkError(classifySerialError(err), `${describeTarget(this.target)}: ${err.message}`, { cause: err }));
          return;
        }
        resolve(new StreamHandle(this.target, port));
      });
    });
  }

  async close(handle: LinkHandle): Promise<void> {
    if (handle instanceof StreamHandle) handle.markClosed();
    const port = handle.stream;
    if (!isSerialPortLike(port) || !port.isOpen) {
      port.destroy();
      return;
    }
    await new Promise<void>((resolve) => {
      port.close((err) => {
        if (err) this.log.warn({ error: err.message }, 'Serial close reported an error');
        resolve();
      });
    });
  }

  isAlive(handle: LinkHandle): boolean {
    if (!handle.alive) return false;
    const port = handle.stream;
    return isSerialPortLike(port) ? port.isOpen : true;
  }

  fetchRawNodes(handle: LinkHandle): Promise<RawNodeReport[]> {
    if (!this.isAlive(handle)) {
      return Promise.reject(new LinkError('NotFound', `${describeTarget(this.target)} is no longer open`));
    }
    return this.decoder.requestNodes(handle.stream);
  }
}

function isSerialPortLike(stream: Duplex): stream is SerialPortLike {
  return 'isOpen' in stream && typeof stream.isOpen === 'boolean';
}

import { Duplex } from 'stream';
import { LinkHandle, LinkTarget } from './types';

let nextHandleId = 1;

/**
 * LinkHandle over a Node stream. Liveness follows the stream's own
 * lifecycle events, so a peer reset or unplugged cable is visible
 * without polling.
 */
export class StreamHandle implements LinkHandle {
  readonly id: number;
  readonly target: LinkTarget;
  readonly openedAt: number;
  readonly stream: Duplex;
  private _alive = true;

  constructor(target: LinkTarget, stream: Duplex, openedAt = Date.now()) {
    this.id = nextHandleId++;
    this.target = target;
    this.stream = stream;
    this.openedAt = openedAt;

    const markDead = (): void => { this._alive = false; };
    stream.once('close', markDead);
    stream.once('end', markDead);
    // A handle with no 'error' listener would crash the process on reset
    stream.on('error', markDead);
  }

  get alive(): boolean {
    return this._alive && !this.stream.destroyed;
  }

  markClosed(): void {
    this._alive = false;
  }
}

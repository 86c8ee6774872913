/**
 * GatewayEmulator — in-process stand-in for a gateway bridge
 *
 * Listens on TCP and answers each {"type":"nodes"} request with the node
 * table it was given, in the same NDJSON framing a real bridge uses.
 * Behaviours let tests exercise the failure paths:
 *
 *   normal   answer every request
 *   silent   accept the request and never answer
 *   garbage  answer with a line that is not JSON
 *   hangup   close the socket as soon as a request arrives
 */

import * as net from 'net';
import { getLogger } from '../logger';

export interface EmulatedNode {
  num?: number;
  user?: { id?: string; longName?: string; shortName?: string; hwModel?: string | number };
  deviceMetrics?: { batteryLevel?: number; voltage?: number; uptimeSeconds?: number };
  /** Epoch seconds */
  lastHeard?: number;
}

export type EmulatorBehavior = 'normal' | 'silent' | 'garbage' | 'hangup';

/** The full response to one node-list request. */
export function renderNodeList(nodes: readonly EmulatedNode[]): string {
  const lines = nodes.map((node) => JSON.stringify({ type: 'node', node }));
  lines.push(JSON.stringify({ type: 'end' }));
  return lines.join('\n') + '\n';
}

export class GatewayEmulator {
  behavior: EmulatorBehavior = 'normal';
  private nodes = new Map<string, EmulatedNode>();
  private server?: net.Server;
  private sockets = new Set<net.Socket>();
  private _requestCount = 0;
  private _connectionCount = 0;
  private log = getLogger('Emulator:gateway');

  constructor(nodes: readonly EmulatedNode[] = []) {
    this.setNodes(nodes);
  }

  get requestCount(): number {
    return this._requestCount;
  }

  /** Connections accepted since start */
  get connectionCount(): number {
    return this._connectionCount;
  }

  get openConnections(): number {
    return this.sockets.size;
  }

  setNodes(nodes: readonly EmulatedNode[]): void {
    this.nodes.clear();
    for (const node of nodes) this.upsertNode(node);
  }

  /** Insert or replace one node, keyed by user.id or num. */
  upsertNode(node: EmulatedNode): void {
    this.nodes.set(node.user?.id ?? String(node.num), node);
  }

  start(port = 0, host = '127.0.0.1'): Promise<number> {
    const server = net.createServer((socket) => this.accept(socket));
    this.server = server;
    return new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        const address = server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        this.log.debug({ port: bound }, 'Gateway emulator listening');
        resolve(bound);
      });
    });
  }

  /** Close every client connection but keep listening. */
  dropConnections(): void {
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    this.dropConnections();
    if (!server) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private accept(socket: net.Socket): void {
    this._connectionCount++;
    this.sockets.add(socket);
    let pending = '';

    socket.on('data', (chunk: Buffer) => {
      pending += chunk.toString('utf-8');
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';
      for (const line of lines) {
        if (line.trim().length > 0) this.handleLine(socket, line.trim());
      }
    });
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', (err) => this.log.debug({ error: err.message }, 'Client socket error'));
  }

  private handleLine(socket: net.Socket, line: string): void {
    let request: unknown;
    try {
      request = JSON.parse(line);
    } catch {
      this.log.debug({ line }, 'Ignoring unreadable request');
      return;
    }
    const isNodesRequest = typeof request === 'object' && request !== null
      && 'type' in request && request.type === 'nodes';
    if (!isNodesRequest) return;

    this._requestCount++;
    switch (this.behavior) {
      case 'normal':
        socket.write(renderNodeList([...this.nodes.values()]));
        break;
      case 'garbage':
        socket.write('this is not json\n');
        break;
      case 'hangup':
        socket.destroy();
        break;
      case 'silent':
        break;
    }
  }
}

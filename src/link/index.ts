import { NodeReportDecoder } from '../gateway/types';
import { SerialLink, SerialPortFactory } from './serial-link';
import { TcpLink } from './tcp-link';
import { LinkFactory } from './types';

export * from './types';
export { StreamHandle } from './stream-handle';
export { TcpLink, DEFAULT_TCP_PORT, classifySocketError } from './tcp-link';
export { SerialLink, DEFAULT_BAUD_RATE, classifySerialError, defaultSerialPortFactory } from './serial-link';
export type { SerialPortFactory, SerialPortLike } from './serial-link';

export interface LinkFactoryOptions {
  connectTimeoutMs?: number;
  createSerialPort?: SerialPortFactory;
}

/** The one place that branches on transport kind. */
export function createLinkFactory(decoder: NodeReportDecoder, options: LinkFactoryOptions = {}): LinkFactory {
  return (target) => {
    switch (target.kind) {
      case 'serial':
        return new SerialLink(target, decoder, { createPort: options.createSerialPort });
      case 'tcp':
        return new TcpLink(target, decoder, { connectTimeoutMs: options.connectTimeoutMs });
    }
  };
}

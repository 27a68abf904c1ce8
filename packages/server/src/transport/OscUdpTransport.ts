import { createSocket } from 'node:dgram';
import type { MetricsTransport } from '@hand-squeeze/engine';
import { type Logger, logger as defaultLogger } from '@hand-squeeze/shared';
import { encodeOscMessage } from './oscMessage.js';

/**
 * The part of a `dgram` socket the transport uses.
 */
export interface DatagramSocket {
  send(
    msg: Buffer,
    port: number,
    address: string,
    callback: (error: Error | null) => void
  ): void;
  close(callback?: () => void): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface OscUdpTransportConfig {
  host: string;
  port: number;
  /** Socket to send through (default: a new udp4 socket) */
  socket?: DatagramSocket | undefined;
  logger?: Logger | undefined;
}

/**
 * Sends each hand's vector as one OSC message over UDP.
 * Delivery is fire-and-forget; send failures are logged, never thrown.
 */
export class OscUdpTransport implements MetricsTransport {
  private readonly host: string;
  private readonly port: number;
  private readonly socket: DatagramSocket;
  private readonly logger: Logger;
  private closed = false;

  constructor(config: OscUdpTransportConfig) {
    this.host = config.host;
    this.port = config.port;
    this.logger = config.logger ?? defaultLogger;
    this.socket = config.socket ?? createSocket('udp4');
    this.socket.on('error', (error: Error) => {
      this.logger.error('OSC socket error', { error: error.message });
    });
  }

  send(address: string, values: readonly number[]): void {
    if (this.closed) {
      return;
    }
    const packet = encodeOscMessage(address, values);
    this.socket.send(packet, this.port, this.host, (error) => {
      if (error) {
        this.logger.warn('OSC send failed', { address, error: error.message });
      }
    });
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;
    return new Promise((resolve) => {
      this.socket.close(() => resolve());
    });
  }
}

/**
 * @fileoverview WebSocket endpoint for capture clients.
 *
 * A capture client runs the hand detector next to the camera and streams
 * `landmark_frame` messages here. The server is the loop's frame source, a
 * command source for `command` messages, and a view that broadcasts the
 * smoothed metrics back to every connected client.
 *
 * Only the newest unread frame is kept: a frame that arrives while the loop
 * is still busy with the previous one replaces any frame waiting before it.
 */

import { createServer, type Server } from 'node:http';
import type { HandResult } from '@hand-squeeze/engine';
import {
  type CalibrationStatus,
  type ClientMessage,
  type Hand,
  type Logger,
  logger as defaultLogger,
  parseClientMessage,
  type ServerMessage,
  serializeServerMessage,
  type TrackerCommand,
} from '@hand-squeeze/shared';
import { type RawData, type WebSocket, WebSocketServer } from 'ws';
import type { CommandSource, FrameSource, LandmarkFrame, MetricsView } from '../runtime/types.js';

/**
 * The part of a WebSocket the server talks to.
 */
export interface Connection {
  send(data: string): void;
  close(): void;
  /** Drop the socket without a close handshake */
  terminate(): void;
  readonly readyState: number;
  readonly OPEN: number;
}

export interface LandmarkStreamServerConfig {
  port: number;
  host?: string | undefined;
  logger?: Logger | undefined;
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export class LandmarkStreamServer implements FrameSource<LandmarkFrame> {
  private readonly port: number;
  private readonly host: string;
  private readonly logger: Logger;
  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private readonly connections = new Set<Connection>();
  private readonly pendingCommands: TrackerCommand[] = [];
  private pendingFrame: LandmarkFrame | null = null;
  private waitingReader: ((frame: LandmarkFrame | null) => void) | null = null;
  private ended = false;
  private droppedFrames = 0;

  /** Commands received from capture clients */
  readonly commands: CommandSource = {
    poll: () => this.pendingCommands.shift() ?? null,
    close: () => {
      this.pendingCommands.length = 0;
    },
  };

  /** Broadcasts results to every connected client */
  readonly view: MetricsView = {
    render: (results) => this.broadcastResults(results),
    showCalibration: (state) => this.broadcastCalibration(state),
    close: () => {},
  };

  constructor(config: LandmarkStreamServerConfig) {
    this.port = config.port;
    this.host = config.host ?? '127.0.0.1';
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Start listening.
   * @throws if the port cannot be bound
   */
  async open(): Promise<void> {
    const httpServer = createServer();
    const wss = new WebSocketServer({ server: httpServer });
    this.setupWebSocketHandlers(wss);

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      httpServer.once('error', onError);
      httpServer.listen(this.port, this.host, () => {
        httpServer.off('error', onError);
        resolve();
      });
    });

    this.httpServer = httpServer;
    this.wss = wss;
    this.ended = false;
    this.logger.info('Landmark stream listening', { port: this.port, host: this.host });
  }

  read(): Promise<LandmarkFrame | null> {
    if (this.pendingFrame) {
      const frame = this.pendingFrame;
      this.pendingFrame = null;
      return Promise.resolve(frame);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waitingReader = resolve;
    });
  }

  cancel(): void {
    this.endStream();
  }

  async release(): Promise<void> {
    this.endStream();
    for (const conn of this.connections) {
      conn.terminate();
    }
    this.connections.clear();

    const wss = this.wss;
    const httpServer = this.httpServer;
    this.wss = null;
    this.httpServer = null;
    if (wss) {
      wss.close();
    }
    if (httpServer) {
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
      });
      this.logger.info('Landmark stream closed', { droppedFrames: this.droppedFrames });
    }
  }

  handleConnection(conn: Connection): void {
    this.connections.add(conn);
    this.logger.info('Capture client connected', { clients: this.connections.size });
  }

  handleDisconnection(conn: Connection): void {
    this.connections.delete(conn);
    this.logger.info('Capture client disconnected', { clients: this.connections.size });
  }

  handleMessage(conn: Connection, data: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      this.sendTo(conn, { type: 'error', message: 'Malformed JSON' });
      return;
    }

    const message = parseClientMessage(raw);
    if (!message) {
      this.logger.warn('Invalid client message', { data: data.slice(0, 200) });
      this.sendTo(conn, { type: 'error', message: 'Invalid message format' });
      return;
    }

    this.dispatch(message);
  }

  get clientCount(): number {
    return this.connections.size;
  }

  private dispatch(message: ClientMessage): void {
    switch (message.type) {
      case 'landmark_frame':
        this.deliverFrame({
          size: { width: message.width, height: message.height },
          hands: message.hands,
        });
        break;
      case 'command':
        this.pendingCommands.push(message.command);
        break;
      case 'stream_end':
        this.logger.info('Capture client ended the stream');
        this.endStream();
        break;
    }
  }

  private deliverFrame(frame: LandmarkFrame): void {
    if (this.ended) {
      return;
    }
    if (this.waitingReader) {
      const resolve = this.waitingReader;
      this.waitingReader = null;
      resolve(frame);
      return;
    }
    if (this.pendingFrame) {
      this.droppedFrames++;
    }
    this.pendingFrame = frame;
  }

  private endStream(): void {
    this.ended = true;
    if (this.waitingReader) {
      const resolve = this.waitingReader;
      this.waitingReader = null;
      resolve(null);
    }
  }

  private broadcastResults(results: readonly HandResult[]): void {
    for (const result of results) {
      this.broadcast({ type: 'hand_metrics', hand: result.hand, values: result.metrics });
    }
  }

  private broadcastCalibration(state: Record<Hand, CalibrationStatus>): void {
    this.broadcast({ type: 'calibration_state', hands: state });
  }

  private broadcast(message: ServerMessage): void {
    const data = serializeServerMessage(message);
    for (const conn of this.connections) {
      if (conn.readyState === conn.OPEN) {
        conn.send(data);
      }
    }
  }

  private sendTo(conn: Connection, message: ServerMessage): void {
    if (conn.readyState === conn.OPEN) {
      conn.send(serializeServerMessage(message));
    }
  }

  private setupWebSocketHandlers(wss: WebSocketServer): void {
    wss.on('connection', (ws: WebSocket) => {
      this.handleConnection(ws);

      ws.on('message', (data: RawData) => {
        this.handleMessage(ws, rawDataToString(data));
      });

      ws.on('close', () => {
        this.handleDisconnection(ws);
      });

      ws.on('error', (error: Error) => {
        this.logger.error('WebSocket error', { error: error.message });
      });
    });
  }
}

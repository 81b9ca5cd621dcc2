import type { IncomingMessage } from 'node:http';
import WebSocket from 'ws';
import type { Logger } from 'pino';
import type { DuplexConnection, Frame, OutboundFrame } from './duplex-connection.js';

/** Normal closure (RFC 6455 §7.4.1). */
const CLOSE_NORMAL = 1000;

interface Waiter {
  resolve: (frame: Frame | null) => void;
  reject: (err: Error) => void;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Pull-based adapter over a `ws` client socket.
 *
 * `ws` emits events; the supervisor wants to await one frame at a time.
 * Incoming frames are queued until `receive()` asks for them. Automatic
 * pongs are turned off so that ping handling stays with the caller.
 */
export class WsConnection implements DuplexConnection {
  private readonly socket: WebSocket;
  private readonly queue: Frame[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private ended = false;

  constructor(socket: WebSocket) {
    this.socket = socket;

    socket.on('ping', (payload: Buffer) => {
      this.push({ kind: 'ping', payload });
    });

    socket.on('pong', (payload: Buffer) => {
      this.push({ kind: 'pong', payload });
    });

    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      const payload = toBuffer(data);
      this.push(isBinary
        ? { kind: 'binary', payload }
        : { kind: 'text', payload: payload.toString('utf-8') });
    });

    socket.on('close', (code: number, reason: Buffer) => {
      if (this.ended) return;
      this.push({ kind: 'close', code, reason: reason.toString('utf-8') });
      this.ended = true;
    });

    socket.on('error', (err: Error) => {
      this.fail(err);
    });
  }

  receive(): Promise<Frame | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);

    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  send(frame: OutboundFrame): Promise<void> {
    return new Promise((resolve, reject) => {
      const done = (err?: Error): void => {
        if (err) reject(err);
        else resolve();
      };

      if (frame.kind === 'pong') {
        this.socket.pong(frame.payload, undefined, done);
      } else {
        this.socket.send(frame.payload, done);
      }
    });
  }

  /** Closes with a normal closure and waits for the socket to finish closing. */
  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      if (this.socket.readyState !== WebSocket.CLOSING) {
        this.socket.close(CLOSE_NORMAL);
      }
    });
  }

  private push(frame: Frame): void {
    if (this.ended) return;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(frame);
      return;
    }
    this.queue.push(frame);
  }

  private fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.reject(err);
    }
  }
}

/**
 * Opens a WebSocket to `url` and resolves once the handshake completes.
 *
 * Rejects if the connection cannot be established.
 */
export function connectWebSocket(url: string, log: Logger): Promise<DuplexConnection> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url, { autoPong: false });

    const onError = (err: Error): void => {
      socket.off('open', onOpen);
      reject(err);
    };

    const onOpen = (): void => {
      socket.off('error', onError);
      resolve(new WsConnection(socket));
    };

    socket.once('upgrade', (response: IncomingMessage) => {
      log.info(
        { status: response.statusCode, headers: response.headers },
        'Connected to WebSocket endpoint',
      );
    });
    socket.once('open', onOpen);
    socket.once('error', onError);
  });
}

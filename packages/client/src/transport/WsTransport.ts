/**
 * @fileoverview Transport backed by the `ws` WebSocket client.
 */

import { ABNORMAL_CLOSURE, NORMAL_CLOSURE } from '@avatar-link/protocol';
import WebSocket from 'ws';
import { createLogger, type Logger } from '../utils/logger.js';
import { BaseTransport, type TransportFactory } from './Transport.js';

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

/**
 * WebSocket transport for Node.js.
 *
 * The socket is only created by `connect()`. `ws` reassembles fragmented
 * frames before emitting them, so binary messages always report zero
 * bytes remaining.
 */
export class WsTransport extends BaseTransport {
  private socket: WebSocket | null = null;

  constructor(
    url: string,
    private readonly logger: Logger = createLogger('WsTransport')
  ) {
    super(url);
  }

  connect(): void {
    if (this.socket) {
      this.logger.warn('Transport is already connecting', { url: this.url });
      return;
    }

    let socket: WebSocket;
    try {
      socket = new WebSocket(this.url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      queueMicrotask(() => this.emitConnectionError(message));
      return;
    }

    socket.binaryType = 'nodebuffer';
    this.socket = socket;

    socket.on('open', () => {
      this.emitConnected();
    });

    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      const buffer = toBuffer(data);
      if (isBinary) {
        this.emitBinaryMessage(buffer, buffer.byteLength, 0);
      } else {
        this.emitTextMessage(buffer.toString('utf8'));
      }
    });

    // Attached for the socket's lifetime: `ws` throws on an unhandled 'error'.
    socket.on('error', (error: Error) => {
      this.logger.debug('Socket error', { url: this.url, error: error.message });
      this.emitConnectionError(error.message);
    });

    socket.on('close', (code: number, reason: Buffer) => {
      this.emitClosed(code, reason.toString('utf8'), code !== ABNORMAL_CLOSURE);
    });
  }

  close(code: number, reason: string): void {
    this.socket?.close(code, reason);
  }

  isConnected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  release(): void {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;

    if (socket.readyState === WebSocket.CONNECTING) {
      socket.terminate();
    } else if (socket.readyState === WebSocket.OPEN) {
      socket.close(NORMAL_CLOSURE);
    }
  }
}

/**
 * Default transport factory.
 */
export const createWsTransport: TransportFactory = (url) => new WsTransport(url);

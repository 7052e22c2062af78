/**
 * @fileoverview Transport abstraction consumed by the receivers.
 *
 * A transport is one persistent, message-oriented connection to a single
 * URL. It is opened by a {@link TransportFactory}, connected with
 * `connect()`, and reports what happens through its subscriptions. All
 * operations are non-blocking; outcomes arrive later through callbacks.
 */

import { Signal } from '../utils/Signal.js';

export type Unsubscribe = () => void;

export type ConnectedListener = () => void;
export type ConnectionErrorListener = (message: string) => void;
export type ClosedListener = (code: number, reason: string, wasClean: boolean) => void;
export type BinaryMessageListener = (
  data: Uint8Array | null,
  size: number,
  bytesRemaining: number
) => void;
export type TextMessageListener = (text: string) => void;

export interface Transport {
  readonly url: string;

  /** Begin connecting. Resolves through `onConnected` or `onConnectionError`. */
  connect(): void;

  /** Request a close handshake. Resolves through `onClosed`. */
  close(code: number, reason: string): void;

  isConnected(): boolean;

  /** Drop the underlying socket. A handshake still in progress is aborted. */
  release(): void;

  onConnected(listener: ConnectedListener): Unsubscribe;
  onConnectionError(listener: ConnectionErrorListener): Unsubscribe;
  onClosed(listener: ClosedListener): Unsubscribe;
  onBinaryMessage(listener: BinaryMessageListener): Unsubscribe;
  onTextMessage(listener: TextMessageListener): Unsubscribe;
}

/**
 * Opens a transport to the given URL without connecting it.
 */
export type TransportFactory = (url: string) => Transport;

interface ClosedEvent {
  code: number;
  reason: string;
  wasClean: boolean;
}

interface BinaryFrame {
  data: Uint8Array | null;
  size: number;
  bytesRemaining: number;
}

/**
 * Subscription bookkeeping shared by transport implementations.
 * Subclasses drive the `emit*` methods from their socket.
 */
export abstract class BaseTransport implements Transport {
  private readonly connectedSignal = new Signal<void>('transport.connected');
  private readonly errorSignal = new Signal<string>('transport.error');
  private readonly closedSignal = new Signal<ClosedEvent>('transport.closed');
  private readonly binarySignal = new Signal<BinaryFrame>('transport.binary');
  private readonly textSignal = new Signal<string>('transport.text');

  constructor(readonly url: string) {}

  abstract connect(): void;
  abstract close(code: number, reason: string): void;
  abstract isConnected(): boolean;
  abstract release(): void;

  onConnected(listener: ConnectedListener): Unsubscribe {
    const token = this.connectedSignal.add(() => listener());
    return () => {
      this.connectedSignal.remove(token);
    };
  }

  onConnectionError(listener: ConnectionErrorListener): Unsubscribe {
    const token = this.errorSignal.add(listener);
    return () => {
      this.errorSignal.remove(token);
    };
  }

  onClosed(listener: ClosedListener): Unsubscribe {
    const token = this.closedSignal.add(({ code, reason, wasClean }) =>
      listener(code, reason, wasClean)
    );
    return () => {
      this.closedSignal.remove(token);
    };
  }

  onBinaryMessage(listener: BinaryMessageListener): Unsubscribe {
    const token = this.binarySignal.add(({ data, size, bytesRemaining }) =>
      listener(data, size, bytesRemaining)
    );
    return () => {
      this.binarySignal.remove(token);
    };
  }

  onTextMessage(listener: TextMessageListener): Unsubscribe {
    const token = this.textSignal.add(listener);
    return () => {
      this.textSignal.remove(token);
    };
  }

  /**
   * Number of live subscriptions across all events.
   */
  listenerCount(): number {
    return (
      this.connectedSignal.size +
      this.errorSignal.size +
      this.closedSignal.size +
      this.binarySignal.size +
      this.textSignal.size
    );
  }

  protected emitConnected(): void {
    this.connectedSignal.dispatch();
  }

  protected emitConnectionError(message: string): void {
    this.errorSignal.dispatch(message);
  }

  protected emitClosed(code: number, reason: string, wasClean: boolean): void {
    this.closedSignal.dispatch({ code, reason, wasClean });
  }

  protected emitBinaryMessage(data: Uint8Array | null, size: number, bytesRemaining: number): void {
    this.binarySignal.dispatch({ data, size, bytesRemaining });
  }

  protected emitTextMessage(text: string): void {
    this.textSignal.dispatch(text);
  }
}

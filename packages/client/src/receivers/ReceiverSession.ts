/**
 * @fileoverview Connection lifecycle shared by the audio and emotion receivers.
 *
 * Handles:
 * - Resolving the target URL (override or configured default)
 * - Owning exactly one transport at a time
 * - Mapping transport callbacks onto a connected/disconnected flag
 * - Notifying connection-state listeners
 *
 * There is no reconnection. Any error or closure leaves the receiver
 * disconnected until `startConnection` is called again.
 */

import { NORMAL_CLOSURE, type ReceiverKind, STOP_REASONS } from '@avatar-link/protocol';
import type { Transport, TransportFactory, Unsubscribe } from '../transport/Transport.js';
import { createWsTransport } from '../transport/WsTransport.js';
import type { Logger } from '../utils/logger.js';
import { Signal } from '../utils/Signal.js';

/**
 * Options accepted by every receiver.
 */
export interface ReceiverOptions {
  /** Default URL used when `startConnection` gets no override */
  url?: string;
  /** Opens transports; defaults to the `ws` transport */
  transportFactory?: TransportFactory;
  /** Give up on a pending connect after this long. 0 waits forever. */
  connectTimeoutMs?: number;
  logger?: Logger;
}

export interface ReceiverIdentity {
  kind: ReceiverKind;
  defaultUrl: string;
  logger: Logger;
}

export abstract class ReceiverSession {
  /** Default URL; may be changed before connecting. */
  url: string;

  /** Fires `true` on connect and `false` when the connection is lost or stopped. */
  readonly onConnectionStateChanged: Signal<boolean>;

  protected readonly logger: Logger;

  private readonly kind: ReceiverKind;
  private readonly transportFactory: TransportFactory;
  private readonly connectTimeoutMs: number;

  private transport: Transport | null = null;
  private subscriptions: Unsubscribe[] = [];
  private connected = false;
  private lastNotifiedState: boolean | null = null;
  private connectTimer: ReturnType<typeof setTimeout> | null = null;
  private disposed = false;

  protected constructor(identity: ReceiverIdentity, options: ReceiverOptions) {
    this.kind = identity.kind;
    this.logger = identity.logger;
    this.url = options.url ?? identity.defaultUrl;
    this.transportFactory = options.transportFactory ?? createWsTransport;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 0;
    this.onConnectionStateChanged = new Signal<boolean>('connectionStateChanged', this.logger);
  }

  /**
   * Subscribe to the payload callback of a freshly opened transport.
   */
  protected abstract subscribeToMessages(transport: Transport): Unsubscribe;

  // ============ Connection Management ============

  /**
   * Open a new connection, replacing any existing one.
   * @param overrideUrl - used instead of `url` when non-empty
   */
  startConnection(overrideUrl = ''): void {
    if (this.disposed) {
      this.logger.warn('Cannot start a disposed receiver');
      return;
    }

    const targetUrl = overrideUrl !== '' ? overrideUrl : this.url;
    if (targetUrl === '') {
      this.logger.warn('A websocket URL is required');
      return;
    }

    this.stopConnection();
    // A state listener may have opened its own transport during the stop.
    while (this.transport) {
      this.stopConnection();
    }

    const transport = this.transportFactory(targetUrl);
    this.transport = transport;
    this.subscriptions = [
      transport.onConnected(() => this.handleConnected()),
      transport.onConnectionError((message) => this.handleConnectionError(message)),
      transport.onClosed((code, reason, wasClean) => this.handleClosed(code, reason, wasClean)),
      this.subscribeToMessages(transport),
    ];

    this.logger.info('Connecting', { url: targetUrl });
    this.armConnectTimeout();
    transport.connect();
  }

  /**
   * Close the active connection, if any. Safe to call repeatedly.
   */
  stopConnection(): void {
    const transport = this.transport;
    if (transport) {
      this.unsubscribeAll();
      if (transport.isConnected()) {
        transport.close(NORMAL_CLOSURE, STOP_REASONS[this.kind]);
      }
      this.logger.info('Connection stopped', { url: transport.url });
    }

    const wasConnected = this.connected;
    this.releaseTransport();
    if (wasConnected) {
      this.notifyConnectionState(false);
    }
  }

  /**
   * Cached connection flag. Only transport callbacks and stop change it.
   */
  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Stop the connection and drop every listener. The receiver cannot be
   * started again afterwards.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.stopConnection();
    this.onConnectionStateChanged.clear();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ============ Transport Callbacks ============

  private handleConnected(): void {
    this.clearConnectTimeout();
    this.connected = true;
    this.logger.info('Connected', { url: this.transport?.url });
    this.notifyConnectionState(true);
  }

  private handleConnectionError(message: string): void {
    this.logger.error('Connection error', { url: this.transport?.url, error: message });
    this.handleDisconnected();
  }

  private handleClosed(code: number, reason: string, wasClean: boolean): void {
    this.logger.info('Connection closed', { url: this.transport?.url, code, reason, wasClean });
    this.handleDisconnected();
  }

  private handleConnectTimeout(): void {
    this.connectTimer = null;
    this.logger.warn('Connection attempt timed out', {
      url: this.transport?.url,
      timeoutMs: this.connectTimeoutMs,
    });
    this.handleDisconnected();
  }

  /**
   * Terminal effect of any failure: the transport is released before
   * listeners run, so a listener may start a new connection.
   */
  private handleDisconnected(): void {
    this.unsubscribeAll();
    this.releaseTransport();
    this.notifyConnectionState(false);
  }

  // ============ Private Methods ============

  /**
   * Emit only when the value differs from the last emission, so back-to-back
   * failed attempts produce a single `false`.
   */
  private notifyConnectionState(state: boolean): void {
    if (this.lastNotifiedState === state) {
      return;
    }
    this.lastNotifiedState = state;
    this.onConnectionStateChanged.dispatch(state);
  }

  private armConnectTimeout(): void {
    if (this.connectTimeoutMs > 0) {
      this.connectTimer = setTimeout(() => this.handleConnectTimeout(), this.connectTimeoutMs);
    }
  }

  private clearConnectTimeout(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private unsubscribeAll(): void {
    const subscriptions = this.subscriptions;
    this.subscriptions = [];
    for (const unsubscribe of subscriptions) {
      unsubscribe();
    }
  }

  private releaseTransport(): void {
    this.clearConnectTimeout();
    const transport = this.transport;
    this.transport = null;
    this.connected = false;
    transport?.release();
  }
}

/**
 * @fileoverview Receiver for the binary audio stream.
 */

import { DEFAULT_AUDIO_URL } from '@avatar-link/protocol';
import type { Transport, Unsubscribe } from '../transport/Transport.js';
import { createLogger } from '../utils/logger.js';
import { Signal } from '../utils/Signal.js';
import { type ReceiverOptions, ReceiverSession } from './ReceiverSession.js';

/**
 * Forwards every binary frame to listeners as an owned copy.
 *
 * Each transport callback is delivered as one chunk. `bytesRemaining` is
 * not used to stitch fragments together, so a transport that splits one
 * message across callbacks produces one chunk per fragment.
 */
export class AudioReceiver extends ReceiverSession {
  /** Fires once per non-empty binary frame. */
  readonly onChunkReceived: Signal<Uint8Array>;

  constructor(options: ReceiverOptions = {}) {
    const logger = options.logger ?? createLogger('AudioReceiver');
    super({ kind: 'audio', defaultUrl: DEFAULT_AUDIO_URL, logger }, options);
    this.onChunkReceived = new Signal<Uint8Array>('chunkReceived', logger);
  }

  override dispose(): void {
    super.dispose();
    this.onChunkReceived.clear();
  }

  protected subscribeToMessages(transport: Transport): Unsubscribe {
    return transport.onBinaryMessage((data, size) => this.handleBinaryMessage(data, size));
  }

  private handleBinaryMessage(data: Uint8Array | null, size: number): void {
    if (!data || size <= 0) {
      return;
    }

    // The transport may reuse its buffer once this callback returns.
    const chunk = new Uint8Array(data.subarray(0, size));
    this.onChunkReceived.dispatch(chunk);
  }
}

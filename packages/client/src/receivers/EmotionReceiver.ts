/**
 * @fileoverview Receiver for the JSON emotion stream.
 */

import { DEFAULT_EMOTION_URL, decodeEmotionMessage, type EmotionMapping } from '@avatar-link/protocol';
import type { Transport, Unsubscribe } from '../transport/Transport.js';
import { createLogger } from '../utils/logger.js';
import { Signal } from '../utils/Signal.js';
import { type ReceiverOptions, ReceiverSession } from './ReceiverSession.js';

/**
 * Decodes each text frame into named emotion values and forwards them.
 * Frames that do not yield at least one value are logged and dropped;
 * the connection stays open.
 */
export class EmotionReceiver extends ReceiverSession {
  /** Fires once per text frame that decodes to at least one value. */
  readonly onEmotionUpdate: Signal<EmotionMapping>;

  constructor(options: ReceiverOptions = {}) {
    const logger = options.logger ?? createLogger('EmotionReceiver');
    super({ kind: 'emotion', defaultUrl: DEFAULT_EMOTION_URL, logger }, options);
    this.onEmotionUpdate = new Signal<EmotionMapping>('emotionUpdate', logger);
  }

  override dispose(): void {
    super.dispose();
    this.onEmotionUpdate.clear();
  }

  protected subscribeToMessages(transport: Transport): Unsubscribe {
    return transport.onTextMessage((text) => this.handleMessage(text));
  }

  private handleMessage(text: string): void {
    const result = decodeEmotionMessage(text);
    if (!result.ok) {
      this.logger.warn('Received invalid emotion message', { reason: result.reason, message: text });
      return;
    }

    this.onEmotionUpdate.dispatch(result.values);
  }
}

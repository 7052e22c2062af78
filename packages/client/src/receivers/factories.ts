/**
 * @fileoverview Convenience constructors for host applications.
 */

import { DEFAULT_AUDIO_URL, DEFAULT_EMOTION_URL } from '@avatar-link/protocol';
import type { ReceiverConfig } from '../config/receiverConfig.js';
import type { TransportFactory } from '../transport/Transport.js';
import { setLogLevel } from '../utils/logger.js';
import { AudioReceiver } from './AudioReceiver.js';
import { EmotionReceiver } from './EmotionReceiver.js';
import type { ReceiverOptions } from './ReceiverSession.js';

export function createAudioReceiver(options: ReceiverOptions = {}): AudioReceiver {
  return new AudioReceiver(options);
}

export function createEmotionReceiver(options: ReceiverOptions = {}): EmotionReceiver {
  return new EmotionReceiver(options);
}

/**
 * Create an audio receiver and start connecting to `url`.
 */
export function connectAudio(
  url: string = DEFAULT_AUDIO_URL,
  options: ReceiverOptions = {}
): AudioReceiver {
  const receiver = createAudioReceiver(options);
  receiver.startConnection(url);
  return receiver;
}

/**
 * Create an emotion receiver and start connecting to `url`.
 */
export function connectEmotion(
  url: string = DEFAULT_EMOTION_URL,
  options: ReceiverOptions = {}
): EmotionReceiver {
  const receiver = createEmotionReceiver(options);
  receiver.startConnection(url);
  return receiver;
}

export interface ReceiverPair {
  audio: AudioReceiver;
  emotion: EmotionReceiver;
}

/**
 * Build both receivers from a loaded configuration and apply its log level.
 * Neither receiver is started.
 */
export function createReceiversFromConfig(
  config: ReceiverConfig,
  transportFactory?: TransportFactory
): ReceiverPair {
  setLogLevel(config.logLevel);

  const shared: ReceiverOptions = { connectTimeoutMs: config.connectTimeoutMs };
  if (transportFactory) {
    shared.transportFactory = transportFactory;
  }

  return {
    audio: createAudioReceiver({ ...shared, url: config.audio.url }),
    emotion: createEmotionReceiver({ ...shared, url: config.emotion.url }),
  };
}

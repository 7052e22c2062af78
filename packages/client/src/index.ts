/**
 * @fileoverview Client runtime for the audio and emotion streams.
 *
 * This package provides the receivers a host application embeds to
 * consume the avatar server's streams:
 * - Connection lifecycle (start, stop, connected flag)
 * - Binary audio chunk forwarding
 * - Emotion message decoding
 * - Multicast listener registration
 */

// Re-export protocol types for convenience
export type { EmotionMapping } from '@avatar-link/protocol';
export { DEFAULT_AUDIO_URL, DEFAULT_EMOTION_URL } from '@avatar-link/protocol';

// Receivers
export { AudioReceiver } from './receivers/AudioReceiver.js';
export { EmotionReceiver } from './receivers/EmotionReceiver.js';
export {
  type ReceiverIdentity,
  type ReceiverOptions,
  ReceiverSession,
} from './receivers/ReceiverSession.js';
export {
  connectAudio,
  connectEmotion,
  createAudioReceiver,
  createEmotionReceiver,
  createReceiversFromConfig,
  type ReceiverPair,
} from './receivers/factories.js';

// Transport
export {
  BaseTransport,
  type BinaryMessageListener,
  type ClosedListener,
  type ConnectedListener,
  type ConnectionErrorListener,
  type TextMessageListener,
  type Transport,
  type TransportFactory,
  type Unsubscribe,
} from './transport/Transport.js';
export { createWsTransport, WsTransport } from './transport/WsTransport.js';

// Configuration
export {
  clearConfigCache,
  InvalidConfigError,
  loadReceiverConfig,
  type ReceiverConfig,
} from './config/receiverConfig.js';

// Utilities
export { type Listener, type ListenerToken, Signal } from './utils/Signal.js';
export {
  createLogger,
  getLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  setLogLevel,
} from './utils/logger.js';

/**
 * Client runtime version.
 */
export const CLIENT_VERSION = '1.0.0';

/**
 * @fileoverview Stream protocol definitions.
 *
 * This package defines the wire contract shared by the audio and emotion
 * receivers: default endpoints, closure codes and the emotion message
 * format. It has no knowledge of the transport.
 */

export {
  ABNORMAL_CLOSURE,
  DEFAULT_AUDIO_URL,
  DEFAULT_EMOTION_URL,
  NORMAL_CLOSURE,
  type ReceiverKind,
  STOP_REASONS,
} from './constants.js';

export { isJsonObject, type JsonObject, type JsonValue } from './json.js';

export {
  decodeEmotionMessage,
  type EmotionDecodeFailure,
  type EmotionDecodeResult,
  type EmotionMapping,
  EmotionValueSchema,
  isNumericLiteral,
  NumericStringSchema,
} from './emotion.js';

/**
 * Stream protocol version.
 */
export const PROTOCOL_VERSION = '1.0.0';

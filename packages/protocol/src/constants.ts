/**
 * @fileoverview Shared constants for the audio and emotion streams.
 */

/** Default endpoint for the binary audio stream. */
export const DEFAULT_AUDIO_URL = 'ws://localhost:5000/ws/audio';

/** Default endpoint for the JSON emotion stream. */
export const DEFAULT_EMOTION_URL = 'ws://localhost:5000/ws/emotion';

/** WebSocket closure code for a normal, requested close. */
export const NORMAL_CLOSURE = 1000;

/** WebSocket closure code reported when no close frame was received. */
export const ABNORMAL_CLOSURE = 1006;

/** Close reasons sent by each receiver on stop. */
export const STOP_REASONS = {
  audio: 'AudioReceiver Stop',
  emotion: 'EmotionReceiver Stop',
} as const;

export type ReceiverKind = keyof typeof STOP_REASONS;

import { createMockTransportFactory, type MockTransportFactory } from '@avatar-link/testing';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AudioReceiver,
  EmotionReceiver,
  type ReceiverOptions,
  type ReceiverSession,
} from '../src/index.js';
import { createMockLogger, type MockLogger } from './helpers.js';

const variants = [
  {
    name: 'AudioReceiver',
    create: (options: ReceiverOptions): ReceiverSession => new AudioReceiver(options),
    defaultUrl: 'ws://localhost:5000/ws/audio',
    stopReason: 'AudioReceiver Stop',
  },
  {
    name: 'EmotionReceiver',
    create: (options: ReceiverOptions): ReceiverSession => new EmotionReceiver(options),
    defaultUrl: 'ws://localhost:5000/ws/emotion',
    stopReason: 'EmotionReceiver Stop',
  },
];

describe.each(variants)('$name session lifecycle', ({ create, defaultUrl, stopReason }) => {
  let transports: MockTransportFactory;
  let logger: MockLogger;
  let states: boolean[];

  function createReceiver(options: ReceiverOptions = {}): ReceiverSession {
    const receiver = create({ transportFactory: transports.factory, logger, ...options });
    receiver.onConnectionStateChanged.add((state) => states.push(state));
    return receiver;
  }

  beforeEach(() => {
    transports = createMockTransportFactory();
    logger = createMockLogger();
    states = [];
  });

  describe('startConnection', () => {
    it('should start disconnected with no transport', () => {
      const receiver = createReceiver();

      expect(receiver.isConnected()).toBe(false);
      expect(receiver.url).toBe(defaultUrl);
      expect(transports.transports).toHaveLength(0);
    });

    it('should open a transport to the default URL and connect it', () => {
      const receiver = createReceiver();

      receiver.startConnection();

      const transport = transports.last();
      expect(transport.url).toBe(defaultUrl);
      expect(transport.connectCalls).toBe(1);
      expect(transport.listenerCount()).toBe(4);
      expect(receiver.isConnected()).toBe(false);
    });

    it('should prefer a non-empty override URL', () => {
      const receiver = createReceiver();

      receiver.startConnection('ws://avatar.test:7000/stream');

      expect(transports.last().url).toBe('ws://avatar.test:7000/stream');
    });

    it('should use a URL set after construction', () => {
      const receiver = createReceiver();
      receiver.url = 'ws://avatar.test/configured';

      receiver.startConnection('');

      expect(transports.last().url).toBe('ws://avatar.test/configured');
    });

    it('should refuse to start without any URL', () => {
      const receiver = createReceiver({ url: '' });

      receiver.startConnection('');

      expect(transports.transports).toHaveLength(0);
      expect(receiver.isConnected()).toBe(false);
      expect(states).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith('A websocket URL is required');
    });

    it('should leave an existing connection alone when no URL resolves', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      transports.last().simulateConnected();
      receiver.url = '';

      receiver.startConnection();

      expect(transports.transports).toHaveLength(1);
      expect(receiver.isConnected()).toBe(true);
      expect(transports.last().released).toBe(false);
    });

    it('should tear down the previous transport before opening a new one', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      const first = transports.last();
      first.simulateConnected();

      receiver.startConnection('ws://avatar.test/second');
      const second = transports.last();

      expect(transports.transports).toHaveLength(2);
      expect(first.closeCalls).toEqual([{ code: 1000, reason: stopReason }]);
      expect(first.released).toBe(true);
      expect(first.listenerCount()).toBe(0);
      expect(second.url).toBe('ws://avatar.test/second');
      expect(second.released).toBe(false);
      expect(receiver.isConnected()).toBe(false);
    });

    it('should ignore callbacks from a replaced transport', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      const first = transports.last();

      receiver.startConnection();
      first.simulateConnected();
      first.simulateClosed(1000, 'late', true);

      expect(states).toEqual([]);
      expect(receiver.isConnected()).toBe(false);
    });
  });

  describe('transport callbacks', () => {
    it('should report connected', () => {
      const receiver = createReceiver();
      receiver.startConnection();

      transports.last().simulateConnected();

      expect(receiver.isConnected()).toBe(true);
      expect(states).toEqual([true]);
    });

    it('should report disconnected and release the transport on error', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      const transport = transports.last();
      transport.simulateConnected();

      transport.simulateError('Connection reset');

      expect(receiver.isConnected()).toBe(false);
      expect(states).toEqual([true, false]);
      expect(transport.released).toBe(true);
      expect(transport.listenerCount()).toBe(0);
      expect(logger.error).toHaveBeenCalledWith('Connection error', {
        url: defaultUrl,
        error: 'Connection reset',
      });
    });

    it('should treat clean and unclean closes the same way', () => {
      const receiver = createReceiver();

      receiver.startConnection();
      transports.last().simulateConnected();
      transports.last().simulateClosed(1000, 'server shutdown', true);

      receiver.startConnection();
      transports.last().simulateConnected();
      transports.last().simulateClosed(1006, '', false);

      expect(states).toEqual([true, false, true, false]);
      expect(receiver.isConnected()).toBe(false);
      expect(transports.transports.every((transport) => transport.released)).toBe(true);
    });

    it('should report a single disconnect when error is followed by close', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      const transport = transports.last();
      transport.simulateConnected();

      transport.simulateError('boom');
      transport.simulateClosed();

      expect(states).toEqual([true, false]);
    });

    it('should report a failed connect attempt', () => {
      const receiver = createReceiver();
      receiver.startConnection();

      transports.last().simulateError('Connection refused');

      expect(states).toEqual([false]);
      expect(receiver.isConnected()).toBe(false);
    });

    it('should not repeat a disconnected notification for back-to-back failures', () => {
      const receiver = createReceiver();

      receiver.startConnection();
      transports.last().simulateError('Connection refused');
      receiver.startConnection();
      transports.last().simulateError('Connection refused');

      expect(states).toEqual([false]);
      expect(logger.error).toHaveBeenCalledTimes(2);
    });

    it('should let a listener start a new connection from the disconnect notification', () => {
      const receiver = createReceiver();
      let restarted = false;
      receiver.onConnectionStateChanged.add((state) => {
        if (!state && !restarted) {
          restarted = true;
          receiver.startConnection();
        }
      });

      receiver.startConnection();
      transports.last().simulateError('dropped');

      const replacement = transports.last();
      expect(transports.transports).toHaveLength(2);
      expect(replacement.released).toBe(false);
      expect(replacement.listenerCount()).toBe(4);

      replacement.simulateConnected();
      expect(receiver.isConnected()).toBe(true);
      expect(states).toEqual([false, true]);
    });
  });

  describe('restart from a state listener', () => {
    it('should keep one live transport when a listener reconnects during a restart', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      transports.last().simulateConnected();
      let reconnected = false;
      receiver.onConnectionStateChanged.add((state) => {
        if (!state && !reconnected) {
          reconnected = true;
          receiver.startConnection('ws://avatar.test/auto');
        }
      });

      receiver.startConnection('ws://avatar.test/manual');

      const live = transports.transports.filter((transport) => !transport.released);
      expect(live.map((transport) => transport.url)).toEqual(['ws://avatar.test/manual']);
      const auto = transports.transports.find((transport) => transport.url === 'ws://avatar.test/auto');
      expect(auto?.listenerCount()).toBe(0);

      auto?.simulateConnected();
      expect(receiver.isConnected()).toBe(false);
      expect(states).toEqual([true, false]);
    });

    it('should leave nothing open when a listener reconnects during dispose', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      transports.last().simulateConnected();
      receiver.onConnectionStateChanged.add((state) => {
        if (!state) {
          receiver.startConnection();
        }
      });

      receiver.dispose();

      expect(transports.transports).toHaveLength(1);
      expect(transports.transports.every((transport) => transport.released)).toBe(true);
      expect(receiver.isConnected()).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Cannot start a disposed receiver');
    });
  });

  describe('stopConnection', () => {
    it('should close a connected transport with the normal closure code', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      const transport = transports.last();
      transport.simulateConnected();

      receiver.stopConnection();

      expect(transport.closeCalls).toEqual([{ code: 1000, reason: stopReason }]);
      expect(transport.released).toBe(true);
      expect(transport.listenerCount()).toBe(0);
      expect(receiver.isConnected()).toBe(false);
      expect(states).toEqual([true, false]);
    });

    it('should release a pending transport without closing it', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      const transport = transports.last();

      receiver.stopConnection();

      expect(transport.closeCalls).toEqual([]);
      expect(transport.released).toBe(true);
      expect(states).toEqual([]);
    });

    it('should be a no-op when already stopped', () => {
      const receiver = createReceiver();

      receiver.stopConnection();
      receiver.stopConnection();

      expect(receiver.isConnected()).toBe(false);
      expect(states).toEqual([]);
    });

    it('should alternate notifications across stop and restart', () => {
      const receiver = createReceiver();

      receiver.startConnection();
      transports.last().simulateConnected();
      receiver.stopConnection();
      receiver.startConnection();
      transports.last().simulateConnected();
      transports.last().simulateError('lost');

      expect(states).toEqual([true, false, true, false]);
    });
  });

  describe('dispose', () => {
    it('should stop the connection and drop listeners', () => {
      const receiver = createReceiver();
      receiver.startConnection();
      const transport = transports.last();
      transport.simulateConnected();

      receiver.dispose();

      expect(transport.closeCalls).toHaveLength(1);
      expect(states).toEqual([true, false]);
      expect(receiver.onConnectionStateChanged.size).toBe(0);
      expect(receiver.isDisposed).toBe(true);
    });

    it('should refuse to start afterwards', () => {
      const receiver = createReceiver();
      receiver.dispose();

      receiver.startConnection();

      expect(transports.transports).toHaveLength(0);
      expect(logger.warn).toHaveBeenCalledWith('Cannot start a disposed receiver');
    });
  });

  describe('listener registration', () => {
    it('should keep notifying other listeners when one unregisters during dispatch', () => {
      const receiver = createReceiver();
      const once: boolean[] = [];
      const token = receiver.onConnectionStateChanged.add((state) => {
        once.push(state);
        receiver.onConnectionStateChanged.remove(token);
      });

      receiver.startConnection();
      transports.last().simulateConnected();
      transports.last().simulateError('lost');

      expect(once).toEqual([true]);
      expect(states).toEqual([true, false]);
    });
  });

  describe('connect timeout', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should wait indefinitely by default', () => {
      const receiver = createReceiver();
      receiver.startConnection();

      vi.advanceTimersByTime(60_000);

      expect(states).toEqual([]);
      expect(transports.last().released).toBe(false);
      expect(receiver.isConnected()).toBe(false);
    });

    it('should give up on a connect that never completes', () => {
      const receiver = createReceiver({ connectTimeoutMs: 5000 });
      receiver.startConnection();
      const transport = transports.last();

      vi.advanceTimersByTime(4999);
      expect(states).toEqual([]);

      vi.advanceTimersByTime(1);
      expect(states).toEqual([false]);
      expect(transport.released).toBe(true);
      expect(transport.listenerCount()).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith('Connection attempt timed out', {
        url: defaultUrl,
        timeoutMs: 5000,
      });
    });

    it('should not fire once connected', () => {
      const receiver = createReceiver({ connectTimeoutMs: 5000 });
      receiver.startConnection();
      vi.advanceTimersByTime(1000);
      transports.last().simulateConnected();

      vi.advanceTimersByTime(10_000);

      expect(states).toEqual([true]);
      expect(receiver.isConnected()).toBe(true);
    });

    it('should not fire after stop', () => {
      const receiver = createReceiver({ connectTimeoutMs: 5000 });
      receiver.startConnection();
      receiver.stopConnection();

      vi.advanceTimersByTime(10_000);

      expect(states).toEqual([]);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should restart the timer for a new attempt', () => {
      const receiver = createReceiver({ connectTimeoutMs: 5000 });
      receiver.startConnection();
      vi.advanceTimersByTime(4000);
      receiver.startConnection();

      vi.advanceTimersByTime(4000);
      expect(states).toEqual([]);

      vi.advanceTimersByTime(1000);
      expect(states).toEqual([false]);
      expect(transports.last().released).toBe(true);
    });
  });
});

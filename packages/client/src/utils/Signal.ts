/**
 * @fileoverview Multicast event channel.
 *
 * One Signal per event. Listeners are kept in registration order and
 * addressed by the token returned from `add`. Dispatch walks a snapshot
 * of the registrations, so listeners may add or remove registrations
 * (their own or others') while a dispatch is running.
 */

import { createLogger, type Logger } from './logger.js';

export type Listener<T> = (value: T) => void;

/**
 * Opaque handle identifying one registration on one Signal.
 */
export type ListenerToken = symbol;

export class Signal<T> {
  private readonly listeners = new Map<ListenerToken, Listener<T>>();

  constructor(
    private readonly name: string,
    private readonly logger: Logger = createLogger('Signal')
  ) {}

  /**
   * Register a listener.
   * @returns token to pass to `remove`
   */
  add(listener: Listener<T>): ListenerToken {
    const token: ListenerToken = Symbol(this.name);
    this.listeners.set(token, listener);
    return token;
  }

  /**
   * Unregister a listener.
   * @returns false if the token was not registered
   */
  remove(token: ListenerToken): boolean {
    return this.listeners.delete(token);
  }

  clear(): void {
    this.listeners.clear();
  }

  get size(): number {
    return this.listeners.size;
  }

  /**
   * Notify every registered listener.
   *
   * Listeners added during dispatch are first called on the next dispatch.
   * Listeners removed during dispatch are not called if they have not run yet.
   */
  dispatch(value: T): void {
    const snapshot = [...this.listeners];
    for (const [token, listener] of snapshot) {
      if (this.listeners.get(token) !== listener) {
        continue;
      }
      try {
        listener(value);
      } catch (error) {
        this.logger.error('Listener threw during dispatch', {
          signal: this.name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

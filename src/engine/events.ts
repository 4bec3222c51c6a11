/**
 * Typed Event Emitter for the descriptor store.
 *
 * Wraps Node's EventEmitter so that event names and payloads are checked
 * at compile time.
 *
 * @module engine/events
 */

import { EventEmitter } from 'events';

// =============================================================================
// Event Payloads
// =============================================================================

/**
 * Events emitted by a DescriptorStore
 */
export interface StoreEvents {
  /** A descriptor file was written by this store */
  descriptorCreated: {
    name: string;
    path: string;
    infoHashHex: string;
  };

  /** A descriptor file was removed */
  descriptorDeleted: {
    name: string;
    path: string;
  };

  /** The admission whitelist was rewritten */
  whitelistUpdated: {
    whitelist: string[];
  };
}

/** Union of all store event names */
export type StoreEventName = keyof StoreEvents;

/** Event name constants */
export const EventNames = {
  DescriptorCreated: 'descriptorCreated',
  DescriptorDeleted: 'descriptorDeleted',
  WhitelistUpdated: 'whitelistUpdated',
} as const satisfies Record<string, StoreEventName>;

// =============================================================================
// TypedEventEmitter
// =============================================================================

type Listener<P> = P extends void ? () => void : (payload: P) => void;

/**
 * Type-safe event emitter.
 *
 * @example
 * ```typescript
 * const emitter = new TypedEventEmitter<StoreEvents>();
 * emitter.on('descriptorDeleted', ({ name }) => console.log(`removed ${name}`));
 * emitter.emit('descriptorDeleted', { name: 'a.torrent', path: '/data/a.torrent' });
 * ```
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown }> {
  private emitter = new EventEmitter();

  /**
   * Subscribe to an event
   */
  on<K extends keyof T & string>(event: K, listener: Listener<T[K]>): this {
    this.emitter.on(event, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Subscribe to the next emission of an event only
   */
  once<K extends keyof T & string>(event: K, listener: Listener<T[K]>): this {
    this.emitter.once(event, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof T & string>(event: K, listener: Listener<T[K]>): this {
    this.emitter.off(event, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Emit an event with its payload
   *
   * @returns true if the event had listeners
   */
  emit<K extends keyof T & string>(
    event: K,
    ...args: T[K] extends void ? [] : [payload: T[K]]
  ): boolean {
    return this.emitter.emit(event, ...args);
  }

  /**
   * Number of listeners registered for an event
   */
  listenerCount<K extends keyof T & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  /**
   * Remove all listeners for one event, or for every event
   */
  removeAllListeners<K extends keyof T & string>(event?: K): this {
    if (event !== undefined) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }
}

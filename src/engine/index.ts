/**
 * seedfile engine.
 *
 * Exports the descriptor store, admission gate, metainfo codec and the
 * supporting configuration, event and error types.
 *
 * @module engine
 */

export * from './types.js';

export {
  TypedEventEmitter,
  EventNames,
  type StoreEvents,
  type StoreEventName,
} from './events.js';

export * from './bencode.js';
export * from './config/index.js';
export * from './torrent/index.js';
export * from './store/index.js';

/**
 * @module layered-app-kit/infrastructure/storage
 */

export { MemoryKeyValueStore } from './KeyValueStore';
export type { IKeyValueStore, MemoryKeyValueStoreOptions } from './KeyValueStore';

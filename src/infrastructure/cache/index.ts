/**
 * Caching utilities
 */

export { CacheManager } from './CacheManager';

export type { CacheStats } from './CacheManager';

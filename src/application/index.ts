/**
 * @module layered-app-kit/application
 * @description Application layer exports
 */

// ============================================================================
// Logging
// ============================================================================

export * from './logging';

// ============================================================================
// Dependency Injection
// ============================================================================

export * from './di';

// ============================================================================
// Host & Modules
// ============================================================================

export * from './host';

// ============================================================================
// Re-exports for Common Use Cases
// ============================================================================

/**
 * Dependency Injection exports
 *
 * @example
 * ```typescript
 * import { Injectable, Inject, ServiceCollection, ServiceLifetime } from 'layered-app-kit';
 *
 * @Injectable({ lifetime: ServiceLifetime.Factory })
 * class ArticleController {
 *   constructor(@Inject(ARTICLE_REPOSITORY) private readonly repository: ArticleRepository) {}
 * }
 *
 * const provider = new ServiceCollection()
 *   .addInstance(ARTICLE_REPOSITORY, repository)
 *   .addClass(ArticleController, ArticleController)
 *   .buildServiceProvider();
 * ```
 */
export type { IServiceCollection, IServiceProvider, IServiceScope } from './di';

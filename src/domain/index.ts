/**
 * @module layered-app-kit/domain
 * @description Domain layer exports
 */

// ============================================================================
// Entities
// ============================================================================

export * from './entity';

// ============================================================================
// Failures & Results
// ============================================================================

export * from './failures';
export * from './result';

// ============================================================================
// Repository Contracts & Use Cases
// ============================================================================

export * from './repository';
export * from './usecase';

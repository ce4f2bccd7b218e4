/**
 * @fileoverview layered-app-kit
 * @description
 * Building blocks for layered client applications and the tooling that
 * keeps them layered.
 *
 * ## Architecture Layers
 *
 * ```
 *   ┌──────────────────────────────┐
 *   │        PRESENTATION          │  controllers, observables, view state
 *   └──────────────┬───────────────┘
 *                  ▼
 *   ┌──────────────────────────────┐
 *   │           DOMAIN             │  entities, failures, results,
 *   │                              │  repository contracts, use cases
 *   └──────────────▲───────────────┘
 *                  │ implements
 *   ┌──────────────┴───────────────┐
 *   │     DATA (infrastructure)    │  models, data sources, HTTP,
 *   │                              │  storage, fetch policies
 *   └──────────────────────────────┘
 *
 *   APPLICATION: service locator, host, logging (wires the layers)
 *   TOOLING:     architecture checker, feature scaffolding
 * ```
 *
 * @packageDocumentation
 * @module layered-app-kit
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS (Wiring, Host, Logging)
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS (Data)
// ============================================================================

export * from './infrastructure';

// ============================================================================
// PRESENTATION LAYER EXPORTS
// ============================================================================

export * from './presentation';

// ============================================================================
// TOOLING EXPORTS
// ============================================================================

export * from './tooling';

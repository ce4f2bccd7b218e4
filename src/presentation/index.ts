/**
 * @fileoverview Presentation Layer Exports
 * @description
 * Screen-side building blocks: observables, view state and controllers.
 * Presentation code depends on the domain layer only.
 *
 * @packageDocumentation
 * @module layered-app-kit/presentation
 */

export * from './state';
export * from './controller';

/**
 * @fileoverview Convention tooling exports
 * @description
 * Checks an application tree against the directory contract and the layer
 * dependency rules, and scaffolds new features that pass those checks.
 *
 * @packageDocumentation
 * @module layered-app-kit/tooling
 */

export * from './config';
export * from './architecture';
export * from './scaffold';

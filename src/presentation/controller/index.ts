/**
 * @module layered-app-kit/presentation/controller
 */

export { Controller } from './Controller';
export type { ControllerStatus } from './Controller';

/**
 * @module layered-app-kit/application/host
 * @description Application lifecycle and module composition
 */

export { AppHost, createHost, defineModule, LOGGER } from './AppHost';

export type { IAppModule, AppHostOptions, HostStatus } from './AppHost';

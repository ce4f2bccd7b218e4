/**
 * @module layered-app-kit/domain/usecase
 */

export { NO_PARAMS } from './IUseCase';
export type { IUseCase, NoParams } from './IUseCase';

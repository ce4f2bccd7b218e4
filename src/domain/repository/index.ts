/**
 * @module layered-app-kit/domain/repository
 * @description Domain-declared repository contracts
 */

export type { IReadRepository, IRepository } from './IRepository';

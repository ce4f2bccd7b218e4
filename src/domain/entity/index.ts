/**
 * @module layered-app-kit/domain/entity
 * @description Immutable entities and structural equality
 */

export {
  defineEntity,
  deepFreeze,
  EntityValidationError,
} from './Entity';

export type { EntityDefinition, EntityValidator } from './Entity';

export { valueEquals } from './valueEquals';

/**
 * @fileoverview Domain entities
 *
 * @module layered-app-kit/domain/entity
 *
 * ## Architectural Layer: DOMAIN
 *
 * An entity is an immutable value that represents a core business concept.
 *
 * - ✅ **IS**: compared by structural value equality
 * - ✅ **IS**: frozen once created
 * - ❌ **IS NOT**: responsible for serialization (that is a data-layer Model)
 * - ❌ **IS NOT**: a subclass of anything; equality comes from its definition
 *
 * @example
 * ```typescript
 * interface Article {
 *   readonly id: string;
 *   readonly title: string;
 *   readonly tags: readonly string[];
 * }
 *
 * const Article = defineEntity<Article>('Article', (props) =>
 *   props.title.trim() === '' ? ['title must not be empty'] : [],
 * );
 *
 * const a = Article.create({ id: '1', title: 'Hello', tags: [] });
 * const b = Article.copyWith(a, { title: 'Hello again' });
 * Article.equals(a, b); // false
 * ```
 */

import { valueEquals } from './valueEquals';

/**
 * Returns the list of problems with the given props; empty means valid.
 */
export type EntityValidator<T> = (props: T) => readonly string[];

/**
 * Thrown when entity props fail their definition's validator.
 */
export class EntityValidationError extends Error {
  constructor(
    public readonly entityName: string,
    public readonly problems: readonly string[],
  ) {
    super(`Invalid ${entityName}: ${problems.join('; ')}`);
    this.name = 'EntityValidationError';
    Object.setPrototypeOf(this, EntityValidationError.prototype);
  }
}

/**
 * Everything the domain needs to create and compare one kind of entity.
 */
export interface EntityDefinition<T extends object> {
  readonly name: string;

  /**
   * Validate and freeze a copy of `props`.
   *
   * @throws EntityValidationError when the validator reports problems
   */
  create(props: T): T;

  /** Structural equality over every field. */
  equals(left: T, right: T): boolean;

  /** A new entity with `patch` applied; the original is untouched. */
  copyWith(entity: T, patch: Partial<T>): T;

  /** Type guard: a frozen value created by this definition. */
  isEntity(value: unknown): value is T;
}

/**
 * Recursively freeze a value in place.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }

  return Object.freeze(value);
}

/**
 * Define an entity type.
 */
export function defineEntity<T extends object>(
  name: string,
  validate?: EntityValidator<T>,
): EntityDefinition<T> {
  const created = new WeakSet<object>();

  const definition: EntityDefinition<T> = {
    name,

    create(props: T): T {
      const problems = validate ? validate(props) : [];
      if (problems.length > 0) {
        throw new EntityValidationError(name, problems);
      }

      const entity = deepFreeze(structuredClone(props));
      created.add(entity);
      return entity;
    },

    equals(left: T, right: T): boolean {
      return valueEquals(left, right);
    },

    copyWith(entity: T, patch: Partial<T>): T {
      return definition.create({ ...entity, ...patch });
    },

    isEntity(value: unknown): value is T {
      return typeof value === 'object' && value !== null && created.has(value);
    },
  };

  return definition;
}

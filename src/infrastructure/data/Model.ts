/**
 * @fileoverview Models: entities that know their wire format
 *
 * ## Architectural Layer: DATA
 *
 * A model is the shape a value has when it crosses a network or storage
 * boundary. It is decoded from JSON with a zod schema, frozen, and mapped to
 * a domain entity before it leaves the data layer.
 *
 * Models are JSON values, so `parse(stringify(model))` gives back an equal
 * model. `decode` and `fromEntity` reject what JSON cannot carry (non-finite
 * numbers, bigints, dates, class instances) and drop `undefined` properties;
 * `stringify` refuses such values instead of writing them lossily.
 *
 * @example
 * ```typescript
 * const articleModelSchema = z.object({
 *   id: z.string(),
 *   title: z.string(),
 *   published_at: z.string(),
 * });
 * type ArticleModel = z.infer<typeof articleModelSchema>;
 *
 * export const ArticleModels = defineModel<ArticleModel, Article>({
 *   name: 'ArticleModel',
 *   schema: articleModelSchema,
 *   toEntity: (m) => Articles.create({ id: m.id, title: m.title, publishedAt: m.published_at }),
 *   fromEntity: (a) => ({ id: a.id, title: a.title, published_at: a.publishedAt }),
 * });
 * ```
 */

import * as z from 'zod';

import { deepFreeze } from '../../domain/entity';
import { errorMessage } from './FailureMapper';
import { FormatException, FormatIssues } from './exceptions';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface ModelDefinition<TModel, TEntity> {
  readonly name: string;
  readonly schema: z.ZodType<TModel, z.ZodTypeDef, unknown>;
  toEntity(model: TModel): TEntity;
  fromEntity(entity: TEntity): TModel;
}

export interface ModelCodec<TModel, TEntity> {
  readonly name: string;

  /**
   * Validate a parsed JSON value.
   *
   * @throws FormatException listing every schema issue by path
   */
  decode(json: unknown): TModel;

  /** Decode an array of models; issue paths start with the element index. */
  decodeList(json: unknown): TModel[];

  encode(model: TModel): JsonValue;

  /** @throws FormatException for malformed text or a schema mismatch */
  parse(text: string): TModel;

  stringify(model: TModel): string;

  toEntity(model: TModel): TEntity;

  fromEntity(entity: TEntity): TModel;
}

/**
 * Group zod issues by dotted path; the root is reported as `(root)`.
 */
export function zodIssues(error: z.ZodError): FormatIssues {
  const issues: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || '(root)';
    (issues[path] ??= []).push(issue.message);
  }
  return issues;
}

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Collect the values JSON cannot carry. With `strip`, unfrozen containers
 * lose their `undefined` properties and `-0` becomes `0`, as JSON writes them.
 */
function collectJsonIssues(
  value: unknown,
  path: readonly (string | number)[],
  issues: Record<string, string[]>,
  strip: boolean,
): void {
  const report = (message: string): void => {
    (issues[path.join('.') || '(root)'] ??= []).push(message);
  };

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return;
    case 'number':
      if (!Number.isFinite(value)) report(`${value} is not a JSON number`);
      return;
    case 'object':
      break;
    default:
      report(`${typeof value} is not a JSON value`);
      return;
  }

  if (value === null) return;

  if (Array.isArray(value)) {
    const writable = strip && !Object.isFrozen(value);
    for (let index = 0; index < value.length; index++) {
      if (writable && Object.is(value[index], -0)) value[index] = 0;
      collectJsonIssues(value[index], [...path, index], issues, strip);
    }
    return;
  }

  if (!isPlainObject(value)) {
    report(`${Object.prototype.toString.call(value).slice(8, -1)} is not a JSON value`);
    return;
  }

  const writable = strip && !Object.isFrozen(value);
  for (const [key, nested] of Object.entries(value)) {
    if (nested === undefined) {
      if (writable) Reflect.deleteProperty(value, key);
      continue;
    }
    if (writable && Object.is(nested, -0)) Reflect.set(value, key, 0);
    collectJsonIssues(nested, [...path, key], issues, strip);
  }
}

function jsonIssues(value: unknown, strip: boolean): FormatIssues | undefined {
  const issues: Record<string, string[]> = {};
  collectJsonIssues(value, [], issues, strip);
  return Object.keys(issues).length > 0 ? issues : undefined;
}

export function defineModel<TModel, TEntity>(
  definition: ModelDefinition<TModel, TEntity>,
): ModelCodec<TModel, TEntity> {
  const { name, schema } = definition;
  const listSchema = z.array(schema);

  const codec: ModelCodec<TModel, TEntity> = {
    name,

    decode(json: unknown): TModel {
      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new FormatException(`Invalid ${name} payload`, zodIssues(parsed.error));
      }
      const issues = jsonIssues(parsed.data, true);
      if (issues) {
        throw new FormatException(`Invalid ${name} payload`, issues);
      }
      return deepFreeze(parsed.data);
    },

    decodeList(json: unknown): TModel[] {
      const parsed = listSchema.safeParse(json);
      if (!parsed.success) {
        throw new FormatException(`Invalid ${name} list payload`, zodIssues(parsed.error));
      }
      const issues = jsonIssues(parsed.data, true);
      if (issues) {
        throw new FormatException(`Invalid ${name} list payload`, issues);
      }
      return deepFreeze(parsed.data);
    },

    encode(model: TModel): JsonValue {
      const encoded: JsonValue = JSON.parse(codec.stringify(model));
      return encoded;
    },

    parse(text: string): TModel {
      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch (error) {
        throw new FormatException(`Malformed ${name} JSON: ${errorMessage(error)}`, {}, {
          cause: error,
        });
      }
      return codec.decode(json);
    },

    /** @throws FormatException for values JSON would drop or change */
    stringify(model: TModel): string {
      const issues = jsonIssues(model, false);
      if (issues) {
        throw new FormatException(`${name} cannot be written as JSON`, issues);
      }
      return JSON.stringify(model);
    },

    toEntity(model: TModel): TEntity {
      return definition.toEntity(model);
    },

    fromEntity(entity: TEntity): TModel {
      const model = definition.fromEntity(entity);
      const issues = jsonIssues(model, true);
      if (issues) {
        throw new FormatException(`${name} cannot be written as JSON`, issues);
      }
      return deepFreeze(model);
    },
  };

  return codec;
}

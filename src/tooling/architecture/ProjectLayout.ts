/**
 * @fileoverview Where a path sits in the directory contract
 *
 * ```
 * <appRoot>/
 *   core/                         shared infrastructure, composition root
 *   features/<feature>/
 *     domain/{entities,repositories,usecases}/
 *     data/{models,datasources,repositories}/
 *     presentation/{controllers,pages,widgets,state}/
 * ```
 */

export const LAYERS = ['domain', 'data', 'presentation'] as const;

export type Layer = (typeof LAYERS)[number];

export function isLayer(value: string | undefined): value is Layer {
  return LAYERS.some((layer) => layer === value);
}

export type Location =
  | { readonly area: 'root' }
  | { readonly area: 'core' }
  | { readonly area: 'other'; readonly folder: string }
  | {
      readonly area: 'features';
      /** Undefined for the `features/` directory itself */
      readonly feature?: string;
      /** First directory under the feature */
      readonly child?: string;
      readonly layer?: Layer;
      /** Directories below the layer */
      readonly rest: readonly string[];
    };

/**
 * Locate a directory, or an import target, from its segments under the app
 * root. For a source file pass its directory segments.
 */
export function locate(segments: readonly string[]): Location {
  const [first, feature, child, ...rest] = segments;

  if (first === undefined) {
    return { area: 'root' };
  }
  if (first === 'core') {
    return { area: 'core' };
  }
  if (first === 'features') {
    return {
      area: 'features',
      feature,
      child,
      layer: isLayer(child) ? child : undefined,
      rest,
    };
  }
  return { area: 'other', folder: first };
}

/**
 * Split a project-relative POSIX path into segments under `appRoot`, or
 * `undefined` when it lies outside.
 */
export function segmentsUnder(appRoot: string, relativePath: string): string[] | undefined {
  const prefix = `${appRoot}/`;
  if (relativePath === appRoot) return [];
  if (!relativePath.startsWith(prefix)) return undefined;
  return relativePath.slice(prefix.length).split('/').filter((segment) => segment !== '');
}

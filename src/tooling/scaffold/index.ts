/**
 * @module layered-app-kit/tooling/scaffold
 */

export {
  scaffoldFeature,
  renderTemplate,
  deriveEntityName,
  toSnakeCase,
  toPascalCase,
  DEFAULT_TEMPLATES_DIR,
} from './Scaffolder';

export type { ScaffoldOptions, ScaffoldResult, TemplateVariables } from './Scaffolder';

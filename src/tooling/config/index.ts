/**
 * @module layered-app-kit/tooling/config
 */

export {
  loadConfig,
  resolveConfig,
  layerkitConfigSchema,
  ConfigurationError,
  CONFIG_FILE_NAME,
  RULE_IDS,
} from './LayerkitConfig';

export type {
  LayerkitConfig,
  LayerkitConfigInput,
  FileNaming,
  RuleId,
} from './LayerkitConfig';

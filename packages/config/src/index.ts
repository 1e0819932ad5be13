/**
 * @crateflow/config
 *
 * Configuration system for crateflow with YAML-first design
 * and Zod schema validation.
 *
 * @example crateflow.config.yaml
 * ```yaml
 * publish:
 *   skipPublished: true
 *   intervalSecs: 30
 * checkpoint:
 *   strict: true
 * ```
 */

export {
  type PublishConfig,
  type CheckpointConfig,
  type CrateflowConfig,
  PublishConfigSchema,
  CheckpointConfigSchema,
  CrateflowConfigSchema,
  validateConfig,
  safeValidateConfig,
  defaultConfig,
} from './schema.js';

export {
  CONFIG_FILE_NAME,
  ConfigLoadError,
  loadConfigFromFile,
  findAndLoadConfig,
} from './loader.js';

export { PUBLISH_DEFAULTS, CHECKPOINT_DEFAULTS } from './constants.js';

export { createSafeValidator, createStrictValidator, formatZodIssues } from './schema-utils.js';

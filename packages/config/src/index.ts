/**
 * @git-handle/config
 *
 * Configuration for git-handle with YAML files and Zod schema validation.
 *
 * @example Basic YAML configuration
 * ```yaml
 * # git-handle.config.yaml
 * git:
 *   binary: /usr/local/bin/git
 *   remote: upstream
 *   env:
 *     GIT_TERMINAL_PROMPT: "0"
 * ```
 */

// Core schema types and validation
export {
  type GitSettings,
  type GitHandleConfig,
  type GitHandleConfigInput,
  GitSettingsSchema,
  GitHandleConfigSchema,
  validateConfig,
  safeValidateConfig,
} from './schema.js';

export { createSafeValidator, createStrictValidator } from './schema-utils.js';

// Config loading
export {
  CONFIG_FILE_NAME,
  loadConfigFromFile,
  findAndLoadConfig,
  findConfigPath,
} from './loader.js';

// Defaults
export { GIT_HANDLE_DEFAULTS, RESERVED_ENV_VARS, type GitHandleDefaults } from './constants.js';

/**
 * Configuration - Public API
 */

export type {
  AnalysisConfiguration,
  ConfigurationInput,
  EntryConfiguration,
  InferenceOptions,
  MockEnvironment,
  PackageConfiguration,
  RuntimeConfiguration,
} from "./types.js";
export {
  DEFAULT_PACKAGE_ROOT,
  defaultInferenceOptions,
  validateConfiguration,
} from "./validation.js";
export {
  CONFIG_FILE_NAME,
  findConfigurationFile,
  loadConfigurationFile,
  parseConfigurationObject,
} from "./loader.js";

/**
 * @cadsync/cli - Settings file, logging and command wiring for cadsync
 */

export {
  createContext,
  createOnshapeClient,
  selectTargets,
  resultOf,
  runPull,
  runPush,
  runProjectPull,
  runProjectPush,
  formatSummary,
  type RunContext,
  type ContextOptions,
  type RunResult,
} from "./runner.js";
export {
  loadConfigFile,
  parseConfigText,
  validateConfig,
  expandEnvVar,
  expandEnvironmentVariables,
  updateConfigText,
  saveManagedSections,
  type ManagedSections,
} from "./parser.js";
export {
  convertSettings,
  convertFolder,
  convertDocument,
  convertReference,
  convertProject,
  convertPolicySettings,
  encodeReference,
  encodeProject,
  encodePolicySettings,
  JsoncSettingsRepository,
} from "./settings.js";
export { getLog, setLogLevel, parseLogLevel, logError, resetLogger, formatLogLine, type Logger, type LogLevel } from "./logger.js";
export { LogReporter } from "./reporter.js";
export {
  DEFAULT_CONFIG_FILE,
  type ConfigFile,
  type OnshapeConfigRaw,
  type SettingsConfigRaw,
  type FolderConfigRaw,
  type DocumentConfigRaw,
  type ReferenceConfigRaw,
  type ProjectConfigRaw,
  type SyncMetadataRaw,
} from "./config.js";

export * from './notification/index.js';
export {
  filterLines,
  extractMessage,
  DEFAULT_STREAM_CONFIG,
  type StreamConfig,
  type RedirectTarget,
  type RedirectOutputs,
  type LineWriter,
} from './stream-filter.js';
export { runStream, type StreamSummary, type StreamRunOptions } from './stream-runner.js';
export {
  loadConfig,
  parseConfig,
  parseConfigText,
  resolveConfigPath,
  getRuntimeSettings,
  exampleConfig,
  writeExampleConfig,
  DEFAULT_CONFIG_PATH,
  DESTINATION_TYPES,
  type NotiConfig,
  type ConfigFile,
  type InitDestination,
  type RuntimeSettings,
} from './config.js';
export {
  NotiError,
  ConfigError,
  FormatError,
  describeSendError,
  type NotiErrorCode,
  type SendError,
} from './errors.js';

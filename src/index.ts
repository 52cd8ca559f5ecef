export * from './entries/index.js';
export { EntryTypeRegistry, type EntryBuilder } from './services/EntryTypeRegistry.js';
export { LogEntryFactory, type LogEntryFactoryOptions } from './services/LogEntryFactory.js';
export {
  LogEventReader,
  InMemoryRecordSource,
  type BatchResult,
  type RecordFailure,
} from './services/LogEventReader.js';
export { StaticSiteContext, WikiPage } from './services/StaticSiteContext.js';
export { ConfigManager } from './services/ConfigManager.js';
export {
  LogEntryError,
  ConfigurationError,
  ParseError,
  FieldAbsentError,
  RecordSourceExhaustedError,
  type LogEntryErrorCode,
} from './utils/errors.js';
export {
  createDeprecationReporter,
  type DeprecatedUsageWarning,
  type DeprecationHook,
} from './utils/deprecation.js';
export { Timestamp, Duration } from './utils/timestamp.js';
export { Logger, LogLevel } from './utils/logger.js';
export * from './models/LogEntry.js';
export type * from './models/Site.js';
export type * from './models/Config.js';

/**
 * @standup-report/core - Shared types, configuration, calendar helpers
 * and logging. Every other package depends on this one.
 */

// Types
export * from './types.js';

// Config
export {
  CONFIG_FILENAME,
  loadConfig,
  writeDefaultConfig,
  getDefaultConfig,
  normalizeKeys,
  resolveSettings,
  type StandupConfig,
  type Settings,
  type SettingsResult,
  type PlaneSettings,
  type GitHubSettings,
  type SlackSettings,
} from './config.js';

// Dates
export {
  toIsoDate,
  today,
  parseIsoDate,
  addDays,
  weekday,
  previousWorkday,
  workdayRange,
  resolveReportingRange,
  dayWindow,
  isWithinRange,
  formatRange,
} from './dates.js';

// Logger
export {
  Logger,
  initLogger,
  getLogger,
  formatLogLine,
  LEVEL_PRIORITY,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.js';

import { noop } from './common-utils';

const PREFIX_ROOT = 'avcmux';

export const LOGGER_CONFIG_ENV_VAR = 'AVCMUX_LOGGER_CONFIG';

const DEBUG = false;

const getPrefix = function (type: string, category: string): string {
  const prefix = `[${PREFIX_ROOT}]:[${type}]:[${category}] >`;
  return prefix;
};

const regExpEscape = function (s: string): string {
  return s.replace(/[-/\\^$*+?.()|[\]{}]/g, '\\$&');
};

export type LoggerFunc = (...args: unknown[]) => void;

export type Logger = {
  debug: LoggerFunc
  log: LoggerFunc
  info: LoggerFunc
  warn: LoggerFunc
  error: LoggerFunc
};

export enum LoggerLevel {
  ON = Infinity,
  DEBUG = 5,
  LOG = 4,
  INFO = 3,
  WARN = 2,
  ERROR = 1,
  OFF = 0
}

export type LoggerConfig = {
  [catMatcher: string]: LoggerLevel
};

// in-process overrides, applied on top of whatever the environment says
let localOverrides: LoggerConfig = {};

// last env value we complained about, so a bad value only warns once
let reportedBadEnvValue: string | null = null;

function isLoggerConfig (value: unknown): value is LoggerConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((level) => typeof level === 'number');
}

function readEnvLoggerConfig (): LoggerConfig {
  const raw = process.env[LOGGER_CONFIG_ENV_VAR];
  if (!raw) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    parsed = undefined;
  }

  if (!isLoggerConfig(parsed)) {
    if (reportedBadEnvValue !== raw) {
      reportedBadEnvValue = raw;
      console.warn(`${PREFIX_ROOT}:Logger (WARN) > Ignoring malformed ${LOGGER_CONFIG_ENV_VAR} value:`, raw);
    }
    return {};
  }

  return parsed;
}

export function createAndGetLocalLoggerConfig (): LoggerConfig {
  return Object.assign(readEnvLoggerConfig(), localOverrides);
}

export function removeLocalLoggerConfig () {
  localOverrides = {};
}

export function setLocalLoggerLevel (categoryMatcher: string, level: LoggerLevel): LoggerConfig {
  localOverrides[categoryMatcher] = level;
  return createAndGetLocalLoggerConfig();
}

export function getConfiguredLoggerLevelForCategory (
  category: string,
  defaultLevel: LoggerLevel = LoggerLevel.OFF,
  config: LoggerConfig = createAndGetLocalLoggerConfig()): LoggerLevel {
  let retLevel: LoggerLevel | null = null;

  for (const catMatcher of Object.keys(config)) {
    const level: LoggerLevel = config[catMatcher];
    const parsedMatcher: string = catMatcher.split('*').map(regExpEscape).join('.*');
    const isCatMatching = (new RegExp('^' + parsedMatcher + '$')).test(category);

    if (isCatMatching && (retLevel === null || level < retLevel)) { // we are enforcing the lowest level specified by any matching category wildcard
      retLevel = level;
    }
  }
  return retLevel === null ? defaultLevel : retLevel;
}

export function checkLogLevel (level: number, catLevel: LoggerLevel): boolean {
  return level >= catLevel;
}

export const getLogger = function (category: string, level: number = LoggerLevel.ON): Logger {
  level = getConfiguredLoggerLevelForCategory(category, level);

  if (DEBUG) {
    console.log(`${PREFIX_ROOT}:Logger (DEBUG mode) > Set-up category <${category}> with level ${level}`);
  }

  return {
    debug: checkLogLevel(level, LoggerLevel.DEBUG) ? console.debug.bind(console, getPrefix('d', category)) : noop,
    log: checkLogLevel(level, LoggerLevel.LOG) ? console.log.bind(console, getPrefix('l', category)) : noop,
    info: checkLogLevel(level, LoggerLevel.INFO) ? console.info.bind(console, getPrefix('i', category)) : noop,
    warn: checkLogLevel(level, LoggerLevel.WARN) ? console.warn.bind(console, getPrefix('w', category)) : noop,
    error: checkLogLevel(level, LoggerLevel.ERROR) ? console.error.bind(console, getPrefix('e', category)) : noop
  };
};

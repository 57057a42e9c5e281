/**
 * Environment-driven settings
 *
 *   FORMSMITH_LOG_LEVEL          error | warn | info | debug (default: info)
 *   FORMSMITH_LOG_JSON           "true" / "1" for JSON log lines
 *   FORMSMITH_CSRF_FIELD         default CSRF field name (default: _csrf)
 *   FORMSMITH_CSRF_TOKEN_BYTES   entropy of minted CSRF tokens (default: 32)
 *   FORMSMITH_CSRF_TTL_SECONDS   lifetime of tokens in the memory store (0 = no expiry)
 */

import { ConfigurationError, getErrorMessage } from './shared/error-handler.js';
import { createLogger, normalizeLogLevel, type LogLevel, type Logger } from './shared/logger.js';

export const DEFAULT_CSRF_FIELD = '_csrf';
export const DEFAULT_CSRF_TOKEN_BYTES = 32;

export interface Settings {
  logLevel: LogLevel;
  jsonLogs: boolean;
  csrfField: string;
  csrfTokenBytes: number;
  csrfTtlSeconds: number;
}

type Env = Record<string, string | undefined>;

function readFlag(env: Env, key: string): boolean {
  const raw = env[key]?.trim().toLowerCase();
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      `${key} must be an integer >= ${min}, got "${raw}"`,
      { key, value: raw },
      `Unset ${key} to use the default (${fallback})`
    );
  }
  return value;
}

export type LogSettings = Pick<Settings, 'logLevel' | 'jsonLogs'>;

export type CsrfSettings = Pick<Settings, 'csrfField' | 'csrfTokenBytes' | 'csrfTtlSeconds'>;

export function loadLogSettings(env: Env = process.env): LogSettings {
  let logLevel: LogLevel;
  try {
    logLevel = normalizeLogLevel(env.FORMSMITH_LOG_LEVEL);
  } catch (error) {
    throw new ConfigurationError(getErrorMessage(error), { key: 'FORMSMITH_LOG_LEVEL' });
  }
  return { logLevel, jsonLogs: readFlag(env, 'FORMSMITH_LOG_JSON') };
}

/**
 * Default CSRF field name. Reads nothing else, so rendering a form never
 * fails on a bad token-store setting.
 */
export function csrfFieldSetting(env: Env = process.env): string {
  return env.FORMSMITH_CSRF_FIELD?.trim() || DEFAULT_CSRF_FIELD;
}

export function loadCsrfSettings(env: Env = process.env): CsrfSettings {
  return {
    csrfField: csrfFieldSetting(env),
    csrfTokenBytes: readInteger(env, 'FORMSMITH_CSRF_TOKEN_BYTES', DEFAULT_CSRF_TOKEN_BYTES, 16),
    csrfTtlSeconds: readInteger(env, 'FORMSMITH_CSRF_TTL_SECONDS', 0, 0),
  };
}

export function loadSettings(env: Env = process.env): Settings {
  return { ...loadLogSettings(env), ...loadCsrfSettings(env) };
}

let packageLogger: Logger | undefined;

/**
 * Logger used when a component is not handed one explicitly. Depends only on
 * the log settings; an invalid level falls back to info with a warning.
 */
export function getLogger(): Logger {
  if (!packageLogger) {
    let settings: LogSettings;
    let problem: string | undefined;
    try {
      settings = loadLogSettings();
    } catch (error) {
      problem = getErrorMessage(error);
      settings = { logLevel: 'info', jsonLogs: readFlag(process.env, 'FORMSMITH_LOG_JSON') };
    }
    packageLogger = createLogger({
      component: 'formsmith',
      level: settings.logLevel,
      json: settings.jsonLogs,
    });
    if (problem) {
      packageLogger.warn('Ignoring FORMSMITH_LOG_LEVEL', { reason: problem });
    }
  }
  return packageLogger;
}

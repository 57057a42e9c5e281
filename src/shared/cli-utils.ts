/**
 * CLI Utilities
 *
 * Shared utilities for CLI commands to ensure consistent behavior
 */

import type { Command } from 'commander';
import { loadLogSettings } from '../settings.js';
import { createLogger, normalizeLogLevel, type Logger } from './logger.js';

/**
 * Global CLI options that can be set on any command
 */
export interface GlobalOptions {
  logLevel?: string;
  jsonLogs?: boolean;
}

/**
 * Get global options from a command, handling parent chain
 *
 * Commander stores global options on the program root, so we need
 * to traverse up the parent chain to find them.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  let current: Command = command;
  while (current.parent) {
    current = current.parent;
  }

  const opts = current.opts();
  const logLevel: unknown = opts.logLevel;
  const jsonLogs: unknown = opts.jsonLogs;

  return {
    logLevel: typeof logLevel === 'string' ? logLevel : undefined,
    jsonLogs: jsonLogs === true ? true : undefined,
  };
}

/**
 * Logger honouring --log-level / --json-logs, falling back to FORMSMITH_* settings
 */
export function getCommandLogger(command: Command): Logger {
  const settings = loadLogSettings();
  const options = getGlobalOptions(command);
  return createLogger({
    component: 'formsmith',
    scope: command.name(),
    level: options.logLevel ? normalizeLogLevel(options.logLevel) : settings.logLevel,
    json: options.jsonLogs ?? settings.jsonLogs,
  });
}

/**
 * Check if stdout is a TTY (for formatting decisions)
 */
export function isTTY(): boolean {
  return process.stdout.isTTY === true;
}

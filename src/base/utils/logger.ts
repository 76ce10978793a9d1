/**
 * Structured logging module for moo
 * Provides consistent logging across all components
 */

import { isDebugEnabled, type DebugComponent } from './debug.js';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Maps a log component name to the debug switch that gates its debug output
 */
const DEBUG_COMPONENTS: Record<string, DebugComponent> = {
  Config: 'config',
  Project: 'project',
  Discovery: 'discovery',
  Registry: 'discovery',
  Command: 'commands',
  CLI: 'commands',
};

/**
 * Format context object for readable output
 */
function formatContext(context: LogContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return '';
  }

  const formatted = entries
    .map(([key, value]) => {
      if (typeof value === 'string') {
        return `${key}="${value}"`;
      }
      if (value === undefined || value === null) {
        return `${key}=${value}`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` [${formatted}]`;
}

/**
 * Render a log line without writing it
 */
export function formatLogLine(
  level: LogLevel,
  component: string,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? formatContext(context) : '';
  return `[${timestamp}] ${component}:${level} - ${message}${contextStr}`;
}

/**
 * Log a message with structured context
 *
 * @param component - Component name (e.g., 'Config', 'Project', 'Discovery')
 */
export function log(
  level: LogLevel,
  component: string,
  message: string,
  context?: LogContext
): void {
  switch (level) {
    case LogLevel.ERROR:
      console.error(formatLogLine(level, component, message, context));
      break;
    case LogLevel.WARN:
      console.warn(formatLogLine(level, component, message, context));
      break;
    case LogLevel.DEBUG: {
      // Debug lines go to stderr so command output stays clean
      const debugComponent = DEBUG_COMPONENTS[component];
      if (debugComponent && isDebugEnabled(debugComponent)) {
        console.error(formatLogLine(level, component, message, context));
      }
      break;
    }
    case LogLevel.INFO:
    default:
      console.log(formatLogLine(level, component, message, context));
      break;
  }
}

/**
 * Convenience functions for each log level
 */
export const logger = {
  error: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.ERROR, component, message, context),

  warn: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.WARN, component, message, context),

  info: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.INFO, component, message, context),

  debug: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.DEBUG, component, message, context),
};

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

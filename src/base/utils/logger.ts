/**
 * Structured logging for skillbook components
 *
 * Lines read `[timestamp] Component:level - message [key="value" ...]`.
 * Warnings always print; debug lines print only when the component's
 * debug level (see debug.ts) reaches the requested verbosity.
 */

import { getDebugConfig, type DebugComponent, type DebugLevel } from './debug.js';

export type LogLevel = 'warn' | 'debug';

export type LogContext = Record<string, unknown>;

export function formatContext(context: LogContext): string {
  const entries = Object.entries(context).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return '';
  }

  const formatted = entries
    .map(([key, value]) => {
      if (typeof value === 'string') return `${key}="${value}"`;
      if (value !== null && typeof value === 'object') return `${key}=${JSON.stringify(value)}`;
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` [${formatted}]`;
}

function label(component: DebugComponent): string {
  return component.charAt(0).toUpperCase() + component.slice(1);
}

export function formatLogLine(
  level: LogLevel,
  component: DebugComponent,
  message: string,
  context?: LogContext,
  timestamp: Date = new Date()
): string {
  const contextStr = context ? formatContext(context) : '';
  return `[${timestamp.toISOString()}] ${label(component)}:${level} - ${message}${contextStr}`;
}

export const logger = {
  warn(component: DebugComponent, message: string, context?: LogContext): void {
    console.warn(formatLogLine('warn', component, message, context));
  },

  /**
   * @param verbosity - 1 for routine events, 2 for cache hits and scores
   */
  debug(
    component: DebugComponent,
    message: string,
    context?: LogContext,
    verbosity: Exclude<DebugLevel, 0> = 1
  ): void {
    if (getDebugConfig().components[component] >= verbosity) {
      console.log(formatLogLine('debug', component, message, context));
    }
  },
};

// =============================================================================
// GAZETTE - Console Logging
//
// Bracketed component prefixes, filtered by LOG_LEVEL.
//   log.info('Workflow', 'Article approved', { articleId })
//   → [Workflow] Article approved { articleId: '…' }
// =============================================================================

import { config } from '../config';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

const threshold = LEVEL_ORDER[isLogLevel(config.logging.level) ? config.logging.level : 'info'];

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= threshold;
}

function emit(
  level: Exclude<LogLevel, 'silent'>,
  component: string,
  message: string,
  detail?: unknown,
): void {
  if (!enabled(level)) return;
  const line = `[${component}] ${message}`;
  const args = detail === undefined ? [line] : [line, detail];
  switch (level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.log(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}

export const log = {
  debug: (component: string, message: string, detail?: unknown) => emit('debug', component, message, detail),
  info: (component: string, message: string, detail?: unknown) => emit('info', component, message, detail),
  warn: (component: string, message: string, detail?: unknown) => emit('warn', component, message, detail),
  error: (component: string, message: string, detail?: unknown) => emit('error', component, message, detail),
};

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

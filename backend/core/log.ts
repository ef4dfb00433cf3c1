import type { LogEvent, LogLevel } from './types.js';

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type Logger = (e: LogEvent) => void;

function parseLevel(v: string | undefined): LogLevel {
  const l = (v || '').toLowerCase().trim();
  return l === 'debug' || l === 'info' || l === 'warn' || l === 'error' ? l : 'info';
}

function format(e: LogEvent): string {
  const parts = [`[${e.level}]`];
  if (e.module) parts.push(`[${e.module}]`);
  if (e.id) parts.push(`#${e.id}`);
  parts.push(e.msg);
  if (e.elapsed !== undefined) parts.push(`(${e.elapsed} ms)`);
  return parts.join(' ');
}

/**
 * Console logger with a minimum level (LOG_LEVEL, default "info").
 * Warnings and errors go to stderr.
 */
export function createLogger(level: LogLevel = parseLevel(process.env.LOG_LEVEL)): Logger {
  const min = ORDER[level];
  return (e) => {
    if (ORDER[e.level] < min) return;
    const line = format(e);
    if (e.level === 'warn' || e.level === 'error') console.error(line);
    else console.log(line);
  };
}

/** Collects events in memory, for tests. */
export function createMemoryLogger(): Logger & { events: LogEvent[] } {
  const events: LogEvent[] = [];
  const log = (e: LogEvent) => { events.push(e); };
  return Object.assign(log, { events });
}

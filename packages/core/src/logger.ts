// ============================================================================
// @argloom/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels for argloom.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Current log level (controlled by the ARGLOOM_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

/**
 * Map an ARGLOOM_DEBUG value to a level.
 */
export function levelFromEnv(value: string | undefined): LogLevel {
  if (value === '1' || value === 'true') return 'debug';
  if (value === 'warn') return 'warn';
  if (value === 'error') return 'error';
  return 'info';
}

// Initialize on module load
currentLevel = levelFromEnv(process.env.ARGLOOM_DEBUG);

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const prefix = '[Argloom]';
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `${prefix} ${message}${dataStr}`;

  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
      console.info(msg);
      break;
    case 'warn':
      console.warn(msg);
      break;
    case 'error':
      console.error(msg);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[Argloom] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only logs when ARGLOOM_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Measures how long a parse phase takes, logged at debug level.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  end(): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { durationMs: duration });
    return duration;
  }

  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Event Callbacks
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => {
    callbacks.delete(callback);
  };
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log that a command consumed part of the stream.
 */
export function logCommandMatched(path: readonly string[], keys: number, remaining: number): void {
  debug(`matched ${path.join(' ')} (${keys} keys, ${remaining} tokens left)`, {
    command: path.join(' '),
    keys,
    remaining,
  });
}

/**
 * Log a terminal request (help, version, completion) cutting a parse short.
 */
export function logTerminalRequest(kind: string, path: readonly string[]): void {
  debug(`terminal request: ${kind} for ${path.join(' ')}`, { kind, command: path.join(' ') });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}

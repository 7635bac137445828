// ============================================================================
// @enctab/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels for enctab.
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
 * Current log level (controlled by ENCTAB_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

function initLevel(): void {
  const debug = process.env.ENCTAB_DEBUG;
  if (debug === '1' || debug === 'true') {
    currentLevel = 'debug';
  } else if (debug === 'warn') {
    currentLevel = 'warn';
  } else if (debug === 'error') {
    currentLevel = 'error';
  } else {
    currentLevel = 'info';
  }
}

initLevel();

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[enctab] ${message}${dataStr}`;

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
      console.error('[enctab] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only logs when ENCTAB_DEBUG=1 is set.
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
 * Performance timer for measuring operation duration.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /**
   * End the timer and log the result at debug level.
   */
  end(): number {
    return this.endWith({});
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

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => callbacks.delete(callback);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log the trie block size the builder settled on.
 */
export function logTrieChoice(blockBits: number, lowerLength: number, upperLength: number): void {
  debug(`trie: blockBits=${blockBits} (${lowerLength} lower + ${upperLength} upper)`, {
    blockBits,
    lower: lowerLength,
    upper: upperLength,
  });
}

/**
 * Log a failed index build.
 */
export function logCompileFailure(name: string, reason: string): void {
  error(`failed to compile ${name}: ${reason}`, { name, reason });
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

/**
 * Logger - Structured logging for Tidewatch
 *
 * Features:
 * - Log levels (debug, info, warn, error)
 * - Environment-based log level control (TIDEWATCH_LOG_LEVEL)
 * - Module prefixes for easy filtering
 * - Silent mode for tests
 * - stderr output, so a host process keeps stdout for itself
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const log = createLogger('Router');
 *
 *   log.debug('Expanded 42 nodes');  // Only shown when TIDEWATCH_LOG_LEVEL=debug
 *   log.warn('Rejected viewer coordinate');
 *
 * Environment:
 *   TIDEWATCH_LOG_LEVEL=debug|info|warn|error|silent (default: info)
 *   NODE_ENV=test automatically sets silent
 */

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;

    /** Create a child logger with additional prefix */
    child(prefix: string): Logger;

    /** Check if a log level is enabled */
    isEnabled(level: LogLevel): boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOG LEVEL CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4
};

function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVEL_PRIORITY;
}

/**
 * Get the configured log level from environment
 * - TIDEWATCH_LOG_LEVEL takes priority
 * - NODE_ENV=test defaults to silent
 * - Otherwise defaults to info
 */
function getConfiguredLevel(): LogLevel {
    const envLevel = process.env.TIDEWATCH_LOG_LEVEL?.toLowerCase();

    if (envLevel && isLogLevel(envLevel)) {
        return envLevel;
    }

    if (process.env.NODE_ENV === 'test') {
        return 'silent';
    }

    return 'info';
}

let configuredLevel: LogLevel | null = null;

function getLevel(): LogLevel {
    if (configuredLevel === null) {
        configuredLevel = getConfiguredLevel();
    }
    return configuredLevel;
}

/**
 * Reset the cached level (useful for tests)
 */
export function resetLogLevel(): void {
    configuredLevel = null;
}

/**
 * Override the log level programmatically
 */
export function setLogLevel(level: LogLevel): void {
    configuredLevel = level;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

class StderrLogger implements Logger {
    private prefix: string;

    constructor(prefix: string) {
        this.prefix = prefix;
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLevel()];
    }

    isEnabled(level: LogLevel): boolean {
        return this.shouldLog(level);
    }

    private formatMessage(level: LogLevel, message: string): string {
        const timestamp = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
        const levelTag = level.toUpperCase().padEnd(5);
        return `[${timestamp}] [${levelTag}] [${this.prefix}] ${message}`;
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.shouldLog('debug')) {
            console.error(this.formatMessage('debug', message), ...args);
        }
    }

    info(message: string, ...args: unknown[]): void {
        if (this.shouldLog('info')) {
            console.error(this.formatMessage('info', message), ...args);
        }
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.shouldLog('warn')) {
            console.error(this.formatMessage('warn', message), ...args);
        }
    }

    error(message: string, ...args: unknown[]): void {
        if (this.shouldLog('error')) {
            console.error(this.formatMessage('error', message), ...args);
        }
    }

    child(prefix: string): Logger {
        return new StderrLogger(`${this.prefix}:${prefix}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create a logger instance with the given module prefix
 *
 * @example
 * const log = createLogger('Scanner');
 * log.info('Viewport resized');
 * // Output: [12:34:56.789] [INFO ] [Scanner] Viewport resized
 *
 * const childLog = log.child('Beamcast');
 * childLog.debug('Cast 120 rays');
 * // Output: [12:34:56.790] [DEBUG] [Scanner:Beamcast] Cast 120 rays
 */
export function createLogger(prefix: string): Logger {
    return new StderrLogger(prefix);
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create a timer for performance logging
 *
 * @example
 * const timer = createTimer(log);
 * // ... do work ...
 * timer.done('Path search finished'); // Logs with duration at debug level
 */
export function createTimer(logger: Logger): { done: (message: string) => void } {
    const start = performance.now();
    return {
        done(message: string): void {
            const duration = performance.now() - start;
            logger.debug(`${message} (${duration.toFixed(2)}ms)`);
        }
    };
}

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return String(error);
}

import { mkdirSync, existsSync, appendFileSync } from 'fs';
import { join } from 'path';
import { env } from '../config/env.js';

const EVENTS_LOG_FILE = join(env.LOG_DIR, 'events.jsonl');

// Ensure logs directory exists
function ensureLogsDir() {
    if (!existsSync(env.LOG_DIR)) {
        mkdirSync(env.LOG_DIR, { recursive: true });
    }
}

if (env.LOG_TO_FILE) {
    ensureLogsDir();
}

/**
 * Supported log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log event structure
 */
export interface LogEvent {
    timestamp: string;
    type: string;
    level?: LogLevel;
    payload: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[env.LOG_LEVEL];
}

/**
 * Logs an event to console and optionally to a JSONL file
 * @param type - Dotted event name, e.g. `reconcile.cancel`
 * @param payload - Event data
 * @param level - Log level (default: 'info')
 */
export function logEvent(type: string, payload: unknown, level: LogLevel = 'info') {
    if (!shouldLog(level)) {
        return;
    }

    const event: LogEvent = {
        timestamp: new Date().toISOString(),
        type,
        level,
        payload,
    };

    const levelColors: Record<LogLevel, string> = {
        debug: '\x1b[36m', // Cyan
        info: '\x1b[32m',  // Green
        warn: '\x1b[33m',  // Yellow
        error: '\x1b[31m', // Red
    };
    const reset = '\x1b[0m';
    const color = levelColors[level] || reset;

    console.log(
        `${color}[${event.timestamp}] [${level.toUpperCase()}] [${type}]${reset}`,
        typeof payload === 'object' ? JSON.stringify(payload, null, 2) : payload
    );

    if (env.LOG_TO_FILE) {
        try {
            appendFileSync(EVENTS_LOG_FILE, JSON.stringify(event) + '\n', 'utf-8');
        } catch (error) {
            console.error('Failed to write to log file:', error);
        }
    }
}

/**
 * Render an unknown thrown value for a log payload
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export const logger = {
    debug: (type: string, payload: unknown) => logEvent(type, payload, 'debug'),
    info: (type: string, payload: unknown) => logEvent(type, payload, 'info'),
    warn: (type: string, payload: unknown) => logEvent(type, payload, 'warn'),
    error: (type: string, payload: unknown) => logEvent(type, payload, 'error'),
};

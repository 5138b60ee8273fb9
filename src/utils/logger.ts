// src/utils/logger.ts

import util from 'util';

const COLORS = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    fg: {
        red: '\x1b[31m',
        green: '\x1b[32m',
        yellow: '\x1b[33m',
        cyan: '\x1b[36m'
    }
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    return isLogLevel(value) ? value : undefined;
}

// Tests stay quiet unless LOG_LEVEL asks otherwise
let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
    ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

function formatLog(level: string, color: string, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const msg = args.map(arg =>
        typeof arg === 'object' ? util.inspect(arg, { colors: true, depth: 5 }) : String(arg)
    ).join(' ');
    return `${COLORS.bright}${color}[${level}]${COLORS.reset} ${COLORS.dim}${timestamp}${COLORS.reset} ${msg}`;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

const logger = {
    debug: (...args: unknown[]) => {
        if (enabled('debug')) {
            console.debug(formatLog('DEBUG', COLORS.fg.cyan, args));
        }
    },
    info: (...args: unknown[]) => {
        if (enabled('info')) {
            console.log(formatLog('INFO', COLORS.fg.green, args));
        }
    },
    warn: (...args: unknown[]) => {
        if (enabled('warn')) {
            console.warn(formatLog('WARN', COLORS.fg.yellow, args));
        }
    },
    error: (...args: unknown[]) => {
        if (enabled('error')) {
            console.error(formatLog('ERROR', COLORS.fg.red, args));
        }
    },
    setLevel: (level: LogLevel) => {
        currentLevel = level;
    },
    getLevel: (): LogLevel => currentLevel
};

export default logger;

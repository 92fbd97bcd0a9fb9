/**
 * logger.ts — Structured, level-aware logger.
 * Timestamps every line. Never logs secrets.
 * Every level goes to stderr; stdout carries only the reply.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const COLORS: Record<LogLevel, string> = {
    debug: "\x1b[90m", // gray
    info: "\x1b[36m",  // cyan
    warn: "\x1b[33m",  // yellow
    error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

let threshold: LogLevel = "info";

/** Set once by the entry point from the validated config */
export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

function shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[threshold];
}

export function format(level: LogLevel, message: string, meta?: unknown): string {
    const ts = new Date().toISOString();
    const color = COLORS[level];
    const label = level.toUpperCase().padEnd(5);
    const metaStr = meta !== undefined ? ` ${JSON.stringify(meta)}` : "";
    return `${color}[${ts}] ${label}${RESET} ${message}${metaStr}`;
}

function emit(level: LogLevel, message: string, meta?: unknown): void {
    if (shouldLog(level)) process.stderr.write(`${format(level, message, meta)}\n`);
}

export const logger = {
    debug(message: string, meta?: unknown) {
        emit("debug", message, meta);
    },
    info(message: string, meta?: unknown) {
        emit("info", message, meta);
    },
    warn(message: string, meta?: unknown) {
        emit("warn", message, meta);
    },
    error(message: string, meta?: unknown) {
        emit("error", message, meta);
    },
};

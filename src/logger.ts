/**
 * Structured logging with a pino-compatible line format.
 *
 * Everything goes to stderr; stdout is reserved for the analysis itself.
 */

import os from "os";
import { LOG_LEVEL_NAMES, LogLevel } from "./shared/types";

export type { LogLevel };

const LOG_LEVELS: Record<LogLevel, number> = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
    fatal: 60
};

export interface LogContext {
    target?: string;
    provider?: string;
    model?: string;
    [key: string]: unknown;
}

export interface LogEntry {
    level: number;
    time: number;
    msg: string;
    pid: number;
    hostname: string;
    name: string;
    [key: string]: unknown;
}

export type LogSink = (line: string, entry: LogEntry) => void;

export interface LoggerOptions {
    level?: LogLevel;
    name?: string;
    prettyPrint?: boolean;
    redact?: string[];
    sink?: LogSink;
}

const DEFAULT_REDACT_KEYS = ["password", "api_key", "apikey", "token", "secret", "authorization", "x-api-key"];

const RESERVED_KEYS = ["level", "time", "msg", "pid", "hostname", "name"];

function levelName(level: number): LogLevel {
    return LOG_LEVEL_NAMES.find((k) => LOG_LEVELS[k] === level) ?? "info";
}

function defaultSink(line: string): void {
    process.stderr.write(`${line}\n`);
}

export class Logger {
    private level: LogLevel;
    private name: string;
    private prettyPrint: boolean;
    private redactKeys: Set<string>;
    private sink: LogSink;
    private context: LogContext = {};

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? "info";
        this.name = options.name ?? "diff-timer";
        this.prettyPrint = options.prettyPrint ?? Boolean(process.stderr.isTTY);
        this.redactKeys = new Set((options.redact ?? DEFAULT_REDACT_KEYS).map((k) => k.toLowerCase()));
        this.sink = options.sink ?? defaultSink;
    }

    child(context: LogContext): Logger {
        const child = new Logger({
            level: this.level,
            name: this.name,
            prettyPrint: this.prettyPrint,
            redact: Array.from(this.redactKeys),
            sink: this.sink
        });
        child.context = { ...this.context, ...context };
        return child;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    isLevelEnabled(level: LogLevel): boolean {
        return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
    }

    private redact(obj: Record<string, unknown>): Record<string, unknown> {
        const redacted: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(obj)) {
            if (this.redactKeys.has(key.toLowerCase())) {
                redacted[key] = "[REDACTED]";
            } else if (value instanceof Error) {
                redacted[key] = { name: value.name, message: value.message };
            } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
                redacted[key] = this.redact({ ...value });
            } else {
                redacted[key] = value;
            }
        }
        return redacted;
    }

    private formatPretty(entry: LogEntry): string {
        const name = levelName(entry.level);
        const time = new Date(entry.time).toISOString();
        const color = LEVEL_COLORS[name];

        let msg = `${time} ${color}${name.toUpperCase().padEnd(5)}\x1b[0m [${entry.name}] ${entry.msg}`;

        const extra: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(entry)) {
            if (!RESERVED_KEYS.includes(k)) {
                extra[k] = v;
            }
        }

        if (Object.keys(extra).length > 0) {
            msg += ` ${JSON.stringify(extra)}`;
        }

        return msg;
    }

    private log(level: LogLevel, msg: string, context?: Record<string, unknown>): void {
        if (!this.isLevelEnabled(level)) return;

        const entry: LogEntry = {
            ...this.redact(this.context),
            ...(context ? this.redact(context) : {}),
            level: LOG_LEVELS[level],
            time: Date.now(),
            msg,
            pid: process.pid,
            hostname: os.hostname(),
            name: this.name
        };

        const line = this.prettyPrint ? this.formatPretty(entry) : JSON.stringify(entry);
        this.sink(line, entry);
    }

    trace(msg: string, context?: Record<string, unknown>): void {
        this.log("trace", msg, context);
    }

    debug(msg: string, context?: Record<string, unknown>): void {
        this.log("debug", msg, context);
    }

    info(msg: string, context?: Record<string, unknown>): void {
        this.log("info", msg, context);
    }

    warn(msg: string, context?: Record<string, unknown>): void {
        this.log("warn", msg, context);
    }

    error(msg: string, context?: Record<string, unknown>): void {
        this.log("error", msg, context);
    }

    fatal(msg: string, context?: Record<string, unknown>): void {
        this.log("fatal", msg, context);
    }
}

const LEVEL_COLORS: Record<LogLevel, string> = {
    trace: "\x1b[90m",
    debug: "\x1b[36m",
    info: "\x1b[32m",
    warn: "\x1b[33m",
    error: "\x1b[31m",
    fatal: "\x1b[35m"
};

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(options?: LoggerOptions): Logger {
    if (!globalLogger) {
        globalLogger = new Logger(options);
    }
    return globalLogger;
}

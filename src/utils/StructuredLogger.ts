import { LogLevel, TraversalConfig } from "../config/TraversalConfig.js";

export interface Logger {
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

export interface LogRecord extends Record<string, unknown> {
    timestamp: string;
    level: LogLevel;
    component: string;
    message: string;
}

export function isLogRecord(value: unknown): value is LogRecord {
    if (typeof value !== "object" || value === null) return false;
    const level = Reflect.get(value, "level");
    return typeof level === "string"
        && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, level)
        && typeof Reflect.get(value, "component") === "string"
        && typeof Reflect.get(value, "message") === "string";
}

export function createLogger(component: string): Logger {
    // The level is read per call so TraversalConfig.set() applies to loggers created earlier.
    const log = (level: LogLevel, message: string, fields?: Record<string, unknown>) => {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[TraversalConfig.get().logLevel]) {
            return;
        }
        const payload: LogRecord = {
            ...(fields ?? {}),
            timestamp: new Date().toISOString(),
            level,
            component,
            message
        };
        const sink = level === "error" ? console.error
            : level === "warn" ? console.warn
            : level === "debug" ? console.debug
            : console.info;
        sink(payload);
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields)
    };
}

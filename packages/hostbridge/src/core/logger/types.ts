export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;

/** Narrow logging contract accepted by every component that takes a `logger` option. */
export interface LoggerContext {
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    info(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}

export type ConsoleHandlerOptions = {
    /** Entries below this level are dropped. Defaults to `"info"`. */
    level?: LogLevel;
};

import type { LogEntry, LoggerContext, LogHandler, LogLevel } from "./types";

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Transport-based logger. Entries fan out to every registered handler;
 * a logger without handlers is silent.
 */
export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();

    /** Register a handler. Returns a function that removes it again. */
    addHandler(handler: LogHandler): () => void {
        this.handlers.add(handler);
        return () => {
            this.handlers.delete(handler);
        };
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    info(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("info", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}

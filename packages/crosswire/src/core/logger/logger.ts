import type { LoggerContext } from "../types";
import type { LogEntry, LoggerOptions, LogHandler, LogLevel } from "./types";

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    warn: 1,
    error: 2,
};

export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();
    private readonly threshold: number;

    constructor(options?: LoggerOptions) {
        this.threshold = LEVEL_RANK[options?.level ?? "debug"];
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    isEnabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] >= this.threshold;
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (!this.isEnabled(level) || this.handlers.size === 0) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}

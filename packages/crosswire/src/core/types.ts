// Logger contract
export interface LoggerContext {
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}

/** Callback receiving a channel's payload. Identity (reference) matters for removal. */
export type Listener<T> = (payload: T) => void;

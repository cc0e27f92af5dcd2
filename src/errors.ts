export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export type FetchErrorKind = "unauthorized" | "malformed" | "transient";

/**
 * A single remote call that did not produce usable data. Scoped to one refresh
 * cycle: the caller logs it and keeps whatever it already had.
 */
export class FetchError extends Error {
    readonly kind: FetchErrorKind;
    readonly status?: number;

    constructor(kind: FetchErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = "FetchError";
        this.kind = kind;
        this.status = options.status;
    }
}

// Image bytes that the decoder rejected. Skips one poster, never the cycle.
export class DecodeError extends Error {
    constructor(message: string, options: { cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = "DecodeError";
    }
}

export class CacheWriteError extends Error {
    readonly path: string;

    constructor(path: string, options: { cause?: unknown } = {}) {
        const reason = options.cause instanceof Error ? `: ${options.cause.message}` : "";
        super(`cache write failed for ${path}${reason}`, { cause: options.cause });
        this.name = "CacheWriteError";
        this.path = path;
    }
}

export class FatalConfigError extends Error {
    constructor(message: string, options: { cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = "FatalConfigError";
    }
}

// sysexits.h EX_CONFIG, so a supervisor can tell bad configuration from a crash.
export const EXIT_CONFIG = 78;

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Structured error codes
 *
 * Every failure surfaced by the rate pipeline carries one of these codes so
 * callers can branch on `error.code` instead of matching messages.
 */

export interface RatesErrorDefinition {
    code: string;
    message: string;
}

export const ERRORS = {
    INVALID_ARGUMENT: { code: 'INVALID_ARGUMENT', message: 'Invalid argument.' },
    FETCH_FAILED: { code: 'FETCH_FAILED', message: 'Failed to retrieve feed.' }
} as const satisfies Record<string, RatesErrorDefinition>;

/** Base class for every error raised by the rate pipeline. */
export class RatesError extends Error {
    readonly code: string;
    readonly details?: unknown;

    constructor(def: RatesErrorDefinition, message?: string, details?: unknown, options?: { cause?: unknown }) {
        super(message ?? def.message, options);
        this.name = 'RatesError';
        this.code = def.code;
        this.details = details;
    }

    toJSON(): { error: { code: string; message: string; details?: unknown } } {
        const error: { code: string; message: string; details?: unknown } = {
            code: this.code,
            message: this.message
        };
        if (this.details !== undefined) {
            error.details = this.details;
        }
        return { error };
    }
}

/** A required argument was missing or empty. Raised before any I/O. */
export class InvalidArgumentError extends RatesError {
    readonly argument: string;

    constructor(argument: string, message: string) {
        super(ERRORS.INVALID_ARGUMENT, message, { argument });
        this.name = 'InvalidArgumentError';
        this.argument = argument;
    }
}

/** The transport reported a non-success outcome for a feed URL. */
export class FetchError extends RatesError {
    readonly url: string;
    readonly status?: number;

    constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
        super(
            ERRORS.FETCH_FAILED,
            message,
            { url, ...(options?.status !== undefined ? { status: options.status } : {}) },
            options?.cause !== undefined ? { cause: options.cause } : undefined
        );
        this.name = 'FetchError';
        this.url = url;
        if (options?.status !== undefined) {
            this.status = options.status;
        }
    }
}

export function requireNonEmpty(value: string | null | undefined, argument: string, message: string): string {
    if (typeof value !== 'string' || value.length === 0) {
        throw new InvalidArgumentError(argument, message);
    }
    return value;
}

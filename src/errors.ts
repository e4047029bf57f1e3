/**
 * Error taxonomy
 *
 * InputError          - malformed configuration; fatal for that configuration run
 * DataUnavailable     - missing pools or feed; degrades to zero results
 * NumericOverflow     - pricing exceeded on-chain integer range; path discarded
 * PersistenceFailure  - file or document write failed; surfaced, never retried
 */

export const ErrorClass = {
    Input: 'INPUT',
    DataUnavailable: 'DATA_UNAVAILABLE',
    NumericOverflow: 'NUMERIC_OVERFLOW',
    Persistence: 'PERSISTENCE',
} as const;

export type ErrorClass = (typeof ErrorClass)[keyof typeof ErrorClass];

export class ArbError extends Error {
    readonly errorClass: ErrorClass;
    /** Identifies what failed (configuration name, path id, file path) */
    readonly context?: string;

    constructor(errorClass: ErrorClass, message: string, context?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.errorClass = errorClass;
        this.context = context;
    }
}

export class InputError extends ArbError {
    constructor(message: string, context?: string) {
        super(ErrorClass.Input, message, context);
    }
}

export class DataUnavailableError extends ArbError {
    constructor(message: string, context?: string) {
        super(ErrorClass.DataUnavailable, message, context);
    }
}

export class NumericOverflowError extends ArbError {
    constructor(message: string, context?: string) {
        super(ErrorClass.NumericOverflow, message, context);
    }
}

export class PersistenceFailure extends ArbError {
    constructor(message: string, context?: string, cause?: unknown) {
        super(ErrorClass.Persistence, message, context, { cause });
    }
}

export function isArbError(e: unknown): e is ArbError {
    return e instanceof ArbError;
}

/** Message of any thrown value, for log lines */
export function describeError(e: unknown): string {
    if (e instanceof ArbError) {
        return e.context ? `${e.errorClass}: ${e.message} (${e.context})` : `${e.errorClass}: ${e.message}`;
    }
    if (e instanceof Error) return e.message;
    return String(e);
}

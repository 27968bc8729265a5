/** Raised when the store cannot be opened, initialised or written. Not retried. */
export class StorageError extends Error {
    public readonly code = 'E-STORAGE';

    constructor(message: string, cause?: unknown) {
        super(message, { cause: cause instanceof Error ? cause : undefined });
        this.name = 'StorageError';
    }
}

/** Raised when a read query fails. Propagates to the caller. */
export class QueryError extends Error {
    public readonly code = 'E-QUERY';
    public readonly details: { query: string };

    constructor(query: string, cause?: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`${query} failed: ${reason}`, { cause: cause instanceof Error ? cause : undefined });
        this.name = 'QueryError';
        this.details = { query };
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

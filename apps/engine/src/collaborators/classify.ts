import { PermanentError, TransientError } from '@pagesmith/sdk';

const TRANSIENT_STATUSES = new Set([408, 425, 429]);

export function isTransientStatus(status: number): boolean {
    return TRANSIENT_STATUSES.has(status) || status >= 500;
}

export function httpStatusError(status: number, context: string): TransientError | PermanentError {
    const message = `${context}: HTTP ${status}`;
    return isTransientStatus(status) ? new TransientError(message) : new PermanentError(message);
}

export function networkError(err: unknown, context: string): TransientError {
    const reason = err instanceof Error ? err.message : String(err);
    return new TransientError(`${context}: ${reason}`, { cause: err });
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

import { stageName } from './stages';
import type { StageInputMap, StageOutputMap } from './schemas';

export interface CallContext {
    taskId: string;
    attempt: number;
    // Fires when the attempt's timeout elapses. Honouring it is optional.
    signal: AbortSignal;
}

export type CollaboratorCall<I, O> = (input: I, ctx: CallContext) => Promise<O>;

export type StageCollaborator<S extends stageName> = CollaboratorCall<StageInputMap[S], StageOutputMap[S]>;

/**
 * The external services the engine drives, one per stage.
 *
 * @example
 * const collaborators: Collaborators = {
 *   extract: async ({ url }) => fetchPage(url),
 *   analyze: async ({ content }) => summarise(content),
 *   write: async ({ analysis, style }) => draft(analysis, style),
 *   publish: async ({ article, draftOnly }) => cms.save(article, draftOnly),
 * };
 */
export type Collaborators = {
    [S in stageName]: StageCollaborator<S>;
};

/** A failure that may go away if the same call is repeated unchanged. */
export class TransientError extends Error {
    readonly retryable = true;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransientError';
    }
}

/** A failure that retrying cannot fix without changing the input. */
export class PermanentError extends Error {
    readonly retryable = false;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PermanentError';
    }
}

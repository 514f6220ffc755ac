import {
    PermanentError,
    serialize,
    stageName,
    stageOutputSchemas,
    TransientError,
} from '@pagesmith/sdk';
import type { StageCollaborator, StageInputMap, StageOutputMap } from '@pagesmith/sdk';
import { StageTimeoutError } from '../errors/stage-timeout.error';
import type { StageFailureReason } from '../store/task.record';
import { BackoffPolicy, calculateBackOff, DEFAULT_BACKOFF } from '../utils/backoff';
import { sleep, withTimeout } from '../utils/timeout';

const TAG = '[stage-runner]';

export interface StagePolicy {
    maxAttempts: number;
    timeoutMs: number;
    backoff: BackoffPolicy;
    maxPayloadBytes?: number;
}

export type StagePolicies = Record<stageName, StagePolicy>;

export type StageResult<S extends stageName> =
    | { success: true; stage: S; output: StageOutputMap[S]; attempts: number }
    | { success: false; stage: S; reason: StageFailureReason; message: string; attempts: number };

type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; retryable: boolean; message: string };

export function defaultStagePolicies(
    timeouts: Record<stageName, number>,
    maxAttempts = 3,
    backoff: BackoffPolicy = DEFAULT_BACKOFF,
): StagePolicies {
    return {
        [stageName.EXTRACT]: { maxAttempts, backoff, timeoutMs: timeouts[stageName.EXTRACT] },
        [stageName.ANALYZE]: { maxAttempts, backoff, timeoutMs: timeouts[stageName.ANALYZE] },
        [stageName.WRITE]: { maxAttempts, backoff, timeoutMs: timeouts[stageName.WRITE] },
        [stageName.PUBLISH]: { maxAttempts, backoff, timeoutMs: timeouts[stageName.PUBLISH] },
    };
}

function messageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

// TransientError and timeouts are worth repeating; everything else, including
// errors the collaborator did not classify, is not.
export function isRetryable(err: unknown): boolean {
    if (err instanceof PermanentError) return false;
    return err instanceof TransientError || err instanceof StageTimeoutError;
}

/**
 * Runs one stage collaborator under its policy: per-attempt timeout, bounded
 * retries with exponential backoff, and validation of what comes back.
 * Never throws; every way a stage can end is folded into a StageResult.
 */
export class StageRunner {
    constructor(
        private readonly policies: StagePolicies,
        private readonly wait: (ms: number) => Promise<void> = sleep,
    ) { }

    async run<S extends stageName>(
        stage: S,
        input: StageInputMap[S],
        call: StageCollaborator<S>,
        taskId: string,
        policy: StagePolicy = this.policies[stage],
    ): Promise<StageResult<S>> {
        const maxAttempts = Math.max(1, policy.maxAttempts);
        let lastMessage = '';

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const outcome = await this.attempt(stage, input, call, taskId, attempt, policy);

            if (outcome.ok) {
                if (attempt > 1) {
                    console.log(`${TAG} task ${taskId} stage ${stage} succeeded on attempt ${attempt}`);
                }
                return { success: true, stage, output: outcome.value, attempts: attempt };
            }

            lastMessage = outcome.message;

            if (!outcome.retryable) {
                console.error(`${TAG} task ${taskId} stage ${stage} failed permanently on attempt ${attempt}: ${outcome.message}`);
                return { success: false, stage, reason: 'StagePermanentFailure', message: outcome.message, attempts: attempt };
            }

            if (attempt < maxAttempts) {
                const delay = calculateBackOff(attempt, policy.backoff);
                console.warn(`${TAG} task ${taskId} stage ${stage} attempt ${attempt}/${maxAttempts} failed (${outcome.message}), retrying in ${delay}ms`);
                await this.wait(delay);
            }
        }

        console.error(`${TAG} task ${taskId} stage ${stage} exhausted ${maxAttempts} attempts: ${lastMessage}`);
        return { success: false, stage, reason: 'StageExhausted', message: lastMessage, attempts: maxAttempts };
    }

    private async attempt<S extends stageName>(
        stage: S,
        input: StageInputMap[S],
        call: StageCollaborator<S>,
        taskId: string,
        attempt: number,
        policy: StagePolicy,
    ): Promise<Outcome<StageOutputMap[S]>> {
        let raw: StageOutputMap[S];
        try {
            raw = await withTimeout(
                policy.timeoutMs,
                signal => call(input, { taskId, attempt, signal }),
                () => new StageTimeoutError(stage, policy.timeoutMs),
            );
        } catch (err) {
            return { ok: false, retryable: isRetryable(err), message: messageOf(err) };
        }

        const schema = stageOutputSchemas[stage];
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            const detail = parsed.error.issues
                .map(issue => `${issue.path.join('.') || 'output'}: ${issue.message}`)
                .join('; ');
            return { ok: false, retryable: false, message: `Invalid ${stage} output: ${detail}` };
        }

        try {
            serialize(parsed.data, policy.maxPayloadBytes);
        } catch (err) {
            return { ok: false, retryable: false, message: `Invalid ${stage} output: ${messageOf(err)}` };
        }

        return { ok: true, value: parsed.data };
    }
}

import { PermanentError, stageName, TransientError } from '@pagesmith/sdk';
import type { CallContext, ExtractedContent, ExtractInput } from '@pagesmith/sdk';
import { defaultStagePolicies, isRetryable, StageRunner } from '../../src/services/stage-runner';
import { StageTimeoutError } from '../../src/errors/stage-timeout.error';
import { fakeCollaborators, FakeCollaborators, sampleContent } from '../helpers/fakes';

const input: ExtractInput = { url: 'https://example.com/post', extractImages: true, extractLinks: true };
const timeouts = { extract: 1000, analyze: 1000, write: 1000, publish: 1000 };
const backoff = { initialIntervalMs: 10, multiplier: 2, maxIntervalMs: 100, jitterRatio: 0 };

describe('StageRunner', () => {
    let wait: jest.Mock<Promise<void>, [number]>;
    let runner: StageRunner;
    let collaborators: FakeCollaborators;

    beforeEach(() => {
        wait = jest.fn(async (_ms: number): Promise<void> => undefined);
        runner = new StageRunner(defaultStagePolicies(timeouts, 3, backoff), wait);
        collaborators = fakeCollaborators();
    });

    it('returns the validated output on first success', async () => {
        const result = await runner.run(stageName.EXTRACT, input, collaborators.extract, 'task-1');

        expect(result).toEqual({ success: true, stage: 'extract', output: sampleContent, attempts: 1 });
        expect(wait).not.toHaveBeenCalled();
        expect(collaborators.extract.mock.calls[0][0]).toEqual(input);
        expect(collaborators.extract.mock.calls[0][1].taskId).toBe('task-1');
    });

    it('retries transient failures with backoff', async () => {
        collaborators.extract.mockRejectedValueOnce(new TransientError('connection reset'));

        const result = await runner.run(stageName.EXTRACT, input, collaborators.extract, 'task-1');

        expect(result).toEqual({ success: true, stage: 'extract', output: sampleContent, attempts: 2 });
        expect(wait.mock.calls).toEqual([[10]]);
        expect(collaborators.extract.mock.calls.map(([, ctx]) => ctx.attempt)).toEqual([1, 2]);
    });

    it('stops on the first permanent failure', async () => {
        collaborators.extract.mockRejectedValue(new PermanentError('page not found'));

        const result = await runner.run(stageName.EXTRACT, input, collaborators.extract, 'task-1');

        expect(result).toEqual({
            success: false,
            stage: 'extract',
            reason: 'StagePermanentFailure',
            message: 'page not found',
            attempts: 1,
        });
        expect(collaborators.extract).toHaveBeenCalledTimes(1);
        expect(wait).not.toHaveBeenCalled();
    });

    it('treats unclassified errors as permanent', async () => {
        collaborators.extract.mockRejectedValue(new Error('undefined is not a function'));

        const result = await runner.run(stageName.EXTRACT, input, collaborators.extract, 'task-1');

        expect(result.success).toBe(false);
        expect(result.attempts).toBe(1);
        expect(collaborators.extract).toHaveBeenCalledTimes(1);
    });

    it('reports exhaustion with the last error after maxAttempts', async () => {
        collaborators.extract
            .mockRejectedValueOnce(new TransientError('503 once'))
            .mockRejectedValueOnce(new TransientError('503 twice'))
            .mockRejectedValueOnce(new TransientError('503 thrice'));

        const result = await runner.run(stageName.EXTRACT, input, collaborators.extract, 'task-1');

        expect(result).toEqual({
            success: false,
            stage: 'extract',
            reason: 'StageExhausted',
            message: '503 thrice',
            attempts: 3,
        });
        expect(wait.mock.calls).toEqual([[10], [20]]);
    });

    it('times out attempts and aborts their signal', async () => {
        const signals: AbortSignal[] = [];
        const hang = jest.fn((_input: ExtractInput, ctx: CallContext) => {
            signals.push(ctx.signal);
            return new Promise<ExtractedContent>(() => undefined);
        });
        const policy = { maxAttempts: 2, timeoutMs: 20, backoff };

        const result = await runner.run(stageName.EXTRACT, input, hang, 'task-1', policy);

        expect(result).toEqual({
            success: false,
            stage: 'extract',
            reason: 'StageExhausted',
            message: 'Stage extract timed out after 20ms',
            attempts: 2,
        });
        expect(signals.map(signal => signal.aborted)).toEqual([true, true]);
    });

    it('fails permanently when the output does not match the stage schema', async () => {
        collaborators.extract.mockResolvedValue({ ...sampleContent, body: '' });

        const result = await runner.run(stageName.EXTRACT, input, collaborators.extract, 'task-1');

        expect(result).toEqual({
            success: false,
            stage: 'extract',
            reason: 'StagePermanentFailure',
            message: 'Invalid extract output: body: extracted body is empty',
            attempts: 1,
        });
    });

    it('fails permanently when the output exceeds the payload limit', async () => {
        const policy = { maxAttempts: 3, timeoutMs: 1000, backoff, maxPayloadBytes: 100 };

        const result = await runner.run(stageName.EXTRACT, input, collaborators.extract, 'task-1', policy);

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.reason).toBe('StagePermanentFailure');
        expect(result.message).toMatch(/^Invalid extract output: Payload size exceeds maximum limit of 0\.10KB/);
    });
});

describe('isRetryable', () => {
    it('retries transient errors and timeouts only', () => {
        expect(isRetryable(new TransientError('x'))).toBe(true);
        expect(isRetryable(new StageTimeoutError(stageName.WRITE, 10))).toBe(true);
        expect(isRetryable(new PermanentError('x'))).toBe(false);
        expect(isRetryable(new Error('x'))).toBe(false);
        expect(isRetryable('x')).toBe(false);
    });
});

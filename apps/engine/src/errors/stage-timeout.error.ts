import { stageName } from '@pagesmith/sdk';

export class StageTimeoutError extends Error {
    constructor(
        public readonly stage: stageName,
        public readonly timeoutMs: number,
    ) {
        super(`Stage ${stage} timed out after ${timeoutMs}ms`);
        this.name = 'StageTimeoutError';
    }
}

/**
 * The four pipeline stages, in the only order they may ever run.
 */
export enum stageName {
    EXTRACT = 'extract',
    ANALYZE = 'analyze',
    WRITE = 'write',
    PUBLISH = 'publish',
}

export const PIPELINE_ORDER: readonly stageName[] = [
    stageName.EXTRACT,
    stageName.ANALYZE,
    stageName.WRITE,
    stageName.PUBLISH,
];

const STAGE_VALUES = new Set<string>(PIPELINE_ORDER);

export function isStageName(value: unknown): value is stageName {
    return typeof value === 'string' && STAGE_VALUES.has(value);
}

export function pipelineIndex(stage: stageName): number {
    return PIPELINE_ORDER.indexOf(stage);
}

// The stage whose output feeds `stage`, or null for the head of the pipeline.
export function upstreamOf(stage: stageName): stageName | null {
    const idx = pipelineIndex(stage);
    return idx > 0 ? PIPELINE_ORDER[idx - 1] ?? null : null;
}

export function sortByPipelineOrder(stages: readonly stageName[]): stageName[] {
    return [...stages].sort((a, b) => pipelineIndex(a) - pipelineIndex(b));
}

import { stageName } from '@pagesmith/sdk';
import type { StageInputMap, StageOutputs } from '@pagesmith/sdk';
import type { TaskParameters } from '../validation/submission';

export class MissingStageInputError extends Error {
    constructor(public readonly stage: stageName, what: string) {
        super(`Stage ${stage} has no ${what} to work from`);
        this.name = 'MissingStageInputError';
    }
}

export type StageInputBuilder<S extends stageName> = (
    parameters: TaskParameters,
    outputs: StageOutputs,
) => StageInputMap[S];

// Each stage reads its upstream output when that stage ran in the same task,
// and the explicit parameter otherwise. Submission validation guarantees
// exactly one of the two exists.
export const stageInputBuilders: { [S in stageName]: StageInputBuilder<S> } = {
    [stageName.EXTRACT]: (parameters) => {
        if (!parameters.url) throw new MissingStageInputError(stageName.EXTRACT, 'url');
        return {
            url: parameters.url,
            extractImages: parameters.extractImages,
            extractLinks: parameters.extractLinks,
        };
    },
    [stageName.ANALYZE]: (parameters, outputs) => {
        const content = outputs[stageName.EXTRACT] ?? parameters.content;
        if (!content) throw new MissingStageInputError(stageName.ANALYZE, 'content');
        return { content };
    },
    [stageName.WRITE]: (parameters, outputs) => {
        const analysis = outputs[stageName.ANALYZE] ?? parameters.analysis;
        if (!analysis) throw new MissingStageInputError(stageName.WRITE, 'analysis');
        return {
            analysis,
            style: parameters.style,
            audience: parameters.audience,
            targetLength: parameters.targetLength,
        };
    },
    [stageName.PUBLISH]: (parameters, outputs) => {
        const article = outputs[stageName.WRITE] ?? parameters.article;
        if (!article) throw new MissingStageInputError(stageName.PUBLISH, 'article');
        return {
            article,
            draftOnly: parameters.draftOnly,
            author: parameters.author,
        };
    },
};

export function buildStageInput<S extends stageName>(
    stage: S,
    parameters: TaskParameters,
    outputs: StageOutputs,
): StageInputMap[S] {
    const builder: StageInputBuilder<S> = stageInputBuilders[stage];
    return builder(parameters, outputs);
}

import { z } from 'zod';
import {
    analysisSchema,
    articleSchema,
    articleStyleSchema,
    audienceSchema,
    extractedContentSchema,
    isStageName,
    sortByPipelineOrder,
    stageName,
    upstreamOf,
} from '@pagesmith/sdk';
import type { WritingLimits } from '../config';
import { InvalidRequestError } from '../errors/task.errors';

export function createSubmissionSchema(limits: WritingLimits) {
    return z.object({
        url: z.string().url()
            .refine(value => /^https?:\/\//i.test(value), 'url must use http or https')
            .optional(),
        extractImages: z.boolean().default(true),
        extractLinks: z.boolean().default(true),
        style: articleStyleSchema.default('professional'),
        audience: audienceSchema.default('general'),
        targetLength: z.number().int()
            .min(limits.minWordCount)
            .max(limits.maxWordCount)
            .default(limits.defaultWordCount),
        author: z.string().min(1).default(limits.defaultAuthor),
        draftOnly: z.boolean().default(false),
        content: extractedContentSchema.optional(),
        analysis: analysisSchema.optional(),
        article: articleSchema.optional(),
    }).strict();
}

export type TaskParameters = z.infer<ReturnType<typeof createSubmissionSchema>>;

// Parameter that stands in for a stage's input when the stage runs without
// its upstream stage. extract has no upstream, so its url is always explicit.
export const EXPLICIT_INPUT = {
    [stageName.EXTRACT]: 'url',
    [stageName.ANALYZE]: 'content',
    [stageName.WRITE]: 'analysis',
    [stageName.PUBLISH]: 'article',
} as const satisfies Record<stageName, keyof TaskParameters>;

export interface ValidSubmission {
    stages: stageName[];
    parameters: TaskParameters;
}

export function validateSubmission(
    requestedStages: readonly string[],
    rawParameters: unknown,
    limits: WritingLimits,
): ValidSubmission {
    const issues: string[] = [];

    if (requestedStages.length === 0) {
        issues.push('at least one stage must be requested');
    }

    const seen = new Set<stageName>();
    for (const value of requestedStages) {
        if (!isStageName(value)) {
            issues.push(`unknown stage "${value}"`);
        } else if (seen.has(value)) {
            issues.push(`stage "${value}" requested more than once`);
        } else {
            seen.add(value);
        }
    }

    const parsed = createSubmissionSchema(limits).safeParse(rawParameters ?? {});
    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            issues.push(`${issue.path.join('.') || 'parameters'}: ${issue.message}`);
        }
    }

    if (issues.length > 0 || !parsed.success) {
        throw new InvalidRequestError('Invalid submission', issues);
    }

    const parameters = parsed.data;
    for (const stage of Object.values(stageName)) {
        const key = EXPLICIT_INPUT[stage];
        const upstream = upstreamOf(stage);
        const needsExplicit = seen.has(stage) && (upstream === null || !seen.has(upstream));
        const provided = parameters[key] !== undefined;

        if (needsExplicit && !provided) {
            issues.push(`stage "${stage}" requires "${key}"`);
        } else if (!needsExplicit && provided) {
            issues.push(seen.has(stage)
                ? `"${key}" conflicts with stage "${upstream}", which produces it`
                : `"${key}" is only used by stage "${stage}", which was not requested`);
        }
    }

    if (issues.length > 0) {
        throw new InvalidRequestError('Invalid submission', issues);
    }

    return { stages: sortByPipelineOrder([...seen]), parameters };
}

import { z } from 'zod';
import { stageName } from './stages';

export const articleStyleSchema = z.enum(['professional', 'casual', 'news']);
export const audienceSchema = z.enum(['general', 'technical', 'business']);
export const sentimentSchema = z.enum(['positive', 'neutral', 'negative', 'mixed']);

export type ArticleStyle = z.infer<typeof articleStyleSchema>;
export type Audience = z.infer<typeof audienceSchema>;
export type Sentiment = z.infer<typeof sentimentSchema>;

// ---- stage outputs ----

export const extractedContentSchema = z.object({
    url: z.string().url(),
    title: z.string(),
    body: z.string().min(1, 'extracted body is empty'),
    images: z.array(z.string()).default([]),
    links: z.array(z.string()).default([]),
    metadata: z.record(z.string(), z.string()).default({}),
});

export const analysisSchema = z.object({
    summary: z.string().min(1),
    keyPoints: z.array(z.string()).default([]),
    themes: z.array(z.string()).default([]),
    sentiment: sentimentSchema.default('neutral'),
    recommendations: z.array(z.string()).default([]),
});

export const articleSchema = z.object({
    title: z.string().min(1),
    content: z.string().min(1),
    summary: z.string().default(''),
    wordCount: z.number().int().nonnegative(),
    tags: z.array(z.string()).default([]),
});

export const publishReceiptSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('published'),
        platform: z.string().min(1),
        publishedId: z.string().min(1),
        url: z.string().optional(),
    }),
    z.object({
        kind: z.literal('draft'),
        platform: z.string().min(1),
        draftId: z.string().min(1),
    }),
]);

export type ExtractedContent = z.infer<typeof extractedContentSchema>;
export type Analysis = z.infer<typeof analysisSchema>;
export type Article = z.infer<typeof articleSchema>;
export type PublishReceipt = z.infer<typeof publishReceiptSchema>;

// ---- stage inputs ----

export interface ExtractInput {
    url: string;
    extractImages: boolean;
    extractLinks: boolean;
}

export interface AnalyzeInput {
    content: ExtractedContent;
}

export interface WriteInput {
    analysis: Analysis;
    style: ArticleStyle;
    audience: Audience;
    targetLength: number;
}

export interface PublishInput {
    article: Article;
    draftOnly: boolean;
    author: string;
}

export interface StageInputMap {
    [stageName.EXTRACT]: ExtractInput;
    [stageName.ANALYZE]: AnalyzeInput;
    [stageName.WRITE]: WriteInput;
    [stageName.PUBLISH]: PublishInput;
}

export interface StageOutputMap {
    [stageName.EXTRACT]: ExtractedContent;
    [stageName.ANALYZE]: Analysis;
    [stageName.WRITE]: Article;
    [stageName.PUBLISH]: PublishReceipt;
}

/** Outputs recorded so far for a task; a key is present only once its stage completed. */
export type StageOutputs = Partial<StageOutputMap>;

export const stageOutputSchemas: { [S in stageName]: z.ZodType<StageOutputMap[S], z.ZodTypeDef, unknown> } = {
    [stageName.EXTRACT]: extractedContentSchema,
    [stageName.ANALYZE]: analysisSchema,
    [stageName.WRITE]: articleSchema,
    [stageName.PUBLISH]: publishReceiptSchema,
};

import { z } from 'zod';
import { PermanentError, sentimentSchema, stageName } from '@pagesmith/sdk';
import type { Analysis, Sentiment, StageCollaborator } from '@pagesmith/sdk';
import { ChatModel, extractJsonObject } from './llm-client';

const TAG = '[analyzer]';

export const MAX_ANALYZED_CHARS = 4000;

const SYSTEM_PROMPT = `You are an expert content analyst. Identify the main themes, extract the key points, judge the overall sentiment and recommend how to build a new article from the material.

Reply with a single JSON object with exactly these keys:
{
    "summary": "string",
    "key_points": ["point1", "point2", ...],
    "themes": ["theme1", "theme2", ...],
    "sentiment": "positive | neutral | negative | mixed",
    "recommendations": ["rec1", "rec2", ...]
}`;

const stringList = z.array(z.string()).optional();

// Models mix snake and camel case; accept both.
const modelReplySchema = z.object({
    summary: z.string().trim().min(1),
    key_points: stringList,
    keyPoints: stringList,
    themes: stringList,
    sentiment: z.string().optional(),
    recommendations: stringList,
});

export function normalizeSentiment(raw: string | undefined): Sentiment {
    const text = (raw ?? '').toLowerCase();
    for (const candidate of ['mixed', 'negative', 'positive', 'neutral'] as const) {
        if (new RegExp(`\\b${candidate}\\b`).test(text)) return candidate;
    }
    return sentimentSchema.enum.neutral;
}

// Used when the reply carries no usable JSON: first sentence as the summary, the next three as key points.
export function fallbackAnalysis(reply: string, title: string): Analysis {
    const sentences = reply.split('.').map(s => s.trim()).filter(s => s.length > 0);
    return {
        summary: sentences[0] ?? `Analysis of: ${title}`,
        keyPoints: sentences.slice(1, 4),
        themes: [],
        sentiment: 'neutral',
        recommendations: [],
    };
}

export function buildAnalysisPrompt(title: string, body: string): string {
    return `Analyze the following content and provide a comprehensive analysis:

Title: ${title}

Content:
${body.slice(0, MAX_ANALYZED_CHARS)}

Provide the analysis in the specified JSON format.`;
}

export function parseAnalysis(reply: string, title: string): Analysis {
    const parsed = modelReplySchema.safeParse(extractJsonObject(reply));
    if (!parsed.success) {
        console.warn(`${TAG} reply held no usable JSON, using fallback analysis`);
        return fallbackAnalysis(reply, title);
    }

    const data = parsed.data;
    return {
        summary: data.summary,
        keyPoints: data.key_points ?? data.keyPoints ?? [],
        themes: data.themes ?? [],
        sentiment: normalizeSentiment(data.sentiment),
        recommendations: data.recommendations ?? [],
    };
}

export function createOpenAIAnalyzer(model: ChatModel): StageCollaborator<stageName.ANALYZE> {
    return async ({ content }, { signal, taskId }) => {
        console.log(`${TAG} task ${taskId} analyzing "${content.title.slice(0, 50)}"`);

        const reply = await model.complete({
            system: SYSTEM_PROMPT,
            prompt: buildAnalysisPrompt(content.title, content.body),
            signal,
        });

        if (!reply.trim()) {
            throw new PermanentError('Model returned an empty analysis');
        }
        return parseAnalysis(reply, content.title);
    };
}

import { z } from 'zod';
import { PermanentError, stageName } from '@pagesmith/sdk';
import type { Analysis, Article, ArticleStyle, Audience, StageCollaborator, WriteInput } from '@pagesmith/sdk';
import { ChatModel, extractJsonObject } from './llm-client';

const TAG = '[writer]';

interface StyleTemplate {
    tone: string;
    structure: string;
    language: string;
    features: string;
}

export const STYLE_TEMPLATES: Record<ArticleStyle, StyleTemplate> = {
    professional: {
        tone: 'formal and authoritative',
        structure: 'well-organized with clear sections',
        language: 'precise, with correct technical terminology',
        features: 'data-driven, objective, evidence-based',
    },
    casual: {
        tone: 'friendly and conversational',
        structure: 'flexible and engaging',
        language: 'everyday language with relatable examples',
        features: 'personal anecdotes, light humor, accessibility',
    },
    news: {
        tone: 'objective and factual',
        structure: 'inverted pyramid, most important first',
        language: 'clear, concise and neutral',
        features: 'who, what, when, where, why and how',
    },
};

export const AUDIENCE_PROFILES: Record<Audience, string> = {
    general: 'general public with varied backgrounds and interests',
    technical: 'technical professionals with specialized knowledge',
    business: 'business professionals focused on practical applications',
};

const SYSTEM_PROMPT = `You are an expert content writer and editor. Write engaging, well-structured articles from a content analysis, matching the requested style, audience and length.

Reply with a single JSON object:
{
    "title": "Compelling article title",
    "content": "Full article text; separate paragraphs with a blank line and mark headings with #",
    "summary": "Two or three sentence summary",
    "tags": ["tag1", "tag2", ...]
}`;

const modelReplySchema = z.object({
    title: z.string().trim().min(1).optional(),
    content: z.string().optional(),
    summary: z.string().optional(),
    tags: z.array(z.string()).optional(),
});

const CJK = /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/g;

// Each CJK character counts as a word; everything else is split on whitespace.
export function countWords(text: string): number {
    const cjk = text.match(CJK)?.length ?? 0;
    const words = text.replace(CJK, ' ').split(/\s+/).filter(w => w.length > 0).length;
    return cjk + words;
}

export function buildWritingPrompt({ analysis, style, audience, targetLength }: WriteInput): string {
    const template = STYLE_TEMPLATES[style];
    return `Based on the following content analysis, write a complete article.

ANALYSIS:
Summary: ${analysis.summary}
Key Points: ${analysis.keyPoints.join(', ')}
Themes: ${analysis.themes.join(', ')}
Recommendations: ${analysis.recommendations.join(', ')}

WRITING REQUIREMENTS:
- Style: ${style} (${template.tone})
- Structure: ${template.structure}
- Language: ${template.language}
- Features: ${template.features}
- Target Audience: ${AUDIENCE_PROFILES[audience]}
- Target Word Count: ${targetLength} words

The article needs a compelling title, an introduction, a body covering every key point and a conclusion.
Provide the output in the specified JSON format.`;
}

export function fallbackArticle(reply: string, analysis: Analysis): Article {
    const lines = reply.split('\n').map(line => line.trim()).filter(line => line.length > 0);
    let title = lines[0] ?? analysis.summary.slice(0, 100);
    title = title.replace(/^#+\s*/, '');
    if (title.toLowerCase().startsWith('title:')) {
        title = title.slice('title:'.length).trim();
    }

    return {
        title: title || 'Untitled Article',
        content: reply,
        summary: analysis.summary.slice(0, 200),
        wordCount: countWords(reply),
        tags: analysis.themes.slice(0, 5),
    };
}

export function parseArticle(reply: string, analysis: Analysis): Article {
    const parsed = modelReplySchema.safeParse(extractJsonObject(reply));
    const data = parsed.success ? parsed.data : undefined;
    if (!data?.content) {
        console.warn(`${TAG} reply held no usable JSON, using the raw text as the article`);
        return fallbackArticle(reply, analysis);
    }

    return {
        title: data.title ?? 'Untitled Article',
        content: data.content,
        summary: data.summary ?? analysis.summary.slice(0, 200),
        wordCount: countWords(data.content),
        tags: data.tags ?? analysis.themes.slice(0, 5),
    };
}

export function createOpenAIWriter(model: ChatModel): StageCollaborator<stageName.WRITE> {
    return async (input, { signal, taskId }) => {
        console.log(`${TAG} task ${taskId} writing (style=${input.style}, audience=${input.audience}, words=${input.targetLength})`);

        const reply = await model.complete({ system: SYSTEM_PROMPT, prompt: buildWritingPrompt(input), signal });
        if (!reply.trim()) {
            throw new PermanentError('Model returned an empty article');
        }

        const article = parseArticle(reply, input.analysis);
        console.log(`${TAG} task ${taskId} wrote "${article.title}" (${article.wordCount} words)`);
        return article;
    };
}

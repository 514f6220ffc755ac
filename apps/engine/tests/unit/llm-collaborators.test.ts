import OpenAI from 'openai';
import { PermanentError, TransientError } from '@pagesmith/sdk';
import type { Analysis } from '@pagesmith/sdk';
import { ChatRequest, classifyLlmError, extractJsonObject, OpenAIChatModel } from '../../src/collaborators/llm-client';
import { createOpenAIAnalyzer, fallbackAnalysis, normalizeSentiment } from '../../src/collaborators/openai-analyzer';
import { buildWritingPrompt, countWords, createOpenAIWriter } from '../../src/collaborators/openai-writer';
import { loadConfig } from '../../src/config';
import { callContext, sampleAnalysis, sampleContent } from '../helpers/fakes';

function fakeModel(reply: string) {
    return { complete: jest.fn(async (_request: ChatRequest) => reply) };
}

describe('extractJsonObject', () => {
    it('pulls the outermost object out of surrounding prose', () => {
        expect(extractJsonObject('Sure!\n{"a": {"b": 1}}\nDone.')).toEqual({ a: { b: 1 } });
    });

    it('returns undefined when there is no parsable object', () => {
        expect(extractJsonObject('no braces')).toBeUndefined();
        expect(extractJsonObject('{not json}')).toBeUndefined();
    });
});

describe('classifyLlmError', () => {
    it('retries server errors, connection failures and aborts', () => {
        expect(classifyLlmError(new OpenAI.APIError(503, undefined, 'busy', undefined))).toBeInstanceOf(TransientError);
        expect(classifyLlmError(new OpenAI.APIError(429, undefined, 'slow down', undefined))).toBeInstanceOf(TransientError);
        expect(classifyLlmError(new OpenAI.APIConnectionError({ message: 'socket hang up' }))).toBeInstanceOf(TransientError);
        expect(classifyLlmError(new OpenAI.APIUserAbortError())).toBeInstanceOf(TransientError);
    });

    it('does not retry rejected requests or unknown failures', () => {
        expect(classifyLlmError(new OpenAI.APIError(400, undefined, 'bad request', undefined))).toBeInstanceOf(PermanentError);
        expect(classifyLlmError(new OpenAI.APIError(401, undefined, 'bad key', undefined))).toBeInstanceOf(PermanentError);
        expect(classifyLlmError(new Error('oops')).message).toBe('LLM request failed: oops');
    });
});

describe('OpenAIChatModel', () => {
    it('fails permanently without an API key', async () => {
        const model = new OpenAIChatModel(loadConfig({}).llm);

        await expect(model.complete({ system: 's', prompt: 'p', signal: new AbortController().signal }))
            .rejects.toEqual(new PermanentError('LLM_API_KEY is not configured'));
    });
});

describe('createOpenAIAnalyzer', () => {
    it('maps a JSON reply onto an analysis', async () => {
        const model = fakeModel('Here you go:\n' + JSON.stringify({
            summary: 'Sum',
            key_points: ['a', 'b'],
            themes: ['t'],
            sentiment: 'Positive and upbeat',
            recommendations: ['r'],
        }) + '\nThanks');
        const ctx = callContext();

        const analysis = await createOpenAIAnalyzer(model)({ content: sampleContent }, ctx);

        expect(analysis).toEqual({
            summary: 'Sum',
            keyPoints: ['a', 'b'],
            themes: ['t'],
            sentiment: 'positive',
            recommendations: ['r'],
        });
        expect(model.complete.mock.calls[0][0].signal).toBe(ctx.signal);
    });

    it('fills missing lists and sentiment with defaults', async () => {
        const model = fakeModel('{"summary": "Only a summary", "keyPoints": ["camel"]}');

        expect(await createOpenAIAnalyzer(model)({ content: sampleContent }, callContext())).toEqual({
            summary: 'Only a summary',
            keyPoints: ['camel'],
            themes: [],
            sentiment: 'neutral',
            recommendations: [],
        });
    });

    it('falls back to sentences when the reply is prose', async () => {
        const model = fakeModel('The article is about rust. It covers ownership. It covers borrowing. It covers lifetimes. It ends.');

        expect(await createOpenAIAnalyzer(model)({ content: sampleContent }, callContext())).toEqual({
            summary: 'The article is about rust',
            keyPoints: ['It covers ownership', 'It covers borrowing', 'It covers lifetimes'],
            themes: [],
            sentiment: 'neutral',
            recommendations: [],
        });
    });

    it('truncates long bodies in the prompt', async () => {
        const model = fakeModel('{"summary": "s"}');

        await createOpenAIAnalyzer(model)({ content: { ...sampleContent, body: 'x'.repeat(5000) } }, callContext());

        const prompt = model.complete.mock.calls[0][0].prompt;
        expect(prompt).toContain('x'.repeat(4000));
        expect(prompt).not.toContain('x'.repeat(4001));
    });

    it('fails permanently on an empty reply', async () => {
        await expect(createOpenAIAnalyzer(fakeModel('  \n'))({ content: sampleContent }, callContext()))
            .rejects.toEqual(new PermanentError('Model returned an empty analysis'));
    });
});

describe('normalizeSentiment', () => {
    it('finds the sentiment word in free text', () => {
        expect(normalizeSentiment('Mostly NEGATIVE')).toBe('negative');
        expect(normalizeSentiment('mixed, leaning positive')).toBe('mixed');
        expect(normalizeSentiment('upbeat')).toBe('neutral');
        expect(normalizeSentiment(undefined)).toBe('neutral');
    });
});

describe('fallbackAnalysis', () => {
    it('summarises by title when the reply has no sentences', () => {
        expect(fallbackAnalysis('...', 'Example Post').summary).toBe('Analysis of: Example Post');
    });
});

describe('countWords', () => {
    it('counts CJK characters one by one and other words by whitespace', () => {
        expect(countWords('Rust is fast. 内存安全')).toBe(7);
        expect(countWords('   ')).toBe(0);
    });
});

describe('createOpenAIWriter', () => {
    const input = { analysis: sampleAnalysis, style: 'news' as const, audience: 'business' as const, targetLength: 800 };

    it('maps a JSON reply onto an article and counts its words', async () => {
        const content = '# Intro\n\nRust is fast. 内存安全';
        const model = fakeModel(JSON.stringify({ title: 'Rust in Practice', content, summary: 'S', tags: ['rust'] }));

        expect(await createOpenAIWriter(model)(input, callContext())).toEqual({
            title: 'Rust in Practice',
            content,
            summary: 'S',
            wordCount: 9,
            tags: ['rust'],
        });
    });

    it('fills a missing title, summary and tags', async () => {
        const model = fakeModel(JSON.stringify({ content: 'Short body.' }));

        expect(await createOpenAIWriter(model)(input, callContext())).toEqual({
            title: 'Untitled Article',
            content: 'Short body.',
            summary: 'A post about examples.',
            wordCount: 2,
            tags: ['testing'],
        });
    });

    it('uses the raw reply when it holds no JSON', async () => {
        const reply = 'Title: Plain Words\nBody line one.\nBody line two.';
        const analysis: Analysis = { ...sampleAnalysis, themes: ['a', 'b', 'c', 'd', 'e', 'f'] };

        expect(await createOpenAIWriter(fakeModel(reply))({ ...input, analysis }, callContext())).toEqual({
            title: 'Plain Words',
            content: reply,
            summary: 'A post about examples.',
            wordCount: 9,
            tags: ['a', 'b', 'c', 'd', 'e'],
        });
    });

    it('strips markdown heading marks from a fallback title', async () => {
        const article = await createOpenAIWriter(fakeModel('## The Heading\n\nText.'))(input, callContext());
        expect(article.title).toBe('The Heading');
    });

    it('fails permanently on an empty reply', async () => {
        await expect(createOpenAIWriter(fakeModel(''))(input, callContext()))
            .rejects.toEqual(new PermanentError('Model returned an empty article'));
    });

    it('puts the style, audience and length into the prompt', () => {
        const prompt = buildWritingPrompt(input);

        expect(prompt).toContain('- Style: news (objective and factual)');
        expect(prompt).toContain('- Target Audience: business professionals focused on practical applications');
        expect(prompt).toContain('- Target Word Count: 800 words');
        expect(prompt).toContain('Key Points: examples matter');
    });
});

import OpenAI from 'openai';
import { PermanentError, TransientError } from '@pagesmith/sdk';
import type { LlmConfig } from '../config';
import { isTransientStatus } from './classify';

const TAG = '[llm]';

export interface ChatRequest {
    system: string;
    prompt: string;
    signal: AbortSignal;
}

export interface ChatModel {
    complete(request: ChatRequest): Promise<string>;
}

export function classifyLlmError(err: unknown): TransientError | PermanentError {
    if (err instanceof OpenAI.APIUserAbortError) {
        return new TransientError('LLM request was aborted', { cause: err });
    }
    if (err instanceof OpenAI.APIError) {
        // connection failures carry no status
        if (err.status === undefined || isTransientStatus(err.status)) {
            return new TransientError(`LLM request failed: ${err.message}`, { cause: err });
        }
        return new PermanentError(`LLM request rejected: ${err.message}`, { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new PermanentError(`LLM request failed: ${message}`, { cause: err });
}

// OpenAI-compatible chat completions. Retries belong to the stage runner, so
// the SDK's own retry loop is switched off.
export class OpenAIChatModel implements ChatModel {
    private readonly client: OpenAI | null;

    constructor(private readonly config: LlmConfig, client?: OpenAI) {
        this.client = client ?? (config.apiKey
            ? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 })
            : null);
    }

    async complete({ system, prompt, signal }: ChatRequest): Promise<string> {
        if (!this.client) {
            throw new PermanentError('LLM_API_KEY is not configured');
        }

        let completion: OpenAI.Chat.ChatCompletion;
        try {
            completion = await this.client.chat.completions.create(
                {
                    model: this.config.model,
                    temperature: this.config.temperature,
                    max_tokens: this.config.maxTokens,
                    messages: [
                        { role: 'system', content: system },
                        { role: 'user', content: prompt },
                    ],
                },
                { signal },
            );
        } catch (err) {
            throw classifyLlmError(err);
        }

        const choice = completion.choices[0];
        if (choice?.finish_reason === 'length') {
            console.warn(`${TAG} reply from ${this.config.model} was cut off at ${this.config.maxTokens} tokens`);
        }
        return choice?.message.content ?? '';
    }
}

// The JSON object between the first '{' and the last '}' of a model reply, if it parses.
export function extractJsonObject(text: string): unknown {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) return undefined;

    try {
        return JSON.parse(text.slice(start, end + 1));
    } catch {
        return undefined;
    }
}

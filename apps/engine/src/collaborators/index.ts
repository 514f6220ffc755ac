import type { Collaborators } from '@pagesmith/sdk';
import type { EngineConfig } from '../config';
import { FetchLike } from './classify';
import { createHttpExtractor } from './http-extractor';
import { ChatModel, OpenAIChatModel } from './llm-client';
import { createOpenAIAnalyzer } from './openai-analyzer';
import { createOpenAIWriter } from './openai-writer';
import { WechatPublisher } from './wechat-publisher';

export { createHttpExtractor } from './http-extractor';
export { createOpenAIAnalyzer } from './openai-analyzer';
export { createOpenAIWriter } from './openai-writer';
export { WechatPublisher } from './wechat-publisher';
export { OpenAIChatModel } from './llm-client';
export type { ChatModel, ChatRequest } from './llm-client';
export type { FetchLike } from './classify';

export interface DefaultCollaboratorOptions {
    fetchImpl?: FetchLike;
    chatModel?: ChatModel;
}

export function createDefaultCollaborators(config: EngineConfig, options: DefaultCollaboratorOptions = {}): Collaborators {
    const model = options.chatModel ?? new OpenAIChatModel(config.llm);
    const publisher = new WechatPublisher(config.wechat, options.fetchImpl);

    if (!config.llm.apiKey && !options.chatModel) {
        console.warn('[collaborators] LLM_API_KEY is not set; analyze and write stages will fail');
    }
    if (!config.wechat.appId || !config.wechat.appSecret) {
        console.warn('[collaborators] WeChat credentials are not set; publish stage will fail');
    }

    return {
        extract: createHttpExtractor({ userAgent: config.crawlerUserAgent, fetchImpl: options.fetchImpl }),
        analyze: createOpenAIAnalyzer(model),
        write: createOpenAIWriter(model),
        publish: publisher.publish,
    };
}

import { stageName } from '@pagesmith/sdk';
import type { BackoffPolicy } from './utils/backoff';

export interface WritingLimits {
    minWordCount: number;
    maxWordCount: number;
    defaultWordCount: number;
    defaultAuthor: string;
}

export interface LlmConfig {
    apiKey: string | undefined;
    baseUrl: string;
    model: string;
    temperature: number;
    maxTokens: number;
}

export interface WechatConfig {
    appId: string | undefined;
    appSecret: string | undefined;
    thumbMediaId: string | undefined;
}

export interface EngineConfig {
    port: number;
    poolSize: number;
    maxQueueSize: number;
    maxEventLoopLag: number;
    stageMaxAttempts: number;
    backoff: BackoffPolicy;
    stageTimeouts: Record<stageName, number>;
    taskTimeoutSeconds: number;
    taskRetentionSeconds: number;
    maxTasks: number;
    reaperInterval: number;
    shutdownDeadlineMs: number;
    writing: WritingLimits;
    crawlerUserAgent: string;
    llm: LlmConfig;
    wechat: WechatConfig;
}

type Env = Record<string, string | undefined>;

function int(env: Env, key: string, fallback: number): number {
    const value = parseInt(env[key] || String(fallback), 10);
    if (Number.isNaN(value)) {
        throw new Error(`${key} must be an integer, got "${env[key]}"`);
    }
    return value;
}

function float(env: Env, key: string, fallback: number): number {
    const value = parseFloat(env[key] || String(fallback));
    if (Number.isNaN(value)) {
        throw new Error(`${key} must be a number, got "${env[key]}"`);
    }
    return value;
}

function optional(env: Env, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

// Central configuration. Reads the given env (process.env by default); the
// entry point loads .env through dotenv before calling this.
export function loadConfig(env: Env = process.env): EngineConfig {
    const config: EngineConfig = {
        port: int(env, 'PORT', 50051),
        poolSize: int(env, 'POOL_SIZE', 4),
        maxQueueSize: int(env, 'MAX_QUEUE_SIZE', 1000),
        maxEventLoopLag: int(env, 'MAX_EVENT_LOOP_LAG', 100),
        stageMaxAttempts: int(env, 'STAGE_MAX_ATTEMPTS', 3),
        backoff: {
            initialIntervalMs: int(env, 'BACKOFF_INITIAL_MS', 1000),
            multiplier: float(env, 'BACKOFF_MULTIPLIER', 4),
            maxIntervalMs: int(env, 'BACKOFF_MAX_MS', 60_000),
            jitterRatio: 0.1,
        },
        stageTimeouts: {
            [stageName.EXTRACT]: int(env, 'EXTRACT_TIMEOUT_MS', 30_000),
            [stageName.ANALYZE]: int(env, 'ANALYZE_TIMEOUT_MS', 120_000),
            [stageName.WRITE]: int(env, 'WRITE_TIMEOUT_MS', 300_000),
            [stageName.PUBLISH]: int(env, 'PUBLISH_TIMEOUT_MS', 60_000),
        },
        taskTimeoutSeconds: int(env, 'TASK_TIMEOUT_SECONDS', 600),
        taskRetentionSeconds: int(env, 'TASK_RETENTION_SECONDS', 3600),
        maxTasks: int(env, 'MAX_TASKS', 10_000),
        reaperInterval: int(env, 'REAPER_INTERVAL', 60_000),
        shutdownDeadlineMs: int(env, 'SHUTDOWN_DEADLINE_MS', 30_000),
        writing: {
            minWordCount: int(env, 'MIN_WORD_COUNT', 300),
            maxWordCount: int(env, 'MAX_WORD_COUNT', 5000),
            defaultWordCount: int(env, 'DEFAULT_WORD_COUNT', 1000),
            defaultAuthor: optional(env, 'DEFAULT_AUTHOR') ?? 'Pagesmith',
        },
        crawlerUserAgent: optional(env, 'CRAWLER_USER_AGENT')
            ?? 'Mozilla/5.0 (compatible; Pagesmith/0.1; +https://example.com/bot)',
        llm: {
            apiKey: optional(env, 'LLM_API_KEY'),
            baseUrl: optional(env, 'LLM_BASE_URL') ?? 'https://dashscope.aliyuncs.com/compatible-mode/v1',
            model: optional(env, 'LLM_MODEL') ?? 'qwen-turbo',
            temperature: float(env, 'LLM_TEMPERATURE', 0.7),
            maxTokens: int(env, 'LLM_MAX_TOKENS', 4000),
        },
        wechat: {
            appId: optional(env, 'WECHAT_APP_ID'),
            appSecret: optional(env, 'WECHAT_APP_SECRET'),
            thumbMediaId: optional(env, 'WECHAT_THUMB_MEDIA_ID'),
        },
    };

    validate(config);
    return config;
}

// setTimeout fires almost at once for anything larger
const MAX_TIMER_MS = 2_147_483_647;

function validate(config: EngineConfig): void {
    if (config.poolSize < 1) throw new Error('POOL_SIZE must be at least 1');
    if (config.maxQueueSize < 0) throw new Error('MAX_QUEUE_SIZE cannot be negative');
    if (config.stageMaxAttempts < 1) throw new Error('STAGE_MAX_ATTEMPTS must be at least 1');

    const { minWordCount, maxWordCount, defaultWordCount } = config.writing;
    if (minWordCount > maxWordCount) {
        throw new Error(`MIN_WORD_COUNT (${minWordCount}) exceeds MAX_WORD_COUNT (${maxWordCount})`);
    }
    if (defaultWordCount < minWordCount || defaultWordCount > maxWordCount) {
        throw new Error(`DEFAULT_WORD_COUNT (${defaultWordCount}) must lie within ${minWordCount}-${maxWordCount}`);
    }

    for (const [stage, timeout] of Object.entries(config.stageTimeouts)) {
        if (timeout <= 0) throw new Error(`timeout for stage ${stage} must be positive`);
        if (timeout > MAX_TIMER_MS) throw new Error(`timeout for stage ${stage} cannot exceed ${MAX_TIMER_MS}ms`);
    }
}

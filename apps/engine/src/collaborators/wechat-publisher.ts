import { z } from 'zod';
import { PermanentError, stageName, TransientError } from '@pagesmith/sdk';
import type { Article, StageCollaborator } from '@pagesmith/sdk';
import type { WechatConfig } from '../config';
import { FetchLike, httpStatusError, networkError } from './classify';

const TAG = '[wechat]';

export const WECHAT_API = 'https://api.weixin.qq.com/cgi-bin';
export const MAX_DIGEST_LENGTH = 120;

// errcodes worth another attempt: system busy, rate limited, stale token
const TRANSIENT_ERRCODES = new Set([-1, 45009, 40001, 40014, 42001]);
const TOKEN_ERRCODES = new Set([40001, 40014, 42001]);

const wechatResponseSchema = z.object({
    errcode: z.number().optional(),
    errmsg: z.string().optional(),
    access_token: z.string().optional(),
    expires_in: z.number().optional(),
    media_id: z.string().optional(),
    publish_id: z.union([z.string(), z.number()]).optional(),
}).passthrough();

type WechatResponse = z.infer<typeof wechatResponseSchema>;

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

// Blank-line separated blocks become <p>, "# " / "## " / "### " blocks become headings.
export function formatContentForWechat(content: string): string {
    const parts: string[] = [];
    for (const block of content.split('\n\n')) {
        const para = block.trim();
        if (!para) continue;

        const heading = para.match(/^(#{1,3}) (.*)$/s);
        if (heading?.[1] && heading[2] !== undefined) {
            const level = heading[1].length;
            parts.push(`<h${level}>${escapeHtml(heading[2].trim())}</h${level}>`);
        } else {
            parts.push(`<p>${escapeHtml(para).replace(/\n/g, '<br>')}</p>`);
        }
    }
    return `<section style="font-size: 16px; line-height: 1.6; color: #333;">\n${parts.join('\n')}\n</section>`;
}

export function buildDigest(article: Article): string {
    return (article.summary || article.title).slice(0, MAX_DIGEST_LENGTH);
}

/**
 * Publishes articles to a WeChat Official Account. Credentials are bound at
 * construction; a publisher without them fails every call permanently.
 */
export class WechatPublisher {
    private token: { value: string; expiresAt: number } | null = null;

    constructor(
        private readonly config: WechatConfig,
        private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init),
        private readonly now: () => number = Date.now,
    ) { }

    readonly publish: StageCollaborator<stageName.PUBLISH> = async ({ article, draftOnly, author }, { signal, taskId }) => {
        const { appId, appSecret } = this.config;
        if (!appId || !appSecret) {
            throw new PermanentError('WeChat is not configured: set WECHAT_APP_ID and WECHAT_APP_SECRET');
        }

        console.log(`${TAG} task ${taskId} ${draftOnly ? 'saving draft' : 'publishing'} "${article.title.slice(0, 50)}"`);

        const token = await this.accessToken(appId, appSecret, signal);
        const draft = await this.call(`${WECHAT_API}/draft/add?access_token=${encodeURIComponent(token)}`, signal, {
            articles: [{
                title: article.title,
                author,
                digest: buildDigest(article),
                content: formatContentForWechat(article.content),
                ...(this.config.thumbMediaId ? { thumb_media_id: this.config.thumbMediaId } : {}),
            }],
        });
        if (!draft.media_id) {
            throw new PermanentError('WeChat draft/add returned no media_id');
        }

        if (draftOnly) {
            return { kind: 'draft', platform: 'wechat', draftId: draft.media_id };
        }

        const published = await this.call(`${WECHAT_API}/freepublish/submit?access_token=${encodeURIComponent(token)}`, signal, {
            media_id: draft.media_id,
        });
        if (published.publish_id === undefined) {
            throw new PermanentError('WeChat freepublish/submit returned no publish_id');
        }

        return { kind: 'published', platform: 'wechat', publishedId: String(published.publish_id) };
    };

    private async accessToken(appId: string, appSecret: string, signal: AbortSignal): Promise<string> {
        if (this.token && this.token.expiresAt > this.now()) {
            return this.token.value;
        }

        const query = new URLSearchParams({ grant_type: 'client_credential', appid: appId, secret: appSecret });
        const body = await this.call(`${WECHAT_API}/token?${query.toString()}`, signal);
        if (!body.access_token) {
            throw new PermanentError('WeChat token endpoint returned no access_token');
        }

        // refresh a minute before WeChat expires it
        const ttlSeconds = body.expires_in ?? 7200;
        this.token = { value: body.access_token, expiresAt: this.now() + (ttlSeconds - 60) * 1000 };
        return body.access_token;
    }

    private async call(url: string, signal: AbortSignal, payload?: unknown): Promise<WechatResponse> {
        const endpoint = url.slice(WECHAT_API.length).split('?')[0];
        let response: Response;
        let raw: unknown;
        try {
            response = await this.fetchImpl(url, payload === undefined
                ? { method: 'GET', signal }
                : {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(payload),
                    signal,
                });
        } catch (err) {
            throw networkError(err, `WeChat ${endpoint}`);
        }

        if (!response.ok) {
            throw httpStatusError(response.status, `WeChat ${endpoint}`);
        }

        try {
            raw = await response.json();
        } catch (err) {
            throw new PermanentError(`WeChat ${endpoint} returned invalid JSON`, { cause: err });
        }

        const parsed = wechatResponseSchema.safeParse(raw);
        if (!parsed.success) {
            throw new PermanentError(`WeChat ${endpoint} returned an unexpected body`);
        }

        const { errcode, errmsg } = parsed.data;
        if (errcode !== undefined && errcode !== 0) {
            const message = `WeChat ${endpoint} failed: ${errcode} ${errmsg ?? ''}`.trim();
            if (TOKEN_ERRCODES.has(errcode)) {
                this.token = null;
            }
            if (TRANSIENT_ERRCODES.has(errcode)) {
                console.warn(`${TAG} ${message}`);
                throw new TransientError(message);
            }
            throw new PermanentError(message);
        }

        return parsed.data;
    }
}

import { PermanentError, stageName } from '@pagesmith/sdk';
import type { ExtractedContent, StageCollaborator } from '@pagesmith/sdk';
import { FetchLike, httpStatusError, networkError } from './classify';
import { parsePage } from './html';

const TAG = '[extractor]';

export interface HttpExtractorOptions {
    userAgent: string;
    fetchImpl?: FetchLike;
}

export function createHttpExtractor(options: HttpExtractorOptions): StageCollaborator<stageName.EXTRACT> {
    const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));

    return async ({ url, extractImages, extractLinks }, { signal, attempt }): Promise<ExtractedContent> => {
        console.log(`${TAG} fetching ${url} (attempt ${attempt})`);

        let response: Response;
        let html: string;
        try {
            response = await fetchImpl(url, {
                headers: {
                    'User-Agent': options.userAgent,
                    Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
                },
                redirect: 'follow',
                signal,
            });
        } catch (err) {
            throw networkError(err, `Fetching ${url}`);
        }

        if (!response.ok) {
            throw httpStatusError(response.status, `Fetching ${url}`);
        }

        const contentType = response.headers.get('content-type') || 'text/html';
        if (!contentType.includes('text/html') && !contentType.includes('application/xhtml+xml')) {
            throw new PermanentError(`Unsupported content type at ${url}: ${contentType}`);
        }

        try {
            html = await response.text();
        } catch (err) {
            throw networkError(err, `Reading ${url}`);
        }

        const page = parsePage(html, response.url || url);
        if (!page.body) {
            throw new PermanentError(`No readable content at ${url}`);
        }

        console.log(`${TAG} extracted "${page.title}" (${page.body.length} chars, ${page.images.length} images, ${page.links.length} links)`);

        return {
            url,
            title: page.title,
            body: page.body,
            images: extractImages ? page.images : [],
            links: extractLinks ? page.links : [],
            metadata: page.metadata,
        };
    };
}

/**
 * Regex-level HTML reading for the page extractor. Good enough for article
 * pages; not a DOM.
 */

export interface ParsedPage {
    title: string;
    body: string;
    images: string[];
    links: string[];
    metadata: Record<string, string>;
}

const NOISE_TAGS = ['script', 'style', 'nav', 'header', 'footer', 'aside', 'iframe', 'noscript'];

// Substrings that mark tracking pixels, icons and spacers rather than content images.
const IMAGE_EXCLUDES = ['1x1', 'pixel', 'tracker', 'beacon', 'icon', 'favicon', 'logo', 'blank.gif', 'transparent.png'];
const IMAGE_EXTENSION = /\.(jpe?g|png|gif|webp|svg|bmp|avif)(\?|#|$)/i;

const ENTITIES: Record<string, string> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&apos;': "'",
    '&nbsp;': ' ',
    '&mdash;': '\u2014',
    '&ndash;': '\u2013',
    '&hellip;': '\u2026',
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePoint(codePoint: number): string {
    return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : '\uFFFD';
}

export function decodeHtmlEntities(text: string): string {
    return text.replace(/&#x([0-9a-f]+);|&#(\d+);|&[a-z]+;/gi, (match, hex?: string, dec?: string) => {
        if (hex) return fromCodePoint(parseInt(hex, 16));
        if (dec) return fromCodePoint(parseInt(dec, 10));
        return ENTITIES[match.toLowerCase()] ?? match;
    });
}

function stripTags(html: string): string {
    return decodeHtmlEntities(html.replace(/<[^>]+>/g, ' ')).replace(/\s+/g, ' ').trim();
}

export function getAttribute(tag: string, name: string): string | undefined {
    const match = tag.match(new RegExp(`(?:^|\\s)${name}\\s*=\\s*(["'])(.*?)\\1`, 'is'));
    return match?.[2] !== undefined ? decodeHtmlEntities(match[2].trim()) : undefined;
}

export function extractMetaTag(html: string, name: string): string | undefined {
    const tags = html.match(/<meta\b[^>]*>/gi) ?? [];
    for (const tag of tags) {
        const key = getAttribute(tag, 'property') ?? getAttribute(tag, 'name');
        if (key?.toLowerCase() !== name.toLowerCase()) continue;
        const content = getAttribute(tag, 'content');
        if (content) return content;
    }
    return undefined;
}

// <title>, then og:title, then the first <h1>.
export function extractTitle(html: string): string {
    const title = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
    if (title?.[1] && stripTags(title[1])) return stripTags(title[1]);

    const ogTitle = extractMetaTag(html, 'og:title');
    if (ogTitle) return ogTitle;

    const h1 = html.match(/<h1[^>]*>([\s\S]*?)<\/h1>/i);
    if (h1?.[1] && stripTags(h1[1])) return stripTags(h1[1]);

    return 'Untitled';
}

export function extractMetadata(html: string): Record<string, string> {
    const metadata: Record<string, string> = {};
    const candidates: Array<[string, string[]]> = [
        ['description', ['description', 'og:description', 'twitter:description']],
        ['author', ['author', 'article:author']],
        ['publish_date', ['article:published_time', 'publish_date', 'date']],
        ['keywords', ['keywords']],
        ['site_name', ['og:site_name']],
    ];

    for (const [key, names] of candidates) {
        for (const name of names) {
            const value = extractMetaTag(html, name);
            if (value) {
                metadata[key] = value;
                break;
            }
        }
    }
    return metadata;
}

function removeNoise(html: string): string {
    let cleaned = html.replace(/<!--[\s\S]*?-->/g, '');
    for (const tag of NOISE_TAGS) {
        cleaned = cleaned.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}>`, 'gi'), '');
    }
    return cleaned;
}

function mainRegion(html: string): string {
    const article = html.match(/<article\b[^>]*>([\s\S]*)<\/article>/i);
    if (article?.[1]) return article[1];

    const main = html.match(/<main\b[^>]*>([\s\S]*)<\/main>/i);
    if (main?.[1]) return main[1];

    const roleMain = html.match(/<(\w+)\b[^>]*\brole\s*=\s*["']main["'][^>]*>([\s\S]*?)<\/\1>/i);
    if (roleMain?.[2]) return roleMain[2];

    const body = html.match(/<body\b[^>]*>([\s\S]*)<\/body>/i);
    return body?.[1] ?? html;
}

// Readable text of the main region, one block per paragraph, blocks separated by a blank line.
export function extractBody(html: string): string {
    const region = mainRegion(removeNoise(html))
        .replace(/\s+/g, ' ')
        .replace(/<br\s*\/?>/gi, '\n')
        .replace(/<\/(p|div|section|h[1-6]|li|blockquote|pre|tr)>/gi, '\n');

    return region
        .split('\n')
        .map(line => stripTags(line))
        .filter(line => line.length > 0)
        .join('\n\n');
}

function resolveUrl(value: string, baseUrl: string): URL | null {
    try {
        return new URL(value, baseUrl);
    } catch {
        return null;
    }
}

function isHttp(url: URL): boolean {
    return url.protocol === 'http:' || url.protocol === 'https:';
}

export function extractImages(html: string, baseUrl: string): string[] {
    const seen = new Set<string>();
    const tags = html.match(/<img\b[^>]*>/gi) ?? [];

    for (const tag of tags) {
        const src = getAttribute(tag, 'src') ?? getAttribute(tag, 'data-src') ?? getAttribute(tag, 'data-original');
        if (!src) continue;

        const url = resolveUrl(src, baseUrl);
        if (!url || !isHttp(url)) continue;

        const href = url.toString();
        const lower = href.toLowerCase();
        if (IMAGE_EXCLUDES.some(marker => lower.includes(marker))) continue;
        if (!IMAGE_EXTENSION.test(url.pathname) && !href.includes('?')) continue;

        seen.add(href);
    }
    return [...seen];
}

export function extractLinks(html: string, baseUrl: string): string[] {
    const seen = new Set<string>();
    const tags = html.match(/<a\b[^>]*>/gi) ?? [];

    for (const tag of tags) {
        const href = getAttribute(tag, 'href');
        if (!href || href.startsWith('#')) continue;

        const url = resolveUrl(href, baseUrl);
        if (!url || !isHttp(url)) continue;

        seen.add(url.toString());
    }
    return [...seen];
}

export function parsePage(html: string, baseUrl: string): ParsedPage {
    return {
        title: extractTitle(html),
        body: extractBody(html),
        images: extractImages(html, baseUrl),
        links: extractLinks(html, baseUrl),
        metadata: extractMetadata(html),
    };
}

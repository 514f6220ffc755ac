import {
    decodeHtmlEntities,
    extractBody,
    extractImages,
    extractLinks,
    extractMetadata,
    extractTitle,
    getAttribute,
} from '../../src/collaborators/html';

const baseUrl = 'https://example.com/posts/1';

describe('decodeHtmlEntities', () => {
    it('decodes named, decimal and hex entities and keeps unknown ones', () => {
        expect(decodeHtmlEntities('&#65;&#x42;&lt;tag&gt; &amp; &unknown;')).toBe('AB<tag> & &unknown;');
    });

    it('replaces code points beyond U+10FFFF instead of throwing', () => {
        expect(decodeHtmlEntities('a&#x110000;b&#99999999;c&#x10FFFF;')).toBe('a\uFFFDb\uFFFDc\u{10FFFF}');
    });
});

describe('getAttribute', () => {
    it('matches whole attribute names only', () => {
        const tag = '<img data-src="/lazy.png" alt=\'A &amp; B\'>';
        expect(getAttribute(tag, 'src')).toBeUndefined();
        expect(getAttribute(tag, 'data-src')).toBe('/lazy.png');
        expect(getAttribute(tag, 'alt')).toBe('A & B');
    });
});

describe('extractTitle', () => {
    it('prefers <title>', () => {
        expect(extractTitle('<title>Sample &amp; Title</title><h1>Heading</h1>')).toBe('Sample & Title');
    });

    it('falls back to og:title, then the first h1, then a placeholder', () => {
        expect(extractTitle('<title>  </title><meta property="og:title" content="OG Title"><h1>Heading</h1>'))
            .toBe('OG Title');
        expect(extractTitle('<h1 class="hero">Heading <em>one</em></h1>')).toBe('Heading one');
        expect(extractTitle('<p>nothing here</p>')).toBe('Untitled');
    });
});

describe('extractMetadata', () => {
    it('collects the known meta tags under stable keys', () => {
        const html = `
            <meta name="description" content="A short description">
            <meta content="Jane Writer" name="author">
            <meta property="article:published_time" content="2026-01-02">
            <meta property="og:site_name" content="Example Site">
            <meta name="viewport" content="width=device-width">`;

        expect(extractMetadata(html)).toEqual({
            description: 'A short description',
            author: 'Jane Writer',
            publish_date: '2026-01-02',
            site_name: 'Example Site',
        });
    });
});

describe('extractBody', () => {
    it('keeps the article text and drops navigation and scripts', () => {
        const html = `<html><body><nav>Menu</nav><article><h1>Heading</h1>`
            + `<p>First paragraph with <b>bold</b> text.</p><p>Second\n   paragraph &amp; more.</p>`
            + `<script>var x = 1;</script></article><footer>Footer text</footer></body></html>`;

        expect(extractBody(html)).toBe('Heading\n\nFirst paragraph with bold text.\n\nSecond paragraph & more.');
    });

    it('falls back to <main> and then to <body>', () => {
        expect(extractBody('<body><div>Skip</div><main><p>Main text</p></main></body>')).toBe('Main text');
        expect(extractBody('<body><div>One</div><div>Two<br>Three</div><!-- hidden --></body>')).toBe('One\n\nTwo\n\nThree');
    });

    it('is empty when nothing readable remains', () => {
        expect(extractBody('<html><body><script>track()</script></body></html>')).toBe('');
    });
});

describe('extractImages', () => {
    it('resolves, filters and de-duplicates image sources', () => {
        const html = `
            <img src="/images/photo.jpg">
            <img data-src="https://cdn.example.com/pic?id=7">
            <img src="/static/logo.png">
            <img src="/t/pixel.gif">
            <img src="/images/photo.jpg">
            <img src="/images/noext">
            <img src="data:image/png;base64,AAAA">
            <img data-original="pics/cat.webp">`;

        expect(extractImages(html, baseUrl)).toEqual([
            'https://example.com/images/photo.jpg',
            'https://cdn.example.com/pic?id=7',
            'https://example.com/posts/pics/cat.webp',
        ]);
    });
});

describe('extractLinks', () => {
    it('keeps distinct http(s) links', () => {
        const html = `
            <a href="https://other.example.org/page">Other</a>
            <a href="#section">Jump</a>
            <a href="mailto:someone@example.com">Mail</a>
            <a href="/relative">Relative</a>
            <a href="https://other.example.org/page">Again</a>
            <a name="anchor">No href</a>`;

        expect(extractLinks(html, baseUrl)).toEqual([
            'https://other.example.org/page',
            'https://example.com/relative',
        ]);
    });
});

import * as cheerio from 'cheerio';
import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import { TextExtractor } from '../../types';
import { Logger } from '../observability';

const BLOCK_ELEMENTS = 'p, div, li, dd, dt, td, th, tr, br, h1, h2, h3, h4, h5, h6, address, section, article, header, footer, aside, nav, blockquote';

function safeDecode(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}

export class ContentExtractor implements TextExtractor {

    /**
     * Plain text of a page, or null when nothing readable is left.
     * Whole-body text comes first since contact details usually sit in
     * footers and sidebars; Readability is the fallback for pages whose body
     * text comes out empty.
     */
    extract(html: string, url: string): string | null {
        if (!html || !html.trim()) return null;

        const text = this.bodyText(html) || this.readableText(html, url);
        return text ? text : null;
    }

    bodyText(html: string): string {
        const $ = cheerio.load(html);

        // tel: links often carry the cleanest form of the number
        const telLinks: string[] = [];
        $('a[href^="tel:"]').each((_, el) => {
            const href = $(el).attr('href');
            if (href) telLinks.push(safeDecode(href.substring(4)).trim());
        });

        $('script, style, noscript, template, svg, iframe').remove();
        // keep adjacent cells and paragraphs from fusing into one digit run
        $(BLOCK_ELEMENTS).append(' ');

        const body = $('body').text().replace(/\s+/g, ' ').trim();
        return [body, ...telLinks].filter(Boolean).join(' ');
    }

    readableText(html: string, url: string): string {
        try {
            const dom = new JSDOM(html, { url });
            const article = new Readability(dom.window.document).parse();
            dom.window.close();
            return article?.textContent ? article.textContent.replace(/\s+/g, ' ').trim() : '';
        } catch (e) {
            Logger.debug(`[ContentExtractor] Readability failed for ${url}`, {
                url,
                error: e instanceof Error ? e : new Error(String(e)),
            });
            return '';
        }
    }
}

export const contentExtractor = new ContentExtractor();

/**
 * Stream link extraction from search result markup
 */
import * as cheerio from 'cheerio';
import type { Candidate } from '../types.js';

export interface ExtractOptions {
    /** File extension that marks a stream playlist url, without the dot */
    extension?: string;
}

const DEFAULT_EXTENSION = 'm3u8';

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Absolute http(s) urls ending in the extension, query string included
 */
function matchDirectUrls(html: string, extension: string): string[] {
    const ext = escapeRegExp(extension);
    const pattern = new RegExp(`https?://[^\\s<>"]+?\\.${ext}(?:\\?[^\\s<>"]*)?`, 'gi');
    return html.match(pattern) ?? [];
}

/**
 * Url argument of the player's `onclick="glshle('...')"` handler
 */
function matchPlayerInvocations(html: string, extension: string): string[] {
    const ext = escapeRegExp(extension);
    const pattern = new RegExp(`onclick="glshle\\(\\s*'([^']+?\\.${ext})'\\s*\\)"`, 'gi');
    return Array.from(html.matchAll(pattern), match => match[1]);
}

/**
 * Text of `<tba class="ergl">` result cells
 */
function matchResultCells(html: string, extension: string): string[] {
    const suffix = new RegExp(`\\.${escapeRegExp(extension)}$`, 'i');
    const $ = cheerio.load(html);
    const links: string[] = [];

    $('tba').each((_, element) => {
        const classes = ($(element).attr('class') ?? '').toLowerCase().split(/\s+/);
        if (!classes.includes('ergl')) {
            return;
        }
        const text = $(element).text().trim();
        if (text && suffix.test(text)) {
            links.push(text);
        }
    });

    return links;
}

/**
 * Turn a raw match into an absolute url, or null when it has no usable scheme
 */
export function normalizeLink(link: string): string | null {
    if (/^https?:\/\//i.test(link)) {
        return link;
    }
    if (link.startsWith('//')) {
        return `https:${link}`;
    }
    return null;
}

/**
 * Extract the distinct stream candidates found on one search page.
 * A page without links yields an empty array.
 */
export function extractLinks(
    html: string,
    channel: string,
    options: ExtractOptions = {}
): Candidate[] {
    if (!html) {
        return [];
    }

    const extension = options.extension || DEFAULT_EXTENSION;
    const raw = [
        ...matchDirectUrls(html, extension),
        ...matchPlayerInvocations(html, extension),
        ...matchResultCells(html, extension),
    ];

    const seen = new Set<string>();
    const candidates: Candidate[] = [];
    for (const link of raw) {
        const url = normalizeLink(link.trim());
        if (!url || seen.has(url)) {
            continue;
        }
        seen.add(url);
        candidates.push({ url, source: channel });
    }

    return candidates;
}

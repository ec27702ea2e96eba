/**
 * Article text extraction
 */

import { load } from 'cheerio';

/**
 * Collapse runs of whitespace to single spaces and trim
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Extract body text from an HTML page.
 *
 * Paragraphs inside the first <article> are preferred; without an article
 * every <p> of the page is used. Text nodes inside a paragraph are separated
 * by spaces, so inline markup and <br> never glue words together. Non-empty
 * paragraph texts are joined with single spaces and truncated to maxChars.
 */
export function extractArticleText(html: string, maxChars: number): string {
  const $ = load(html);
  const article = $('article').first();
  const paragraphs = article.length > 0 ? article.find('p') : $('p');
  paragraphs.find('*').before(' ').after(' ');

  const text = paragraphs
    .toArray()
    .map((el) => normalizeWhitespace($(el).text()))
    .filter((p) => p.length > 0)
    .join(' ');

  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

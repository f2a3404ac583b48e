import * as cheerio from 'cheerio';

/**
 * Strip tags, decode entities and collapse whitespace.
 */
export function cleanHtml(html: string | undefined | null): string {
  if (!html) return '';

  // Parse as a fragment so no <html>/<body> wrapper is synthesized
  const $ = cheerio.load(html, null, false);
  $('script, style').remove();

  return $.root().text().replace(/\s+/g, ' ').trim();
}

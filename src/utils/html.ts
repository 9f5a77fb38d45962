import * as cheerio from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';

const NON_VISIBLE_TAGS = 'script, style, noscript, template, svg';

function collectText(nodes: readonly AnyNode[], parts: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      parts.push(node.data);
    } else if (hasChildren(node)) {
      collectText(node.children, parts);
    }
  }
}

/**
 * Visible text of an HTML document
 * Text nodes are joined with a space and whitespace is collapsed
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $(NON_VISIBLE_TAGS).remove();

  const parts: string[] = [];
  collectText($.root().toArray(), parts);

  return parts.join(' ').replace(/\s+/g, ' ').trim();
}

/**
 * Pulls <loc> values out of a sitemap by tag scanning
 * Malformed sitemaps still yield whatever locations they contain
 */
export function extractSitemapLocations(xml: string): string[] {
  const locations: string[] = [];
  const pattern = /<loc>([\s\S]*?)<\/loc>/gi;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(xml)) !== null) {
    const value = match[1]
      .trim()
      .replace(/^<!\[CDATA\[/, '')
      .replace(/\]\]>$/, '')
      .trim();
    if (value) locations.push(value);
  }

  return locations;
}

/**
 * Hazard Relay: HTML Warnings Page Source
 *
 * Scrapes a warnings summary page. Block-level text is kept when it contains
 * an allow-listed keyword and none of the excluded boilerplate strings.
 * Page layout can change without notice, so an empty scrape is not trusted
 * to mean "no warnings" unless the descriptor says so.
 */

import type { Alert, SourceDescriptor } from '../../types';
import { ParseFailure } from '../../lib/errors';
import { AlertSource, type TransportOptions } from '../base';
import { attributeOf, toPlainText } from '../markup';
import { normalizeAlert } from '../normalizer';

const BLOCK_TEXT = /<(li|p|a|h[1-6]|dt|dd|td)\b[^>]*>([\s\S]*?)<\/\1\s*>/gi;
const NON_CONTENT = /<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1\s*>|<!--[\s\S]*?-->/gi;

export interface ScrapeRules {
  keywords: string[];
  exclusions: string[];
}

export interface WarningBlock {
  text: string;
  /** href of the first anchor in the block, as written on the page. */
  href: string | null;
}

export function extractWarningBlocks(html: string, rules: ScrapeRules): WarningBlock[] {
  const content = html.replace(NON_CONTENT, ' ');
  const seen = new Set<string>();
  const found: WarningBlock[] = [];

  for (const match of content.matchAll(BLOCK_TEXT)) {
    const text = toPlainText(match[2] ?? '');
    if (!text || seen.has(text)) continue;
    if (!rules.keywords.some(k => text.includes(k))) continue;
    if (rules.exclusions.some(x => text.includes(x))) continue;
    seen.add(text);
    found.push({ text, href: attributeOf(match[0], 'a', 'href') });
  }

  return found;
}

export function extractWarningTexts(html: string, rules: ScrapeRules): string[] {
  return extractWarningBlocks(html, rules).map(block => block.text);
}

function resolveLink(href: string | null, pageUrl: string): string {
  if (!href) return pageUrl;
  try {
    const resolved = new URL(href, pageUrl);
    return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.toString() : pageUrl;
  } catch {
    return pageUrl;
  }
}

/**
 * Alerts keep the scraped text as their id; the link points at the anchor
 * inside the block, else at the page itself.
 */
export function parseHtmlAlerts(html: string, rules: ScrapeRules, pageUrl: string): Alert[] {
  if (!/<(html|body)\b/i.test(html)) {
    throw new ParseFailure('Not an HTML page: no <html> or <body> element');
  }
  return extractWarningBlocks(html, rules).map(block =>
    normalizeAlert({ explicitId: block.text, headline: block.text, link: resolveLink(block.href, pageUrl) })
  );
}

export class HtmlAlertSource extends AlertSource {
  readonly kind = 'html' as const;
  protected readonly authoritativeByDefault = false;

  constructor(
    descriptor: SourceDescriptor,
    transport: TransportOptions,
    private readonly rules: ScrapeRules
  ) {
    super(descriptor, transport);
  }

  protected get accept(): string {
    return 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8';
  }

  parse(body: string): Alert[] {
    return parseHtmlAlerts(body, this.rules, this.url);
  }
}

/**
 * Hazard Relay: Markup helpers
 *
 * Regex-level XML/HTML reading shared by the parsers. Element names match
 * with or without a namespace prefix, so `<headline>` and `<cap:headline>`
 * are the same element here.
 */

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function elementPattern(localName: string): RegExp {
  const name = escapeRegExp(localName);
  return new RegExp(
    `<((?:[\\w.-]+:)?${name})(?:\\s[^>]*)?(?<!/)>([\\s\\S]*?)</\\1\\s*>`,
    'gi'
  );
}

/**
 * Decode XML/HTML character references. `&amp;` goes last so
 * `&amp;lt;` stays the literal text `&lt;`.
 */
export function decodeEntities(s: string): string {
  return s
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&([a-z]+);/gi, (match, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? match)
    .replace(/&amp;/gi, '&');
}

/**
 * Markup fragment to plain text: unwrap CDATA, drop tags, decode entities,
 * collapse whitespace.
 */
export function toPlainText(fragment: string): string {
  const unwrapped = fragment.replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1');
  const withoutTags = unwrapped.replace(/<[^>]*>/g, ' ');
  return decodeEntities(withoutTags).replace(/\s+/g, ' ').trim();
}

/**
 * Inner markup of every `localName` element, in document order.
 */
export function elements(xml: string, localName: string): string[] {
  const out: string[] = [];
  for (const match of xml.matchAll(elementPattern(localName))) {
    out.push(match[2] ?? '');
  }
  return out;
}

/**
 * Plain text of the first `localName` element, or null when absent or blank.
 */
export function childText(xml: string, localName: string): string | null {
  const [first] = elements(xml, localName);
  if (first === undefined) return null;
  const text = toPlainText(first);
  return text === '' ? null : text;
}

/**
 * Value of `attribute` on the first `localName` start tag (self-closing or not).
 */
export function attributeOf(xml: string, localName: string, attribute: string): string | null {
  const tag = new RegExp(`<(?:[\\w.-]+:)?${escapeRegExp(localName)}\\b([^>]*)>`, 'i').exec(xml);
  if (!tag) return null;
  const attr = new RegExp(`\\b${escapeRegExp(attribute)}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'i').exec(
    tag[1] ?? ''
  );
  const value = attr?.[1] ?? attr?.[2];
  return value ? decodeEntities(value).trim() || null : null;
}

/**
 * True when a start tag named `localName` appears anywhere in the document.
 */
export function hasElement(xml: string, localName: string): boolean {
  return new RegExp(`<(?:[\\w.-]+:)?${escapeRegExp(localName)}[\\s>/]`, 'i').test(xml);
}

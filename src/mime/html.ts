const ENTITIES: ReadonlyArray<readonly [string, string]> = [
  ["&nbsp;", " "],
  ["&amp;", "&"],
  ["&lt;", "<"],
  ["&gt;", ">"],
  ["&quot;", '"'],
  ["&#39;", "'"],
  ["&apos;", "'"],
  ["&cent;", "¢"],
  ["&pound;", "£"],
  ["&yen;", "¥"],
  ["&euro;", "€"],
  ["&copy;", "©"],
  ["&reg;", "®"],
];

function fromCodePoint(digits: string, original: string): string {
  const code = parseInt(digits, 10);
  return code <= 0x10ffff ? String.fromCodePoint(code) : original;
}

/**
 * Extract readable text from an HTML fragment.
 *
 * Order matters: entities are decoded before the final tag strip, so an
 * escaped `&lt;b&gt;` ends up removed like a real tag.
 */
export function htmlToText(html: string): string {
  let text = html
    .replace(/<script\b[^>]*>[\s\S]*?<\/script\s*>/gi, " ")
    .replace(/<style\b[^>]*>[\s\S]*?<\/style\s*>/gi, " ")
    .replace(/<(?:div|p|h\d|br|li|tr)\b[^>]*>/gi, "\n");

  for (const [entity, replacement] of ENTITIES) {
    text = text.split(entity).join(replacement);
  }

  return text
    .replace(/&#(\d+);/g, (match, digits: string) => fromCodePoint(digits, match))
    .replace(/<[^>]*>/g, "")
    .replace(/\n+/g, "\n")
    .replace(/\s+/g, " ")
    .trim();
}

/** Collapse every whitespace run to a single space and trim. */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

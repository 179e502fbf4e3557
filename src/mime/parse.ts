import { simpleParser } from "mailparser";
import type { ParsedMail, SimpleParserOptions } from "mailparser";

export type { ParsedMail };

// Bodies stay as the message carries them: no text generated from HTML,
// no HTML generated from text.
const PARSE_OPTIONS: SimpleParserOptions = {
  skipHtmlToText: true,
  skipTextToHtml: true,
};

const MIME_TYPE = /^[a-z0-9!#$&^_.+-]+\/[a-z0-9!#$&^_.+-]+$/;

/**
 * Parse raw RFC 822 source into mailparser's structured message.
 */
export function parseMessage(source: Buffer | string): Promise<ParsedMail> {
  return simpleParser(source, PARSE_OPTIONS);
}

/**
 * Raw value of the first top-level header named `key`, unfolded and
 * trimmed. Encoded words are left as they are.
 */
export function rawHeader(mail: ParsedMail, key: string): string | undefined {
  const name = key.toLowerCase();
  const entry = mail.headerLines.find((header) => header.key === name);
  if (!entry) {
    return undefined;
  }
  const colon = entry.line.indexOf(":");
  return entry.line
    .slice(colon + 1)
    .replace(/\r?\n(?=[ \t])/g, "")
    .trim();
}

/**
 * Whether the message itself declares a `type/subtype` Content-Type.
 *
 * mailparser reads a message without one as text/plain; the extractor treats
 * such a message, like one with a garbled type, as of unknown type.
 */
export function hasDeclaredType(mail: ParsedMail): boolean {
  const value = rawHeader(mail, "content-type");
  if (value === undefined) {
    return false;
  }
  const type = value.split(";")[0].trim().toLowerCase();
  return MIME_TYPE.test(type);
}

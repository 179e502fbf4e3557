import { htmlToText, normalizeWhitespace } from "./html.js";
import { hasDeclaredType } from "./parse.js";
import type { ParsedMail } from "./parse.js";

/**
 * Every payload in the message regardless of type or disposition: the text
 * bodies, then the attachments in message order.
 */
function payloads(mail: ParsedMail): string[] {
  const found: string[] = [];
  if (mail.text) found.push(mail.text);
  if (mail.html) found.push(mail.html);
  for (const attachment of mail.attachments) {
    // read as UTF-8 whatever charset the part declares
    const text = attachment.content.toString("utf8");
    if (text) found.push(text);
  }
  return found;
}

function deepFallback(mail: ParsedMail): string {
  const combined = payloads(mail).join(" ");
  return combined.includes("<") && combined.includes(">") ? htmlToText(combined) : combined;
}

/**
 * Extract the body text of a parsed message.
 *
 * Priority: the text/plain bodies, then the text/html bodies converted to
 * text (skipped when `plainTextOnly`), then any payload at all. A message
 * without a usable Content-Type of its own goes straight to the last step.
 */
export function extractContent(mail: ParsedMail, plainTextOnly = false): string {
  if (!hasDeclaredType(mail)) {
    return normalizeWhitespace(deepFallback(mail));
  }

  const plain = mail.text ?? "";
  const html = plainTextOnly ? "" : mail.html || "";

  let content = "";
  if (plain) {
    content = plain;
  } else if (html) {
    content = htmlToText(html);
  }
  content = normalizeWhitespace(content);

  if (!content) {
    content = deepFallback(mail);
  }
  return normalizeWhitespace(content);
}

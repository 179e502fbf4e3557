export { decodeSender, decodeSubject, formatAddresses } from "./headers.js";
export { normalizeDate } from "./date.js";
export { htmlToText, normalizeWhitespace } from "./html.js";
export { parseMessage, rawHeader, hasDeclaredType } from "./parse.js";
export type { ParsedMail } from "./parse.js";
export { extractContent } from "./content.js";

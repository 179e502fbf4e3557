import type { AddressObject, EmailAddress } from "mailparser";
import type { ParsedMail } from "./parse.js";

function formatAddress(entry: EmailAddress): string {
  if (entry.group) {
    const members = entry.group.map(formatAddress).filter(Boolean).join(", ");
    return entry.name ? `${entry.name}: ${members};` : members;
  }
  if (entry.name && entry.address) {
    return `${entry.name} <${entry.address}>`;
  }
  return entry.name || entry.address || "";
}

/**
 * Render an address header as `Name <address>` entries joined by ", ".
 * Display names arrive already decoded from their encoded words.
 */
export function formatAddresses(field: AddressObject | AddressObject[] | undefined): string {
  if (!field) {
    return "";
  }
  const objects = Array.isArray(field) ? field : [field];
  return objects
    .flatMap((object) => object.value)
    .map(formatAddress)
    .filter(Boolean)
    .join(", ");
}

/** Decoded Subject, "" when absent. */
export function decodeSubject(mail: ParsedMail): string {
  return mail.subject ?? "";
}

/** Decoded From, "" when absent. */
export function decodeSender(mail: ParsedMail): string {
  return formatAddresses(mail.from);
}

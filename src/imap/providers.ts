import { UnsupportedProviderError } from "../errors.js";
import type { ProviderName, ProviderProfile } from "./types.js";

export const PROVIDERS: Readonly<Record<ProviderName, ProviderProfile>> = Object.freeze({
  gmail: Object.freeze({ name: "gmail", host: "imap.gmail.com", port: 993 }),
  outlook: Object.freeze({ name: "outlook", host: "outlook.office365.com", port: 993 }),
  yahoo: Object.freeze({ name: "yahoo", host: "imap.mail.yahoo.com", port: 993 }),
  aol: Object.freeze({ name: "aol", host: "imap.aol.com", port: 993 }),
  zoho: Object.freeze({ name: "zoho", host: "imap.zoho.com", port: 993 }),
});

export const PROVIDER_NAMES: readonly ProviderName[] = Object.freeze([
  "gmail",
  "outlook",
  "yahoo",
  "aol",
  "zoho",
]);

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Look up the IMAP endpoint for a provider (case-insensitive).
 */
export function resolveProvider(name: string): ProviderProfile {
  const key = name.trim().toLowerCase();
  if (!isProviderName(key)) {
    throw new UnsupportedProviderError(name);
  }
  return PROVIDERS[key];
}

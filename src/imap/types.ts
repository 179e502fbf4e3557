/**
 * Provider identifiers accepted on the command line.
 */
export type ProviderName = "gmail" | "outlook" | "yahoo" | "aol" | "zoho";

/**
 * IMAP endpoint for a provider. Always implicit TLS.
 */
export interface ProviderProfile {
  readonly name: ProviderName;
  readonly host: string;
  readonly port: number;
}

/**
 * Login for one mailbox. The secret is an app password, never logged.
 */
export interface Credentials {
  readonly username: string;
  readonly secret: string;
}

/**
 * Configuration for connecting to an IMAP server.
 */
export interface ImapConfig {
  host: string;
  port: number;
  secure: boolean;
  auth: {
    user: string;
    pass: string;
  };
  /** Provider tag, used to name the credential variables in error hints. */
  provider: ProviderName;
}

/**
 * One harvested message, flattened for downstream analysis.
 */
export interface EmailRecord {
  /** Server message sequence number at fetch time */
  readonly id: string;
  /** Decoded Subject header */
  readonly subject: string;
  /** Decoded From header, display name included */
  readonly from: string;
  /** "YYYY-MM-DD HH:MM:SS", or the raw Date header when it does not parse */
  readonly date: string;
  /** Whitespace-normalized body text */
  readonly content: string;
}

export interface FetchOptions {
  /** Keep only the most recent `limit` messages. Ignored unless a positive integer, so `0` keeps everything. */
  limit?: number;
  /** Ignore text/html parts when choosing the body. */
  plainTextOnly?: boolean;
  /** Case-insensitive substrings matched against the decoded sender. */
  excludeSenders?: readonly string[];
}

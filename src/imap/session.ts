import type { ImapFlow } from "imapflow";
import { ConnectionError, DecodeError, FetchError, MailboxError, errorMessage } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import {
  decodeSender,
  decodeSubject,
  extractContent,
  normalizeDate,
  parseMessage,
  rawHeader,
} from "../mime/index.js";
import { ImapClient } from "./client.js";
import { resolveProvider } from "./providers.js";
import type { Credentials, EmailRecord, FetchOptions, ProviderName, ProviderProfile } from "./types.js";

export type SessionState = "disconnected" | "connected";

/**
 * One authenticated mailbox connection for a single harvest run.
 */
export interface MailSession {
  readonly state: SessionState;
  readonly provider: ProviderProfile;
  connect(): Promise<void>;
  fetchAll(options?: FetchOptions): Promise<EmailRecord[]>;
  disconnect(): Promise<void>;
}

export interface MailSessionOptions {
  logger?: Logger;
}

/**
 * Keep the ids listed last by the server. Non-positive or non-integer limits
 * keep everything.
 */
export function applyLimit<T>(ids: readonly T[], limit?: number): T[] {
  if (limit === undefined || !Number.isInteger(limit) || limit <= 0) {
    return [...ids];
  }
  return ids.slice(-limit);
}

/**
 * Whether the sender contains any of the exclusion substrings, ignoring case.
 */
export function isExcludedSender(from: string, exclusions: readonly string[]): boolean {
  const sender = from.toLowerCase();
  return exclusions.some((entry) => entry !== "" && sender.includes(entry.toLowerCase()));
}

/**
 * Build the record for one raw message, or null when the sender is excluded.
 * Throws DecodeError when the message cannot be turned into a record.
 */
export async function buildRecord(
  id: string,
  source: Buffer,
  options: FetchOptions = {}
): Promise<EmailRecord | null> {
  try {
    const mail = await parseMessage(source);
    const from = decodeSender(mail);
    if (isExcludedSender(from, options.excludeSenders ?? [])) {
      return null;
    }
    return Object.freeze({
      id,
      subject: decodeSubject(mail),
      from,
      date: normalizeDate(rawHeader(mail, "date")),
      content: extractContent(mail, options.plainTextOnly ?? false),
    });
  } catch (error) {
    throw new DecodeError(id, `Cannot decode message ${id}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Mail session over IMAP for any provider in the profile table.
 */
export class ImapMailSession implements MailSession {
  readonly provider: ProviderProfile;
  private readonly imap: ImapClient;
  private readonly logger: Logger;

  constructor(provider: ProviderProfile, credentials: Credentials, options: MailSessionOptions = {}) {
    this.provider = provider;
    this.logger = options.logger ?? silentLogger;
    this.imap = new ImapClient(
      {
        host: provider.host,
        port: provider.port,
        secure: true,
        auth: { user: credentials.username, pass: credentials.secret },
        provider: provider.name,
      },
      this.logger
    );
  }

  get state(): SessionState {
    return this.imap.connected ? "connected" : "disconnected";
  }

  async connect(): Promise<void> {
    this.logger.debug(`Connecting to ${this.provider.host}:${this.provider.port}`);
    await this.imap.connect();
  }

  /**
   * Fetch, decode and filter every INBOX message, oldest first.
   * Messages that fail to fetch or decode are logged and skipped.
   */
  async fetchAll(options: FetchOptions = {}): Promise<EmailRecord[]> {
    if (this.state !== "connected") {
      throw new ConnectionError("Mail session is not connected. Call connect() first.");
    }

    const lock = await this.imap.openMailbox("INBOX");
    try {
      const client = this.imap.getClient();
      const ids = applyLimit(await this.listMessageIds(client), options.limit);

      const records: EmailRecord[] = [];
      for (const id of ids) {
        const record = await this.fetchRecord(client, id, options);
        if (record) records.push(record);
      }
      return records;
    } finally {
      lock.release();
    }
  }

  async disconnect(): Promise<void> {
    await this.imap.disconnect();
    this.logger.debug("Disconnected");
  }

  private async listMessageIds(client: ImapFlow): Promise<string[]> {
    let found: number[] | false;
    try {
      found = await client.search({ all: true });
    } catch (error) {
      throw new MailboxError(`Cannot list INBOX messages: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (!found || found.length === 0) {
      return [];
    }
    return found.map(String);
  }

  private async fetchSource(client: ImapFlow, id: string): Promise<Buffer> {
    let source: Buffer | undefined;
    try {
      const message = await client.fetchOne(id, { source: true });
      source = message ? message.source : undefined;
    } catch (error) {
      if (!this.imap.usable) {
        throw new ConnectionError(
          `Connection lost while fetching message ${id}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      throw new FetchError(id, `Error fetching message ${id}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (!source) {
      throw new FetchError(id, `Error fetching message ${id}: server returned no content`);
    }
    return source;
  }

  private async fetchRecord(
    client: ImapFlow,
    id: string,
    options: FetchOptions
  ): Promise<EmailRecord | null> {
    try {
      const source = await this.fetchSource(client, id);
      const record = await buildRecord(id, source, options);
      if (!record) {
        this.logger.debug(`Skipping message ${id}: excluded sender`);
        return null;
      }
      this.logger.debug(`Fetched message ${id}`);
      return record;
    } catch (error) {
      if (error instanceof FetchError || error instanceof DecodeError) {
        this.logger.warn(error.message);
        return null;
      }
      throw error;
    }
  }
}

/**
 * Create the mail session for a provider tag.
 */
export function createMailSession(
  provider: ProviderName | ProviderProfile,
  credentials: Credentials,
  options: MailSessionOptions = {}
): MailSession {
  const profile = typeof provider === "string" ? resolveProvider(provider) : provider;
  return new ImapMailSession(profile, credentials, options);
}

import { ImapFlow } from "imapflow";
import type { MailboxLockObject } from "imapflow";
import { ConnectionError, MailboxError, errorMessage } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { ImapConfig } from "./types.js";

/**
 * Map an IMAP or network error to a ConnectionError.
 * Inspects error properties set by ImapFlow and Node.js to determine the cause.
 */
export function classifyImapError(error: unknown, config: ImapConfig): ConnectionError {
  if (!(error instanceof Error)) {
    return new ConnectionError(`IMAP error: ${String(error)}`);
  }

  const rawCode: unknown = Reflect.get(error, "code");
  const code = typeof rawCode === "string" ? rawCode : undefined;
  const prefix = config.provider.toUpperCase();

  if (Reflect.get(error, "authenticationFailed") === true) {
    return new ConnectionError(
      `IMAP authentication failed. Check ${prefix}_USERNAME and ${prefix}_APP_PASSWORD.`,
      { cause: error }
    );
  }

  if (code === "ECONNREFUSED") {
    return new ConnectionError(
      `Cannot reach IMAP server at ${config.host}:${config.port}: connection refused.`,
      { cause: error }
    );
  }

  if (code === "ENOTFOUND") {
    return new ConnectionError(`Cannot resolve IMAP server hostname '${config.host}'.`, {
      cause: error,
    });
  }

  if (code === "ETIMEDOUT" || code === "CONNECT_TIMEOUT") {
    return new ConnectionError(
      "Connection to IMAP server timed out; the server may be slow or unreachable.",
      { cause: error }
    );
  }

  if (code?.startsWith("ERR_TLS") || /tls|certificate/i.test(error.message)) {
    return new ConnectionError(`TLS/SSL error connecting to ${config.host}: ${error.message}`, {
      cause: error,
    });
  }

  return new ConnectionError(`IMAP error: ${error.message}`, { cause: error });
}

/**
 * Owns one IMAP connection for the lifetime of a harvest run.
 * Wraps ImapFlow; unlike a long-lived client it never reconnects on its own.
 */
export class ImapClient {
  private client: ImapFlow | null = null;
  private readonly config: ImapConfig;
  private readonly logger: Logger;

  constructor(config: ImapConfig, logger: Logger = silentLogger) {
    this.config = config;
    this.logger = logger;
  }

  get connected(): boolean {
    return this.client !== null;
  }

  /** Whether the server connection can still take commands. */
  get usable(): boolean {
    return this.client?.usable ?? false;
  }

  /**
   * Open the TLS connection and log in. Throws ConnectionError.
   */
  async connect(): Promise<ImapFlow> {
    if (this.client) {
      return this.client;
    }

    const flow = new ImapFlow({
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      auth: this.config.auth,
      logger: false,
    });

    // EventEmitter requires handling "error" events, otherwise Node throws.
    // The failing command rejects as well, so this only reports.
    flow.on("error", (error: unknown) => {
      const err = classifyImapError(error, this.config);
      this.logger.debug(`IMAP connection error: ${err.message}`);
    });

    try {
      await flow.connect();
    } catch (error) {
      throw classifyImapError(error, this.config);
    }

    this.client = flow;
    return flow;
  }

  /**
   * Get the underlying ImapFlow instance (must be connected first).
   */
  getClient(): ImapFlow {
    if (!this.client) {
      throw new ConnectionError("IMAP client not connected. Call connect() first.");
    }
    return this.client;
  }

  /**
   * Select a mailbox and hold its lock. Caller must release the lock when done.
   */
  async openMailbox(path: string = "INBOX"): Promise<MailboxLockObject> {
    const client = this.getClient();
    try {
      return await client.getMailboxLock(path);
    } catch (error) {
      if (!client.usable) {
        throw classifyImapError(error, this.config);
      }
      throw new MailboxError(`Cannot select mailbox ${path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Close the selected mailbox and log out. Best effort: failures are only
   * logged, the connection is dropped either way.
   */
  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;

    try {
      await client.mailboxClose();
      await client.logout();
    } catch (error) {
      this.logger.debug(`Ignoring error while disconnecting: ${errorMessage(error)}`);
      client.close();
    }
  }
}

/**
 * Error taxonomy for a harvest run.
 *
 * Fatal errors (provider, config, connection, mailbox, export) abort the run.
 * FetchError and DecodeError are raised per message and only ever logged by
 * the session, which then moves on to the next message.
 */
export class HarvestError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HarvestError";
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UnsupportedProviderError extends HarvestError {
  constructor(provider: string, options?: ErrorOptions) {
    super(`Unsupported email provider: ${provider}`, "UNSUPPORTED_PROVIDER", options);
    this.name = "UnsupportedProviderError";
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

export class ConnectionError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONNECTION_ERROR", options);
    this.name = "ConnectionError";
  }
}

export class MailboxError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "MAILBOX_ERROR", options);
    this.name = "MailboxError";
  }
}

export class FetchError extends HarvestError {
  public readonly messageId: string;

  constructor(messageId: string, message: string, options?: ErrorOptions) {
    super(message, "FETCH_ERROR", options);
    this.name = "FetchError";
    this.messageId = messageId;
  }
}

export class DecodeError extends HarvestError {
  public readonly messageId: string;

  constructor(messageId: string, message: string, options?: ErrorOptions) {
    super(message, "DECODE_ERROR", options);
    this.name = "DecodeError";
    this.messageId = messageId;
  }
}

export class ExportError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "EXPORT_ERROR", options);
    this.name = "ExportError";
  }
}

/** Best-effort message text for anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

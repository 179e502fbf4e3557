export { ImapClient, classifyImapError } from "./client.js";
export {
  ImapMailSession,
  applyLimit,
  buildRecord,
  createMailSession,
  isExcludedSender,
} from "./session.js";
export type { MailSession, MailSessionOptions, SessionState } from "./session.js";
export { PROVIDERS, PROVIDER_NAMES, isProviderName, resolveProvider } from "./providers.js";
export type {
  Credentials,
  EmailRecord,
  FetchOptions,
  ImapConfig,
  ProviderName,
  ProviderProfile,
} from "./types.js";

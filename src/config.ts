import * as fs from "node:fs/promises";
import { ConfigError, errorMessage } from "./errors.js";
import { resolveProvider } from "./imap/index.js";
import type { Credentials, ProviderProfile } from "./imap/index.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export type Env = Record<string, string | undefined>;

/**
 * Everything one harvest run needs, built once at start-up.
 */
export interface HarvestConfig {
  provider: ProviderProfile;
  credentials: Credentials;
  output: string;
  limit?: number;
  plainTextOnly: boolean;
  excludeSenders: string[];
}

export interface HarvestConfigInput {
  provider: string;
  output: string;
  limit?: number;
  plainTextOnly?: boolean;
  excludeSenders?: readonly string[];
  excludeFile?: string;
}

/**
 * Read `<PROVIDER>_USERNAME` and `<PROVIDER>_APP_PASSWORD`.
 */
export function loadCredentials(provider: ProviderProfile, env: Env): Credentials {
  const prefix = provider.name.toUpperCase();
  const usernameVar = `${prefix}_USERNAME`;
  const passwordVar = `${prefix}_APP_PASSWORD`;
  const username = env[usernameVar];
  const secret = env[passwordVar];

  if (!username || !secret) {
    throw new ConfigError(
      `Email credentials not found. Please set ${usernameVar} and ${passwordVar} (environment or .env file).`
    );
  }
  return { username, secret };
}

/**
 * Parse exclusion file text: one entry per line, blank lines and `#`
 * comments ignored.
 */
export function parseExclusionList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

/**
 * Load an exclusion file. An unreadable file is reported and contributes
 * nothing; the run goes on without it.
 */
export async function loadExclusionList(
  filePath: string,
  logger: Logger = silentLogger
): Promise<string[]> {
  try {
    const entries = parseExclusionList(await fs.readFile(filePath, "utf-8"));
    logger.info(`Loaded ${entries.length} exclusions from ${filePath}`);
    return entries;
  } catch (error) {
    logger.error(`Error loading exclusion list from ${filePath}: ${errorMessage(error)}`);
    return [];
  }
}

/**
 * Union of exclusion lists, lowercased and de-duplicated, first-seen order.
 */
export function mergeExclusions(...lists: ReadonlyArray<readonly string[]>): string[] {
  const merged = new Set<string>();
  for (const list of lists) {
    for (const entry of list) {
      const value = entry.trim().toLowerCase();
      if (value) merged.add(value);
    }
  }
  return [...merged];
}

/**
 * Resolve the provider, credentials and exclusions into one config value.
 * Fails before any network activity when the provider or credentials are bad.
 */
export async function buildHarvestConfig(
  input: HarvestConfigInput,
  env: Env,
  logger: Logger = silentLogger
): Promise<HarvestConfig> {
  const provider = resolveProvider(input.provider);
  const credentials = loadCredentials(provider, env);
  const fromFile = input.excludeFile ? await loadExclusionList(input.excludeFile, logger) : [];

  return {
    provider,
    credentials,
    output: input.output,
    limit: input.limit,
    plainTextOnly: input.plainTextOnly ?? false,
    excludeSenders: mergeExclusions(input.excludeSenders ?? [], fromFile),
  };
}

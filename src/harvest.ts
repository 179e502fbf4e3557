import type { HarvestConfig } from "./config.js";
import { createExporter } from "./export/json.js";
import type { Exporter } from "./export/json.js";
import { createMailSession } from "./imap/index.js";
import type { MailSession } from "./imap/index.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export interface HarvestDependencies {
  logger?: Logger;
  exporter?: Exporter;
  /** Defaults to the IMAP session for the configured provider. */
  createSession?: (config: HarvestConfig, logger: Logger) => MailSession;
}

export interface HarvestSummary {
  output: string;
  count: number;
}

/**
 * Connect, fetch, export, and always disconnect.
 * Any fatal error propagates after the session has been released.
 */
export async function runHarvest(
  config: HarvestConfig,
  deps: HarvestDependencies = {}
): Promise<HarvestSummary> {
  const logger = deps.logger ?? silentLogger;
  const exporter = deps.exporter ?? createExporter();
  const session = deps.createSession
    ? deps.createSession(config, logger)
    : createMailSession(config.provider, config.credentials, { logger });

  try {
    await session.connect();

    logger.info("Fetching emails...");
    const records = await session.fetchAll({
      limit: config.limit,
      plainTextOnly: config.plainTextOnly,
      excludeSenders: config.excludeSenders,
    });
    logger.info(`Found ${records.length} emails`);

    logger.info(`Exporting to ${config.output}...`);
    await exporter.write(records, config.output);
    logger.info("Export completed successfully");

    return { output: config.output, count: records.length };
  } finally {
    await session.disconnect();
  }
}

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { buildHarvestConfig } from "./config.js";
import type { Env, HarvestConfig } from "./config.js";
import { HarvestError, errorMessage } from "./errors.js";
import { runHarvest } from "./harvest.js";
import type { HarvestDependencies, HarvestSummary } from "./harvest.js";
import { PROVIDER_NAMES } from "./imap/index.js";
import { createLogger } from "./logger.js";
import type { LineSink } from "./logger.js";

export const VERSION = "0.1.0";

interface ExportCommandOptions {
  output: string;
  limit?: number;
  provider: string;
  plainText: boolean;
  excludeSender: string[];
  excludeFile?: string;
  verbose: boolean;
}

export interface CliDependencies {
  env: Env;
  stdout?: LineSink;
  stderr?: LineSink;
  harvest?: (config: HarvestConfig, deps: HarvestDependencies) => Promise<HarvestSummary>;
}

// 0 means no limit
function parseLimit(value: string): number {
  const text = value.trim();
  if (!/^\d+$/.test(text)) {
    throw new InvalidArgumentError("Limit must be a non-negative integer.");
  }
  return Number(text);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function buildProgram(deps: CliDependencies): Command {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const harvest = deps.harvest ?? runHarvest;

  const program = new Command()
    .name("inbox-harvest")
    .description("Export emails from an IMAP inbox as JSON records")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => stdout.write(str),
      writeErr: (str) => stderr.write(str),
    });

  program
    .command("export")
    .description("Export emails")
    .requiredOption("-o, --output <path>", "Output file path")
    .option("-l, --limit <n>", "Export only the most recent n emails (0 for all)", parseLimit)
    .addOption(
      new Option("-p, --provider <name>", "Email provider").choices(PROVIDER_NAMES).default("gmail")
    )
    .option("--plain-text", "Extract only plain text content, ignore HTML parts", false)
    .option(
      "--exclude-sender <address>",
      "Exclude emails whose sender contains this text (can be used multiple times)",
      collect,
      []
    )
    .option("--exclude-file <path>", "Text file of senders to exclude, one per line")
    .option("-v, --verbose", "Log every message as it is fetched", false)
    .action(async (opts: ExportCommandOptions) => {
      const logger = createLogger({ verbose: opts.verbose, stdout, stderr });
      const config = await buildHarvestConfig(
        {
          provider: opts.provider,
          output: opts.output,
          limit: opts.limit,
          plainTextOnly: opts.plainText,
          excludeSenders: opts.excludeSender,
          excludeFile: opts.excludeFile,
        },
        deps.env,
        logger
      );
      await harvest(config, { logger });
    });

  return program;
}

/**
 * Run the CLI and return the process exit status.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const stderr = deps.stderr ?? process.stderr;
  const program = buildProgram(deps);

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed its own message
      return error.exitCode;
    }

    stderr.write(`Error: ${errorMessage(error)}\n`);
    const verbose = program.commands.some((command) => command.opts().verbose === true);
    if (verbose && !(error instanceof HarvestError) && error instanceof Error && error.stack) {
      stderr.write(`${error.stack}\n`);
    }
    return 1;
  }
}

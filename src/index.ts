#!/usr/bin/env node

import "dotenv/config";
import { runCli } from "./cli.js";

// Last-resort reporting for anything that escapes the CLI's own handling.
function formatError(label: string, err: unknown): string {
  const lines = [`[inbox-harvest] ${label}`];
  if (err instanceof Error) {
    lines.push(`  Message: ${err.message}`);
    lines.push(`  Name:    ${err.name}`);
    if (err.cause) lines.push(`  Cause:   ${String(err.cause)}`);
    if (err.stack) lines.push(`  Stack:\n${err.stack}`);
  } else {
    lines.push(`  Value: ${JSON.stringify(err)}`);
  }
  lines.push(`  Time:  ${new Date().toISOString()}`);
  lines.push(`  Node:  ${process.version}`);
  return lines.join("\n") + "\n";
}

process.on("unhandledRejection", (reason) => {
  process.stderr.write(formatError("UNHANDLED REJECTION", reason));
  process.exit(1);
});

async function main() {
  process.exitCode = await runCli(process.argv, { env: process.env });
}

main().catch((error) => {
  process.stderr.write(formatError("FATAL", error));
  process.exit(1);
});

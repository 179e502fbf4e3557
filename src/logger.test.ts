import { describe, it, expect } from "vitest";
import { createLogger } from "./logger.js";

function sink() {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

describe("ConsoleLogger", () => {
  it("writes progress to stdout and problems to stderr", () => {
    const stdout = sink();
    const stderr = sink();
    const logger = createLogger({ stdout, stderr });

    logger.info("Fetching emails...");
    logger.warn("Error fetching message 3");
    logger.error("Export failed");

    expect(stdout.lines).toEqual(["Fetching emails...\n"]);
    expect(stderr.lines).toEqual([
      "[inbox-harvest] warning: Error fetching message 3\n",
      "[inbox-harvest] error: Export failed\n",
    ]);
  });

  it("only writes debug lines when verbose", () => {
    const quiet = sink();
    createLogger({ stdout: sink(), stderr: quiet }).debug("Fetched message 1");
    expect(quiet.lines).toEqual([]);

    const loud = sink();
    createLogger({ verbose: true, stdout: sink(), stderr: loud }).debug("Fetched message 1");
    expect(loud.lines).toEqual(["[inbox-harvest] Fetched message 1\n"]);
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  buildHarvestConfig,
  loadCredentials,
  loadExclusionList,
  mergeExclusions,
  parseExclusionList,
} from "./config.js";
import { ConfigError, UnsupportedProviderError } from "./errors.js";
import { resolveProvider } from "./imap/providers.js";
import type { Logger } from "./logger.js";

function recordingLogger() {
  const messages: string[] = [];
  const logger: Logger = {
    debug: (msg) => messages.push(`debug: ${msg}`),
    info: (msg) => messages.push(`info: ${msg}`),
    warn: (msg) => messages.push(`warn: ${msg}`),
    error: (msg) => messages.push(`error: ${msg}`),
  };
  return { logger, messages };
}

describe("loadCredentials", () => {
  it("reads the provider-prefixed variables", () => {
    const env = { OUTLOOK_USERNAME: "me@example.com", OUTLOOK_APP_PASSWORD: "test-secret" };
    expect(loadCredentials(resolveProvider("outlook"), env)).toEqual({
      username: "me@example.com",
      secret: "test-secret",
    });
  });

  it("fails naming both variables when either is missing or empty", () => {
    const gmail = resolveProvider("gmail");
    expect(() => loadCredentials(gmail, { GMAIL_USERNAME: "me@example.com" })).toThrow(ConfigError);
    expect(() => loadCredentials(gmail, { GMAIL_USERNAME: "", GMAIL_APP_PASSWORD: "x" })).toThrow(
      "Email credentials not found. Please set GMAIL_USERNAME and GMAIL_APP_PASSWORD (environment or .env file)."
    );
  });
});

describe("parseExclusionList", () => {
  it("skips blank lines and comments and trims entries", () => {
    const text = "# newsletters\nnoreply@newsletter.com\n\n  alerts@example.com  \r\n#ignored\nmarketing\n";
    expect(parseExclusionList(text)).toEqual(["noreply@newsletter.com", "alerts@example.com", "marketing"]);
  });
});

describe("mergeExclusions", () => {
  it("unions lists case-insensitively and drops empty entries", () => {
    expect(mergeExclusions(["Newsletter", " "], ["newsletter", "Promo@Shop.com"], [""])).toEqual([
      "newsletter",
      "promo@shop.com",
    ]);
  });
});

describe("exclusion files", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "inbox-harvest-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("loads entries and reports how many", async () => {
    const file = path.join(tmpDir, "exclude.txt");
    fs.writeFileSync(file, "# comment\nnewsletter\nnoreply@\n");
    const { logger, messages } = recordingLogger();

    expect(await loadExclusionList(file, logger)).toEqual(["newsletter", "noreply@"]);
    expect(messages).toEqual([`info: Loaded 2 exclusions from ${file}`]);
  });

  it("reports an unreadable file and contributes nothing", async () => {
    const file = path.join(tmpDir, "missing.txt");
    const { logger, messages } = recordingLogger();

    expect(await loadExclusionList(file, logger)).toEqual([]);
    expect(messages).toHaveLength(1);
    expect(messages[0]).toMatch(/^error: Error loading exclusion list from .*missing\.txt: ENOENT/);
  });

  it("builds a run config merging CLI and file exclusions", async () => {
    const file = path.join(tmpDir, "exclude.txt");
    fs.writeFileSync(file, "Alerts@Example.com\nnewsletter\n");

    const config = await buildHarvestConfig(
      {
        provider: "yahoo",
        output: "out.json",
        limit: 10,
        excludeSenders: ["newsletter", "recruiter-bot"],
        excludeFile: file,
      },
      { YAHOO_USERNAME: "me@yahoo.com", YAHOO_APP_PASSWORD: "test-secret" }
    );

    expect(config).toEqual({
      provider: { name: "yahoo", host: "imap.mail.yahoo.com", port: 993 },
      credentials: { username: "me@yahoo.com", secret: "test-secret" },
      output: "out.json",
      limit: 10,
      plainTextOnly: false,
      excludeSenders: ["newsletter", "recruiter-bot", "alerts@example.com"],
    });
  });
});

describe("buildHarvestConfig", () => {
  it("rejects unknown providers before reading credentials", async () => {
    await expect(buildHarvestConfig({ provider: "hotmail", output: "out.json" }, {})).rejects.toThrow(
      UnsupportedProviderError
    );
  });

  it("rejects missing credentials", async () => {
    await expect(buildHarvestConfig({ provider: "zoho", output: "out.json" }, {})).rejects.toThrow(ConfigError);
  });
});

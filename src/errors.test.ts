import { describe, it, expect } from "vitest";
import {
  ConfigError,
  DecodeError,
  ExportError,
  FetchError,
  HarvestError,
  UnsupportedProviderError,
  errorMessage,
} from "./errors.js";

describe("HarvestError", () => {
  it("carries a stable code and the cause", () => {
    const cause = new Error("ENOENT");
    const error = new ExportError("Error exporting to JSON at out.json: ENOENT", { cause });

    expect(error).toBeInstanceOf(HarvestError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ExportError");
    expect(error.code).toBe("EXPORT_ERROR");
    expect(error.cause).toBe(cause);
  });

  it("names the unsupported provider", () => {
    const error = new UnsupportedProviderError("hotmail");
    expect(error.message).toBe("Unsupported email provider: hotmail");
    expect(error.code).toBe("UNSUPPORTED_PROVIDER");
  });

  it("records which message failed", () => {
    expect(new FetchError("12", "Error fetching message 12: timeout").messageId).toBe("12");
    expect(new DecodeError("13", "Cannot decode message 13: bad").code).toBe("DECODE_ERROR");
  });

  it("keeps subclasses distinct", () => {
    expect(new ConfigError("missing")).not.toBeInstanceOf(ExportError);
  });
});

describe("errorMessage", () => {
  it("reads messages from errors and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { JsonExporter } from "./json.js";
import { ExportError } from "../errors.js";
import type { EmailRecord } from "../imap/types.js";

const records: EmailRecord[] = [
  {
    id: "1",
    subject: "Entrevista técnica",
    from: "Jörg <jorg@example.com>",
    date: "2024-01-15 10:30:00",
    content: "Café at 10",
  },
  { id: "2", subject: "", from: "", date: "", content: "" },
];

describe("JsonExporter", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "inbox-harvest-export-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes an indented JSON array with non-ASCII kept literal", async () => {
    const file = path.join(tmpDir, "emails.json");
    await new JsonExporter().write(records, file);

    const text = fs.readFileSync(file, "utf-8");
    expect(JSON.parse(text)).toEqual(records);
    expect(text.startsWith('[\n  {\n    "id": "1",\n    "subject": "Entrevista técnica",')).toBe(true);
    expect(text).toContain('"from": "Jörg <jorg@example.com>"');
    expect(text.endsWith("}\n]")).toBe(true);
  });

  it("writes an empty array for no records", async () => {
    const file = path.join(tmpDir, "empty.json");
    await new JsonExporter().write([], file);
    expect(fs.readFileSync(file, "utf-8")).toBe("[]");
  });

  it("creates missing parent directories", async () => {
    const file = path.join(tmpDir, "nested", "dir", "emails.json");
    await new JsonExporter().write(records, file);
    expect(fs.existsSync(file)).toBe(true);
  });

  it("reports I/O failures as ExportError", async () => {
    const blocker = path.join(tmpDir, "not-a-dir");
    fs.writeFileSync(blocker, "");
    const file = path.join(blocker, "emails.json");

    const result = new JsonExporter().write(records, file);
    await expect(result).rejects.toBeInstanceOf(ExportError);
    await expect(new JsonExporter().write(records, file)).rejects.toThrow(
      `Error exporting to JSON at ${file}`
    );
  });
});

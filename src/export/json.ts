import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ExportError, errorMessage } from "../errors.js";
import type { EmailRecord } from "../imap/types.js";

export interface Exporter {
  write(records: readonly EmailRecord[], outputPath: string): Promise<void>;
}

/**
 * Writes the records as one indented JSON array. Non-ASCII text is kept
 * literal, which is what JSON.stringify does anyway.
 */
export class JsonExporter implements Exporter {
  async write(records: readonly EmailRecord[], outputPath: string): Promise<void> {
    const content = JSON.stringify(records, null, 2);
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, content, "utf-8");
    } catch (error) {
      throw new ExportError(`Error exporting to JSON at ${outputPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export function createExporter(): Exporter {
  return new JsonExporter();
}

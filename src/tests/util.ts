import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createHash } from "node:crypto";
import { StructuredLogger, type LogEntry } from "../logger.js";

export function md5(s: string): string {
  return createHash("md5").update(s, "utf8").digest("hex");
}

// checksum of a directory with no files and no subdirectories
export const EMPTY_FILES_ONLY = md5("");
export const EMPTY_DIR = md5(EMPTY_FILES_ONLY);

/** Nested object: string values are file contents, objects are directories. */
export type TreeSpec = { [name: string]: string | TreeSpec };

export async function writeTree(root: string, spec: TreeSpec): Promise<void> {
  await fsp.mkdir(root, { recursive: true });
  for (const [name, value] of Object.entries(spec)) {
    const p = path.join(root, name);
    if (typeof value === "string") {
      await fsp.writeFile(p, value, "utf8");
    } else {
      await writeTree(p, value);
    }
  }
}

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), `tree-inventory-${prefix}-`));
}

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

export function captureLogger(): {
  logger: StructuredLogger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    sink: (entry) => entries.push(entry),
    minLevel: "debug",
  });
  return { logger, entries };
}

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { RECORD_FILE_NAME } from "./constants.js";
import { RecordFileError } from "./errors.js";
import {
  nameMap,
  ownEntry,
  setEntry,
  type FileListingEntry,
  type TreeRecord,
} from "./record.js";

/**
 * Like `z.record`, but every key survives (`__proto__` too) and the result
 * is a null-prototype map.
 */
function nameMapSchema<T>(
  entry: z.ZodType<T, z.ZodTypeDef, unknown>,
): z.ZodType<Record<string, T>, z.ZodTypeDef, unknown> {
  return z.unknown().transform((raw, ctx) => {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected object" });
      return z.NEVER;
    }
    const map = nameMap<T>();
    for (const [name, value] of Object.entries(raw)) {
      const parsed = entry.safeParse(value);
      if (parsed.success) {
        setEntry(map, name, parsed.data);
        continue;
      }
      for (const issue of parsed.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: issue.message,
          path: [name, ...issue.path],
        });
      }
    }
    return map;
  });
}

const fileListingEntrySchema: z.ZodType<
  FileListingEntry,
  z.ZodTypeDef,
  unknown
> = z.object({
  MD5: z.string(),
  size: z.number(),
  "last-modified-at": z.number(),
});

export const treeRecordSchema: z.ZodType<
  TreeRecord,
  z.ZodTypeDef,
  unknown
> = z.lazy(() =>
  z.object({
    MD5: z.string().optional(),
    "MD5-files_only": z.string().optional(),
    size: z.number().nonnegative().optional(),
    n_files: z.number().int().nonnegative().optional(),
    "files-size": z.number().nonnegative().optional(),
    subdirectories: nameMapSchema(treeRecordSchema).optional(),
    "file-listing": nameMapSchema(fileListingEntrySchema).optional(),
    calculated_at: z.string().optional(),
  }),
);

export function recordFileFor(dir: string): string {
  return path.join(path.resolve(dir), RECORD_FILE_NAME);
}

async function isFile(p: string): Promise<boolean> {
  return fs
    .stat(p)
    .then((st) => st.isFile())
    .catch(() => false);
}

/**
 * The record file that governs `target`: the one in `target` or in the
 * highest of its ancestors that has one. A higher-level record file always
 * wins, so a tree is never split across two inventories.
 */
export async function findRecordFile(target: string): Promise<string | null> {
  const chain: string[] = [];
  let dir = path.resolve(target);
  while (true) {
    chain.push(dir);
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  for (const candidate of chain.reverse()) {
    const file = path.join(candidate, RECORD_FILE_NAME);
    if (await isFile(file)) return file;
  }
  return null;
}

export async function readRecordFile(file: string): Promise<TreeRecord> {
  const text = await fs.readFile(file, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new RecordFileError(file, "not valid JSON", { cause: err });
  }
  const result = treeRecordSchema.safeParse(raw);
  if (!result.success) {
    const [first] = result.error.issues;
    const where = first?.path.length ? ` at ${first.path.join(".")}` : "";
    throw new RecordFileError(
      file,
      `does not match the record format${where}: ${first?.message ?? "invalid"}`,
    );
  }
  return result.data;
}

let tmpCounter = 0;

/**
 * Serialize the whole tree next to `file` and rename it into place, so a
 * crash mid-write leaves the previous checkpoint intact.
 */
export async function writeRecordFile(
  file: string,
  root: TreeRecord,
): Promise<void> {
  const text = JSON.stringify(root, null, 4);
  const tmp = path.join(
    path.dirname(file),
    `.${path.basename(file)}.${process.pid}.${tmpCounter++}.tmp`,
  );
  try {
    await fs.writeFile(tmp, text, "utf8");
    await fs.rename(tmp, file);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export interface ExtractedRecord {
  target: TreeRecord;
  // root first, ending with the target's parent
  ancestors: TreeRecord[];
}

/**
 * Walk from the record file's root record down to the node for
 * `targetPath`, creating empty records for directories not yet inventoried.
 */
export function extractRecord(
  root: TreeRecord,
  recordFile: string,
  targetPath: string,
): ExtractedRecord {
  const base = path.dirname(path.resolve(recordFile));
  const rel = path.relative(base, path.resolve(targetPath));
  if (
    rel === ".." ||
    rel.startsWith(`..${path.sep}`) ||
    path.isAbsolute(rel)
  ) {
    throw new RecordFileError(
      recordFile,
      `does not cover target directory ${targetPath}`,
    );
  }
  const parts = rel.split(path.sep).filter(Boolean);
  const ancestors: TreeRecord[] = [];
  let node = root;
  for (const name of parts) {
    ancestors.push(node);
    const subdirectories = (node.subdirectories ??= nameMap<TreeRecord>());
    node = ownEntry(subdirectories, name) ?? setEntry(subdirectories, name, {});
  }
  return { target: node, ancestors };
}

export async function removeRecordFile(file: string): Promise<void> {
  await fs.rm(file, { force: true });
}

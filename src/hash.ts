// src/hash.ts
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import fs from "node:fs/promises";
import path from "node:path";
import { createHash, type Hash } from "node:crypto";

export const HASH_STREAM_CUTOFF = 10_000_000; // ~10MB; small files do one-shot hashing
export const STREAM_HWM = 8 * 1024 * 1024; // 8MB read chunks

// Change detection only; collision resistance is not a goal.
export const CHECKSUM_ALG = "md5";

export function createChecksum(): Hash {
  return createHash(CHECKSUM_ALG);
}

/**
 * Hex digest of a file. Small files are read in one go; larger ones go
 * through a backpressured stream. If 'size' is not provided, we'll stat
 * the file.
 */
export async function fileDigest(file: string, size?: number): Promise<string> {
  const n = size ?? (await fs.stat(file)).size;

  if (n <= HASH_STREAM_CUTOFF) {
    const buf = await fs.readFile(file);
    return createChecksum().update(buf).digest("hex");
  }

  const h = createChecksum();
  const rs = createReadStream(file, { highWaterMark: STREAM_HWM });

  await pipeline(rs, async (src: AsyncIterable<Buffer>) => {
    for await (const chunk of src) {
      h.update(chunk);
    }
  });

  return h.digest("hex");
}

export interface FileHash {
  digest: string;
  size: number;
  mtimeMs: number;
}

export interface FileHasher {
  hashFile(dir: string, name: string): Promise<FileHash>;
}

export const md5FileHasher: FileHasher = {
  async hashFile(dir, name) {
    const abs = path.join(dir, name);
    const st = await fs.stat(abs);
    const digest = await fileDigest(abs, st.size);
    return { digest, size: st.size, mtimeMs: st.mtimeMs };
  },
};

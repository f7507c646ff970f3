import fsp from "node:fs/promises";
import path from "node:path";
import { fileDigest, HASH_STREAM_CUTOFF, md5FileHasher } from "../hash.js";
import { mkTmp } from "./util.js";

describe("file digests", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("hash");
    await fsp.writeFile(path.join(tmp, "hello.txt"), "hello");
    await fsp.writeFile(path.join(tmp, "empty"), "");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("one-shot path", async () => {
    expect(await fileDigest(path.join(tmp, "hello.txt"))).toBe(
      "5d41402abc4b2a76b9719d911017c592",
    );
    expect(await fileDigest(path.join(tmp, "empty"))).toBe(
      "d41d8cd98f00b204e9800998ecf8427e",
    );
  });

  test("streaming path gives the same digest", async () => {
    expect(
      await fileDigest(path.join(tmp, "hello.txt"), HASH_STREAM_CUTOFF + 1),
    ).toBe("5d41402abc4b2a76b9719d911017c592");
  });

  test("md5FileHasher reports size and mtime", async () => {
    const st = await fsp.stat(path.join(tmp, "hello.txt"));
    expect(await md5FileHasher.hashFile(tmp, "hello.txt")).toEqual({
      digest: "5d41402abc4b2a76b9719d911017c592",
      size: 5,
      mtimeMs: st.mtimeMs,
    });
  });

  test("missing files reject", async () => {
    await expect(md5FileHasher.hashFile(tmp, "nope")).rejects.toThrow(/ENOENT/);
  });
});

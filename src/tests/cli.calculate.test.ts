import fsp from "node:fs/promises";
import path from "node:path";
import { buildProgram, main } from "../cli.js";
import { parseAndRun } from "../cli-util.js";
import { ConfigurationError } from "../errors.js";
import { readRecordFile } from "../record-store.js";
import { captureLogger, md5, mkTmp, writeTree } from "./util.js";

describe("tree-inventory calculate", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkTmp("cli");
    await writeTree(tmp, { sub: { "f.txt": "f" } });
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("writes the record file for the target", async () => {
    const { logger, entries } = captureLogger();
    await parseAndRun(
      () => buildProgram({ logger }),
      ["calculate", tmp, "-j", "2", "--detail-files"],
    );

    const saved = await readRecordFile(path.join(tmp, "tree_checksum.json"));
    const subMd5 = md5(md5("f.txt" + md5("f")));
    expect(saved.subdirectories?.sub.MD5).toBe(subMd5);
    expect(saved.subdirectories?.sub["file-listing"]?.["f.txt"]?.MD5).toBe(
      md5("f"),
    );
    expect(saved.MD5).toBe(md5("sub" + subMd5 + md5("")));
    expect(entries.map((e) => e.message)).toContain("calculation complete");
  });

  test("--new and --continue together are rejected", async () => {
    const { logger } = captureLogger();
    await expect(
      parseAndRun(
        () => buildProgram({ logger }),
        ["calculate", tmp, "--new", "--continue"],
      ),
    ).rejects.toThrow(ConfigurationError);
  });

  test("a non-numeric --parallel is a usage error", async () => {
    await expect(
      parseAndRun(() => buildProgram(), ["calculate", tmp, "-j", "many"]),
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
  });

  test("main reports configuration errors with a nonzero code", async () => {
    const errors: string[] = [];
    const spy = jest
      .spyOn(console, "error")
      .mockImplementation((msg?: unknown) => {
        errors.push(String(msg));
      });
    try {
      const code = await main([
        "node",
        "tree-inventory",
        "calculate",
        tmp,
        "--new",
        "--continue",
      ]);
      expect(code).toBe(1);
      expect(errors).toEqual([
        "tree-inventory: Cannot specify both --new and --continue at the same time.",
      ]);
    } finally {
      spy.mockRestore();
    }
  });
});

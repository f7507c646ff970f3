import fsp from "node:fs/promises";
import path from "node:path";
import { compareNames, enumerateDir } from "../enumerate.js";
import { mkTmp, writeTree } from "./util.js";

describe("enumerateDir", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkTmp("enum");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("splits files and subdirectories, sorted by code unit", async () => {
    await writeTree(tmp, {
      "b.txt": "",
      "A.txt": "",
      "a.txt": "",
      zdir: { inner: "not listed" },
      Zdir: {},
      _dir: {},
    });
    expect(await enumerateDir(tmp)).toEqual({
      files: ["A.txt", "a.txt", "b.txt"],
      subdirectories: ["Zdir", "_dir", "zdir"],
    });
  });

  test("follows symlinks and skips broken ones", async () => {
    await writeTree(tmp, { real: { "f.txt": "f" }, "data.txt": "d" });
    await fsp.symlink(path.join(tmp, "real"), path.join(tmp, "link-dir"));
    await fsp.symlink(path.join(tmp, "data.txt"), path.join(tmp, "link-file"));
    await fsp.symlink(path.join(tmp, "nowhere"), path.join(tmp, "broken"));

    expect(await enumerateDir(tmp)).toEqual({
      files: ["data.txt", "link-file"],
      subdirectories: ["link-dir", "real"],
    });
  });

  test("rejects when the directory cannot be read", async () => {
    await expect(enumerateDir(path.join(tmp, "missing"))).rejects.toThrow(
      /ENOENT/,
    );
  });

  test("compareNames ignores locale", () => {
    expect(["é", "z", "e", "Z"].sort(compareNames)).toEqual([
      "Z",
      "e",
      "z",
      "é",
    ]);
  });
});

import * as fs from "fs/promises";
import * as path from "path";
import * as tmp from "tmp";
import { removeLocalArtifacts } from "../../src/core";

describe("removeLocalArtifacts", () => {
  let tmpDir: string;
  let cleanup: () => void;

  beforeEach(async () => {
    const tmpObj = tmp.dirSync({ unsafeCleanup: true });
    tmpDir = tmpObj.name;
    cleanup = tmpObj.removeCallback;

    await fs.writeFile(path.join(tmpDir, "a.zip"), "a");
    await fs.writeFile(path.join(tmpDir, "b.zip"), "b");
    await fs.writeFile(path.join(tmpDir, ".hidden.zip"), "h");
    await fs.writeFile(path.join(tmpDir, "keep.txt"), "keep");
    await fs.mkdir(path.join(tmpDir, "PROJECT", "sub"), { recursive: true });
    await fs.writeFile(path.join(tmpDir, "PROJECT", "sub", "doc.txt"), "doc");
    await fs.mkdir(path.join(tmpDir, "other"));
    await fs.writeFile(path.join(tmpDir, "other", "nested.zip"), "n");
    await fs.mkdir(path.join(tmpDir, "folder.zip"));
  });

  afterEach(() => {
    cleanup();
  });

  it("should remove top-level zips and the project directory", async () => {
    const removed = await removeLocalArtifacts(tmpDir, "PROJECT");

    expect(removed).toEqual([
      path.join(tmpDir, ".hidden.zip"),
      path.join(tmpDir, "a.zip"),
      path.join(tmpDir, "b.zip"),
      path.join(tmpDir, "PROJECT"),
    ]);
    expect((await fs.readdir(tmpDir)).sort()).toEqual([
      "folder.zip",
      "keep.txt",
      "other",
    ]);
    expect(await fs.readdir(path.join(tmpDir, "other"))).toEqual(["nested.zip"]);
  });

  it("should do nothing the second time", async () => {
    await removeLocalArtifacts(tmpDir, "PROJECT");

    expect(await removeLocalArtifacts(tmpDir, "PROJECT")).toEqual([]);
  });

  it("should not require the project directory to exist", async () => {
    const removed = await removeLocalArtifacts(tmpDir, "MISSING");

    expect(removed).toHaveLength(3);
    expect(await fs.readdir(path.join(tmpDir, "PROJECT"))).toEqual(["sub"]);
  });
});

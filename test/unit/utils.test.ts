import * as fs from "fs/promises";
import * as path from "path";
import { Readable } from "stream";
import * as tmp from "tmp";
import {
  pathExists,
  isFile,
  isDirectory,
  ensureDirectoryExists,
  removePath,
  writeStreamToFile,
  toSafeFileName,
  formatRelativePath,
  formatTimestamp,
  codeArchiveName,
  docArchiveKey,
  formatDuration,
} from "../../src/utils";
import { TransferError, TransferProgress } from "../../src/types";
import { failingStream } from "../helpers/in-memory-store";

describe("File System Utilities", () => {
  let tmpDir: string;
  let cleanup: () => void;

  beforeEach(() => {
    const tmpObj = tmp.dirSync({ unsafeCleanup: true });
    tmpDir = tmpObj.name;
    cleanup = tmpObj.removeCallback;
  });

  afterEach(() => {
    cleanup();
  });

  describe("pathExists / isFile", () => {
    it("should report existing files", async () => {
      const filePath = path.join(tmpDir, "test.txt");
      await fs.writeFile(filePath, "test content");

      expect(await pathExists(filePath)).toBe(true);
      expect(await isFile(filePath)).toBe(true);
    });

    it("should not treat directories as files", async () => {
      expect(await pathExists(tmpDir)).toBe(true);
      expect(await isFile(tmpDir)).toBe(false);
    });

    it("should return false for missing paths", async () => {
      const filePath = path.join(tmpDir, "nonexistent.txt");

      expect(await pathExists(filePath)).toBe(false);
      expect(await isFile(filePath)).toBe(false);
    });
  });

  describe("ensureDirectoryExists", () => {
    it("should create nested directories and report creation once", async () => {
      const dirPath = path.join(tmpDir, "a", "b");

      expect(await ensureDirectoryExists(dirPath)).toBe(true);
      expect(await ensureDirectoryExists(dirPath)).toBe(false);
      expect((await fs.stat(dirPath)).isDirectory()).toBe(true);
    });
  });

  describe("removePath", () => {
    it("should remove files and directory trees", async () => {
      const filePath = path.join(tmpDir, "file.txt");
      const dirPath = path.join(tmpDir, "dir");
      await fs.writeFile(filePath, "x");
      await fs.mkdir(path.join(dirPath, "nested"), { recursive: true });
      await fs.writeFile(path.join(dirPath, "nested", "inner.txt"), "y");

      await removePath(filePath);
      await removePath(dirPath);

      expect(await fs.readdir(tmpDir)).toEqual([]);
    });

    it("should ignore missing paths", async () => {
      await expect(
        removePath(path.join(tmpDir, "missing"))
      ).resolves.toBeUndefined();
    });
  });

  describe("writeStreamToFile", () => {
    it("should write every chunk and report progress", async () => {
      const destPath = path.join(tmpDir, "out.txt");
      const progress: TransferProgress[] = [];

      const bytes = await writeStreamToFile(
        Readable.from([Buffer.from("hello "), Buffer.from("world!")]),
        destPath,
        12,
        (p) => progress.push(p)
      );

      expect(bytes).toBe(12);
      expect(await fs.readFile(destPath, "utf8")).toBe("hello world!");
      expect(progress).toEqual([
        { bytes: 6, fraction: 0.5 },
        { bytes: 12, fraction: 1 },
      ]);
    });

    it("should report bytes only when the size is unknown", async () => {
      const progress: TransferProgress[] = [];

      await writeStreamToFile(
        Readable.from([Buffer.from("abc")]),
        path.join(tmpDir, "out.bin"),
        undefined,
        (p) => progress.push(p)
      );

      expect(progress).toEqual([{ bytes: 3, fraction: undefined }]);
    });

    it("should leave no partial file when the stream fails", async () => {
      const destPath = path.join(tmpDir, "partial.txt");

      await expect(
        writeStreamToFile(failingStream(Buffer.from("0123456789")), destPath)
      ).rejects.toBeInstanceOf(TransferError);

      expect(await pathExists(destPath)).toBe(false);
    });

    it("should never remove a directory already at the destination", async () => {
      const destPath = path.join(tmpDir, "x");
      await fs.mkdir(destPath);
      await fs.writeFile(path.join(destPath, "important.txt"), "keep me");

      await expect(
        writeStreamToFile(Readable.from([Buffer.from("file")]), destPath)
      ).rejects.toBeInstanceOf(TransferError);

      expect(await fs.readFile(path.join(destPath, "important.txt"), "utf8")).toBe(
        "keep me"
      );
    });

    it("should not overwrite or delete an existing file", async () => {
      const destPath = path.join(tmpDir, "existing.txt");
      await fs.writeFile(destPath, "original");

      await expect(
        writeStreamToFile(Readable.from([Buffer.from("replacement")]), destPath)
      ).rejects.toBeInstanceOf(TransferError);

      expect(await fs.readFile(destPath, "utf8")).toBe("original");
    });
  });

  describe("isDirectory", () => {
    it("should distinguish directories from files and missing paths", async () => {
      const filePath = path.join(tmpDir, "file.txt");
      await fs.writeFile(filePath, "x");

      expect(await isDirectory(tmpDir)).toBe(true);
      expect(await isDirectory(filePath)).toBe(false);
      expect(await isDirectory(path.join(tmpDir, "missing"))).toBe(false);
    });
  });

  describe("toSafeFileName", () => {
    it("should replace path separators", () => {
      expect(toSafeFileName("Q1/Q2 report")).toBe("Q1_Q2 report");
      expect(toSafeFileName("a\\b")).toBe("a_b");
    });

    it("should neutralise dot segments", () => {
      expect(toSafeFileName("..")).toBe("__");
      expect(toSafeFileName(".")).toBe("_");
    });

    it("should leave ordinary names alone", () => {
      expect(toSafeFileName("notes.txt")).toBe("notes.txt");
    });
  });

  describe("formatRelativePath", () => {
    it("should prefix paths inside the base", () => {
      expect(formatRelativePath("/work", "/work/PROJECT.zip")).toBe(
        "./PROJECT.zip"
      );
    });

    it("should leave paths outside the base as relative", () => {
      expect(formatRelativePath("/work/a", "/work/b.zip")).toBe("../b.zip");
    });
  });
});

describe("Archive naming", () => {
  const date = new Date(2024, 0, 5, 9, 3, 7);

  it("should format local time as YYYYMMDDHHMMSS", () => {
    expect(formatTimestamp(date)).toBe("20240105090307");
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 59))).toBe(
      "20231231235959"
    );
  });

  it("should name code archives code_v<ts><name>.zip", () => {
    expect(codeArchiveName("api", date)).toBe("code_v20240105090307api.zip");
  });

  it("should key documentation archives doc_v<ts>_<project>.zip", () => {
    expect(docArchiveKey("PROJECT", date)).toBe(
      "doc_v20240105090307_PROJECT.zip"
    );
  });

  it("should sort chronologically as strings", () => {
    const earlier = codeArchiveName("a", new Date(2024, 8, 9, 23, 0, 0));
    const later = codeArchiveName("a", new Date(2024, 9, 1, 0, 0, 0));
    expect([later, earlier].sort()).toEqual([earlier, later]);
  });
});

describe("formatDuration", () => {
  it("should pick a unit by magnitude", () => {
    expect(formatDuration(0.5)).toBe("0.50ms");
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(12345)).toBe("12.3s");
  });
});

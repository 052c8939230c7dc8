import * as path from "path";
import * as fs from "fs/promises";
import { createWriteStream } from "fs";
import archiver from "archiver";
import { BackupError } from "../types";
import { removePath } from "../utils";

/**
 * Zip a directory's contents, entries relative to the directory,
 * into `<outputDir>/<basename>.zip`
 */
export async function zipDirectory(
  dirPath: string,
  outputDir: string = process.cwd()
): Promise<string> {
  const source = path.resolve(dirPath);
  const archivePath = path.resolve(outputDir, `${path.basename(source)}.zip`);

  const stats = await fs.stat(source).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new BackupError(`Cannot zip ${source}: not a directory`);
  }

  const output = createWriteStream(archivePath);
  const archive = archiver("zip", { zlib: { level: 9 } });

  const finished = new Promise<void>((resolve, reject) => {
    output.on("close", resolve);
    output.on("error", reject);
    archive.on("error", reject);
    archive.on("warning", reject);
  });

  archive.pipe(output);
  archive.directory(source, false);

  try {
    await Promise.all([archive.finalize(), finished]);
  } catch (error) {
    archive.abort();
    await removePath(archivePath);
    throw error;
  }

  return archivePath;
}

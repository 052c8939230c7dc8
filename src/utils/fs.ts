import * as fs from "fs/promises";
import { createWriteStream } from "fs";
import * as path from "path";
import { Readable, Transform } from "stream";
import { pipeline } from "stream/promises";
import { ProgressCallback, TransferError } from "../types";

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path exists and is a regular file
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Check if a path exists and is a directory
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Ensure directory exists, creating it if necessary
 * Returns true when the directory had to be created
 */
export async function ensureDirectoryExists(dirPath: string): Promise<boolean> {
  const created = await fs.mkdir(dirPath, { recursive: true });
  return created !== undefined;
}

/**
 * Remove file or directory
 */
export async function removePath(filePath: string): Promise<void> {
  try {
    const stats = await fs.stat(filePath);
    if (stats.isDirectory()) {
      await fs.rm(filePath, { recursive: true });
    } else {
      await fs.unlink(filePath);
    }
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * Stream a readable source to a new file, reporting progress per chunk.
 * The destination must not exist. On any failure the file this call
 * created is deleted and a TransferError is thrown, so the file is either
 * complete or absent; a pre-existing path is never touched.
 */
export async function writeStreamToFile(
  source: Readable,
  destPath: string,
  totalBytes?: number,
  onProgress?: ProgressCallback
): Promise<number> {
  let bytes = 0;
  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      bytes += chunk.length;
      onProgress?.({
        bytes,
        fraction: totalBytes ? Math.min(bytes / totalBytes, 1) : undefined,
      });
      callback(null, chunk);
    },
  });

  const existed = await pathExists(destPath);
  try {
    await pipeline(source, counter, createWriteStream(destPath, { flags: "wx" }));
  } catch (error) {
    if (!existed) {
      await fs.rm(destPath, { force: true });
    }
    throw new TransferError(destPath, error);
  }

  return bytes;
}

/**
 * Make a remote entry name safe to use as a single path segment
 */
export function toSafeFileName(name: string): string {
  if (name === "." || name === "..") {
    return name.replace(/\./g, "_");
  }
  return name.replace(/[\/\\]/g, "_");
}

/**
 * Format a path as a relative path with proper prefix
 * Ensures paths like "src" become "./src" for clarity
 */
export function formatRelativePath(basePath: string, filePath: string): string {
  const relative = path.relative(basePath, filePath);
  if (relative.startsWith(".") || path.isAbsolute(relative)) {
    return relative;
  }
  return `./${relative}`;
}

export function isErrnoException(
  error: unknown
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

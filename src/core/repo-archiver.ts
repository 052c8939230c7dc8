import * as path from "path";
import { spawn } from "child_process";
import * as tmp from "tmp";
import { GitCommandError, RepositoryDescriptor } from "../types";
import { ensureDirectoryExists, removePath } from "../utils";
import { out } from "../cli/output";

/**
 * Run git and wait for completion, capturing stderr for the error message
 */
export async function runGit(args: string[], cwd?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn("git", args, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    });

    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new GitCommandError(args, code, stderr));
      }
    });

    child.on("error", (error) => {
      reject(new GitCommandError(args, null, error.message));
    });
  });
}

/**
 * Clone a repository at its branch into a scratch directory and write the
 * tracked content of that ref to `<outputDir>/<name>.zip`.
 * Returns the archive path.
 */
export async function archiveRepository(
  repository: RepositoryDescriptor,
  outputDir: string
): Promise<string> {
  const archivePath = path.resolve(outputDir, `${repository.name}.zip`);
  await ensureDirectoryExists(path.dirname(archivePath));

  const checkout = tmp.dirSync({ prefix: "drive-backup-", unsafeCleanup: true });
  try {
    out.taskLine(`Cloning ${repository.url} (${repository.branch})`);
    await runGit([
      "clone",
      "--quiet",
      "--single-branch",
      "--branch",
      repository.branch,
      repository.url,
      checkout.name,
    ]);

    await runGit(
      ["archive", "--format=zip", `--output=${archivePath}`, "HEAD"],
      checkout.name
    );
  } catch (error) {
    await removePath(archivePath);
    throw error;
  } finally {
    checkout.removeCallback();
  }

  return archivePath;
}

/**
 * Base class for errors the CLI knows how to report
 */
export class BackupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or malformed configuration / repository descriptor file
 */
export class ConfigError extends BackupError {
  constructor(message: string, readonly problems: string[] = []) {
    super(
      problems.length > 0 ? `${message}\n  ${problems.join("\n  ")}` : message
    );
  }
}

/**
 * A git subprocess exited unsuccessfully
 */
export class GitCommandError extends BackupError {
  constructor(
    readonly args: string[],
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(
      `git ${args.join(" ")} failed (exit ${exitCode ?? "signal"}): ${
        stderr.trim() || "no output"
      }`
    );
  }
}

/**
 * A chunked upload or download failed; the partial local file is gone
 */
export class TransferError extends BackupError {
  constructor(readonly path: string, cause: unknown) {
    super(
      `Transfer failed for ${path}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
  }
}

/**
 * A native document type with no export format
 */
export class UnsupportedExportError extends BackupError {
  constructor(readonly mimeType: string, readonly fileName: string) {
    super(`Unsupported export type ${mimeType} for "${fileName}"`);
  }
}

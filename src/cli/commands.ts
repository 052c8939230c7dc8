import * as path from "path";
import {
  ArchiveOptions,
  BackupConfig,
  BackupError,
  CommandOptions,
  ConfigError,
  DEFAULT_BRANCH,
  EnvironmentKey,
  ExitCode,
  PullOptions,
  RunOptions,
  TransferError,
} from "../types";
import { ConfigManager, RUN_REQUIRED_KEYS } from "../config";
import {
  BackupPipeline,
  FileCredentialStore,
  FolderSynchronizer,
  GoogleDriveStore,
  S3ObjectStorage,
  archiveRepository,
  authorize,
  removeLocalArtifacts,
} from "../core";
import { formatRelativePath } from "../utils";
import { setTracingEnabled } from "../utils/trace";
import { out } from "./output";

/**
 * Load configuration for a command from the current directory
 */
async function loadConfig(
  options: CommandOptions,
  required: readonly EnvironmentKey[]
): Promise<{ manager: ConfigManager; config: BackupConfig }> {
  if (options.debug) {
    setTracingEnabled(true);
  }
  const manager = new ConfigManager(process.cwd(), options.envFile);
  const config = await manager.load(required);
  return { manager, config };
}

/**
 * Authorize against Google Drive, reusing the persisted token when possible
 */
async function connectDrive(config: BackupConfig): Promise<GoogleDriveStore> {
  out.task("Connecting to Google Drive");
  const client = await authorize({
    store: new FileCredentialStore(config.tokenFile),
    clientSecretFile: config.clientSecretFile,
  });
  out.done("Connected to Google Drive");
  return GoogleDriveStore.connect(client);
}

/**
 * Run the full backup
 */
export async function run(options: RunOptions): Promise<void> {
  const { manager, config } = await loadConfig(options, RUN_REQUIRED_KEYS);
  const repositories = await manager.loadRepositories(
    options.repos ?? config.reposFile
  );

  const store = await connectDrive(config);
  const objectStorage = new S3ObjectStorage(config.s3);

  const result = await new BackupPipeline({ store, objectStorage })
    .run(config, repositories, { keepGoing: options.keepGoing ?? false })
    .finally(() => objectStorage.destroy());

  const failed = result.repositories.filter((outcome) => !outcome.ok);
  out.obj({
    Repositories: `${result.repositories.length - failed.length}/${repositories.length}`,
    Documents: result.sync.filesDownloaded,
    Skipped: result.sync.filesSkipped || undefined,
    Archive: result.upload.ok ? result.upload.key : undefined,
  });

  if (!result.upload.ok) {
    out.errorBlock("FAILED", "Documentation upload failed");
    out.exit(ExitCode.UPLOAD_FAILED);
  }

  if (failed.length > 0) {
    out.warnBlock(
      "PARTIAL",
      `${failed.length} ${plural("repository", failed.length)} failed`
    );
    for (const outcome of failed) {
      if (!outcome.ok) {
        out.log(`  ${outcome.repository.name}: ${outcome.error.message}`);
      }
    }
    out.exit(ExitCode.REPOSITORIES_FAILED);
  }

  out.successBlock("BACKED UP", config.projectName);
  out.exit(ExitCode.SUCCESS);
}

/**
 * Authorize only, persisting the token for unattended runs
 */
export async function auth(options: CommandOptions): Promise<void> {
  const { config } = await loadConfig(options, []);
  await connectDrive(config);
  out.successBlock(
    "AUTHORIZED",
    `token saved to ${formatRelativePath(process.cwd(), config.tokenFile)}`
  );
  out.exit(ExitCode.SUCCESS);
}

/**
 * Mirror a Drive folder into the current directory
 */
export async function pull(
  folderId: string | undefined,
  name: string | undefined,
  options: PullOptions
): Promise<void> {
  const { config } = await loadConfig(options, []);
  const folder = folderId ?? config.docFolderId;
  const folderName = name ?? config.projectName;
  if (!folder || !folderName) {
    throw new ConfigError(
      "pull needs a folder id and a name (arguments, or GOOGLE_DRIVE_DOC_FOLDER_ID and PROJECT_NAME)"
    );
  }

  const store = await connectDrive(config);

  out.task(`Downloading ${folderName}`, 5);
  const result = await new FolderSynchronizer(store).sync(
    folder,
    config.workingDir,
    folderName
  );
  out.done();

  out.successBlock(
    "PULLED",
    formatRelativePath(process.cwd(), path.join(config.workingDir, folderName))
  );
  out.obj({
    Downloaded: result.filesDownloaded,
    Existing: result.filesSkipped,
    Directories: result.directoriesCreated,
  });
  for (const warning of result.warnings) {
    out.warn(warning);
  }
  out.exit(ExitCode.SUCCESS);
}

/**
 * Clone and zip one repository into the current directory
 */
export async function archive(
  url: string,
  name: string,
  options: ArchiveOptions
): Promise<void> {
  if (options.debug) {
    setTracingEnabled(true);
  }
  out.task(`Archiving ${name}`);
  const archivePath = await archiveRepository(
    { url, name, branch: options.branch ?? DEFAULT_BRANCH },
    process.cwd()
  );
  out.done();
  out.successBlock("ARCHIVED", formatRelativePath(process.cwd(), archivePath));
  out.exit(ExitCode.SUCCESS);
}

/**
 * Remove local zips and the project directory
 */
export async function clean(options: CommandOptions): Promise<void> {
  const { config } = await loadConfig(options, ["PROJECT_NAME"]);

  out.task("Removing local files");
  const removed = await removeLocalArtifacts(
    config.workingDir,
    config.projectName
  );
  out.done();

  if (removed.length === 0) {
    out.success("Nothing to remove");
  } else {
    for (const removedPath of removed) {
      out.log(`  ${formatRelativePath(process.cwd(), removedPath)}`);
    }
  }
  out.exit(ExitCode.SUCCESS);
}

/**
 * Report a failed command and exit with the matching code
 */
export function fail(error: unknown): never {
  if (error instanceof TransferError) {
    out.errorBlock("ABORTED", "Transfer failed");
    out.error(error);
    out.exit(ExitCode.TRANSFER_FAILED);
  }
  if (error instanceof ConfigError) {
    out.errorBlock("CONFIG", error.message);
    out.exit(ExitCode.FAILURE);
  }
  if (error instanceof BackupError) {
    out.errorBlock("FAILED", error.message);
    out.exit(ExitCode.FAILURE);
  }
  out.errorBlock("FAILED", "Unexpected error");
  out.crash(error, ExitCode.FAILURE);
}

function plural(word: string, count: number): string {
  if (count === 1) return word;
  return word.endsWith("y") ? `${word.slice(0, -1)}ies` : `${word}s`;
}

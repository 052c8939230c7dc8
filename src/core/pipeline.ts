import * as path from "path";
import {
  BackupConfig,
  DocumentStore,
  ObjectStorage,
  PipelineResult,
  RepositoryDescriptor,
  RepositoryOutcome,
  TransferError,
} from "../types";
import { codeArchiveName, docArchiveKey } from "../utils";
import { span } from "../utils/trace";
import { out } from "../cli/output";
import { archiveRepository } from "./repo-archiver";
import { zipDirectory } from "./local-archiver";
import { FolderSynchronizer } from "./folder-sync";
import { removeLocalArtifacts } from "./cleanup";

export interface PipelineDependencies {
  store: DocumentStore;
  objectStorage: ObjectStorage;
  archiveRepository?: typeof archiveRepository;
  zipDirectory?: typeof zipDirectory;
  clock?: () => Date;
}

export interface PipelineOptions {
  /**
   * Record a failing repository and continue with the next one
   */
  keepGoing?: boolean;
}

/**
 * The backup run: repositories to the Drive code folder, then the Drive
 * doc folder to object storage, then local cleanup. Strictly sequential.
 */
export class BackupPipeline {
  private readonly archiveRepository: typeof archiveRepository;
  private readonly zipDirectory: typeof zipDirectory;
  private readonly clock: () => Date;

  constructor(private readonly deps: PipelineDependencies) {
    this.archiveRepository = deps.archiveRepository ?? archiveRepository;
    this.zipDirectory = deps.zipDirectory ?? zipDirectory;
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(
    config: BackupConfig,
    repositories: RepositoryDescriptor[],
    options: PipelineOptions = {}
  ): Promise<PipelineResult> {
    const { store, objectStorage } = this.deps;

    out.task("Cleaning up the code folder");
    const removed = await span(
      "clear code folder",
      store.clearFolder(config.codeFolderId)
    );
    out.done(`Cleaned up the code folder (${removed} removed)`);

    const outcomes = await this.backupRepositories(
      config,
      repositories,
      options.keepGoing ?? false
    );

    out.task("Downloading documentation", 5);
    const sync = await span(
      "download documentation",
      new FolderSynchronizer(store).sync(
        config.docFolderId,
        config.workingDir,
        config.projectName
      )
    );
    out.done(
      `Downloaded documentation (${sync.filesDownloaded} new, ${sync.filesSkipped} existing)`
    );
    for (const warning of sync.warnings) {
      out.warn(warning);
    }

    out.task("Compressing documentation");
    const archivePath = await span(
      "zip documentation",
      this.zipDirectory(
        path.join(config.workingDir, config.projectName),
        config.workingDir
      )
    );
    out.done();

    const key = docArchiveKey(config.projectName, this.clock());
    out.task(`Uploading ${key}`);
    const upload = await span(
      "upload documentation",
      objectStorage.upload(archivePath, config.s3.bucket, key)
    );
    if (!upload.ok) {
      out.error(upload.message);
      out.warn("Local files kept for a manual retry");
      return { repositories: outcomes, sync, archivePath, upload, cleaned: false };
    }
    out.done(`Uploaded ${key} to ${upload.bucket}`);

    out.task("Removing local files");
    await removeLocalArtifacts(config.workingDir, config.projectName);
    out.done();

    return { repositories: outcomes, sync, archivePath, upload, cleaned: true };
  }

  private async backupRepositories(
    config: BackupConfig,
    repositories: RepositoryDescriptor[],
    keepGoing: boolean
  ): Promise<RepositoryOutcome[]> {
    const outcomes: RepositoryOutcome[] = [];

    for (const repository of repositories) {
      out.task(`Archiving ${repository.name}`, 5);
      try {
        const archivePath = await span(
          `clone ${repository.name}`,
          this.archiveRepository(repository, config.workingDir)
        );

        const remoteName = codeArchiveName(repository.name, this.clock());
        out.update(`Uploading ${remoteName}`);
        const remoteId = await span(
          `upload ${remoteName}`,
          this.deps.store.uploadFile(
            config.codeFolderId,
            archivePath,
            remoteName,
            (progress) => out.transfer(`Uploading ${remoteName}`, progress)
          )
        );
        out.done(`${remoteName} uploaded (${remoteId})`);

        outcomes.push({ repository, ok: true, archivePath, remoteName, remoteId });
      } catch (error) {
        if (
          !keepGoing ||
          error instanceof TransferError ||
          !(error instanceof Error)
        ) {
          throw error;
        }
        out.error(`${repository.name}: ${error.message}`);
        outcomes.push({ repository, ok: false, error });
      }
    }

    return outcomes;
  }
}

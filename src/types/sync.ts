import { RepositoryDescriptor } from "./config";
import { UploadResult } from "./storage";

/**
 * Folder synchronization result
 */
export interface SyncResult {
  filesDownloaded: number;
  filesSkipped: number;
  directoriesCreated: number;
  warnings: string[];
}

/**
 * Action taken for one remote entry
 */
export enum SyncOperation {
  CREATE_DIRECTORY = "create_directory",
  DOWNLOAD_FILE = "download_file",
  EXPORT_FILE = "export_file",
  SKIP_EXISTING = "skip_existing",
  SKIP_REVISITED = "skip_revisited",
  SKIP_CONFLICT = "skip_conflict",
}

/**
 * Outcome for a single repository in the archive/upload loop
 */
export type RepositoryOutcome =
  | {
      repository: RepositoryDescriptor;
      ok: true;
      archivePath: string;
      remoteName: string;
      remoteId: string;
    }
  | { repository: RepositoryDescriptor; ok: false; error: Error };

/**
 * Pipeline run result
 */
export interface PipelineResult {
  repositories: RepositoryOutcome[];
  sync: SyncResult;
  archivePath: string;
  upload: UploadResult;
  cleaned: boolean;
}

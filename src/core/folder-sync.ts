import * as path from "path";
import {
  DocumentStore,
  FolderRef,
  RemoteFileEntry,
  SyncOperation,
  SyncResult,
} from "../types";
import {
  ensureDirectoryExists,
  getExportFileName,
  getExportMimeType,
  isDirectory,
  isFile,
  isFolder,
  isNativeDocument,
  pathExists,
  toSafeFileName,
} from "../utils";
import { out } from "../cli/output";

/**
 * What happened to one remote entry during a pass
 */
export interface SyncEvent {
  operation: SyncOperation;
  entry: RemoteFileEntry;
  localPath: string;
}

export interface FolderSyncOptions {
  /**
   * Called once per entry, in visiting order
   */
  onEntry?: (event: SyncEvent) => void;
}

/**
 * Mirrors a remote folder tree into a local directory.
 *
 * Children are visited in ascending name order and existing local paths are
 * never overwritten, so a pass that was interrupted can simply be re-run.
 * A remote file and folder that map to the same local name keep whichever
 * was mirrored first; the other is skipped with a warning.
 * Any failure aborts the pass.
 */
export class FolderSynchronizer {
  private visited = new Set<FolderRef>();
  private result: SyncResult = emptyResult();

  constructor(
    private readonly store: DocumentStore,
    private readonly options: FolderSyncOptions = {}
  ) {}

  /**
   * Mirror `folder` into `<location>/<folderName>`
   */
  async sync(
    folder: FolderRef,
    location: string,
    folderName: string
  ): Promise<SyncResult> {
    this.visited = new Set();
    this.result = emptyResult();

    await this.syncFolder(folder, path.join(location, toSafeFileName(folderName)));

    return this.result;
  }

  private async syncFolder(folder: FolderRef, localDir: string): Promise<void> {
    this.visited.add(folder);

    if (await ensureDirectoryExists(localDir)) {
      this.result.directoriesCreated++;
    }

    const children = sortByName(await this.store.listChildren(folder));
    const total = children.length;

    for (const [index, child] of children.entries()) {
      const position = `(${index + 1}/${total})`;
      out.update(`${position} ${child.name}`);

      if (isFolder(child)) {
        const childDir = path.join(localDir, toSafeFileName(child.name));
        if (this.visited.has(child.id)) {
          this.result.warnings.push(`Skipped ${childDir}: folder already visited`);
          this.emit(SyncOperation.SKIP_REVISITED, child, childDir);
          continue;
        }
        if ((await pathExists(childDir)) && !(await isDirectory(childDir))) {
          this.result.warnings.push(
            `Skipped ${childDir}: a file with the same name exists`
          );
          this.emit(SyncOperation.SKIP_CONFLICT, child, childDir);
          continue;
        }
        this.emit(SyncOperation.CREATE_DIRECTORY, child, childDir);
        await this.syncFolder(child.id, childDir);
      } else if (isNativeDocument(child)) {
        await this.syncNativeDocument(child, localDir, position);
      } else {
        const localPath = path.join(localDir, toSafeFileName(child.name));
        if (await this.skipExisting(child, localPath)) continue;

        await this.run(SyncOperation.DOWNLOAD_FILE, child, localPath, () =>
          this.store.downloadFile(child, localPath, (progress) =>
            out.transfer(`${position} ${child.name}`, progress)
          )
        );
      }
    }
  }

  private async syncNativeDocument(
    entry: RemoteFileEntry,
    localDir: string,
    position: string
  ): Promise<void> {
    const exportMimeType = getExportMimeType(entry);
    const localPath = path.join(
      localDir,
      toSafeFileName(getExportFileName(entry.name, exportMimeType))
    );
    if (await this.skipExisting(entry, localPath)) return;

    await this.run(SyncOperation.EXPORT_FILE, entry, localPath, () =>
      this.store.exportFile(entry, exportMimeType, localPath, (progress) =>
        out.transfer(`${position} ${entry.name}`, progress)
      )
    );
  }

  private async skipExisting(
    entry: RemoteFileEntry,
    localPath: string
  ): Promise<boolean> {
    if (await isFile(localPath)) {
      this.result.filesSkipped++;
      this.emit(SyncOperation.SKIP_EXISTING, entry, localPath);
      return true;
    }
    if (await pathExists(localPath)) {
      this.result.warnings.push(
        `Skipped ${localPath}: a directory with the same name exists`
      );
      this.emit(SyncOperation.SKIP_CONFLICT, entry, localPath);
      return true;
    }
    return false;
  }

  private async run(
    operation: SyncOperation,
    entry: RemoteFileEntry,
    localPath: string,
    transfer: () => Promise<void>
  ): Promise<void> {
    await transfer();
    this.result.filesDownloaded++;
    out.taskLine(entry.name);
    this.emit(operation, entry, localPath);
  }

  private emit(
    operation: SyncOperation,
    entry: RemoteFileEntry,
    localPath: string
  ): void {
    this.options.onEntry?.({ operation, entry, localPath });
  }
}

/**
 * Stable ascending order by name (code unit order, locale independent)
 */
export function sortByName(entries: RemoteFileEntry[]): RemoteFileEntry[] {
  return [...entries].sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
}

function emptyResult(): SyncResult {
  return {
    filesDownloaded: 0,
    filesSkipped: 0,
    directoriesCreated: 0,
    warnings: [],
  };
}

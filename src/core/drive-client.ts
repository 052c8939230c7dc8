import * as fs from "fs/promises";
import { createReadStream } from "fs";
import { Readable } from "stream";
import { google, drive_v3, Auth } from "googleapis";
import {
  BackupError,
  DocumentStore,
  FolderRef,
  ProgressCallback,
  RemoteFileEntry,
  TransferError,
} from "../types";
import { getMimeType, writeStreamToFile } from "../utils";

const PAGE_SIZE = 1000;
const LIST_FIELDS = "nextPageToken, files(id, name, mimeType, size)";

/**
 * The subset of the Drive v3 `files` resource the store calls
 */
export interface DriveFiles {
  list(
    params: drive_v3.Params$Resource$Files$List
  ): Promise<{ data: drive_v3.Schema$FileList }>;
  delete(params: drive_v3.Params$Resource$Files$Delete): Promise<unknown>;
  create(
    params: drive_v3.Params$Resource$Files$Create,
    options: { onUploadProgress: (event: { bytesRead: number }) => void }
  ): Promise<{ data: drive_v3.Schema$File }>;
  get(
    params: drive_v3.Params$Resource$Files$Get,
    options: { responseType: "stream" }
  ): Promise<{ data: Readable }>;
  export(
    params: drive_v3.Params$Resource$Files$Export,
    options: { responseType: "stream" }
  ): Promise<{ data: Readable }>;
}

/**
 * Google Drive v3 implementation of the document store
 */
export class GoogleDriveStore implements DocumentStore {
  constructor(private readonly files: DriveFiles) {}

  static connect(auth: Auth.OAuth2Client): GoogleDriveStore {
    return new GoogleDriveStore(google.drive({ version: "v3", auth }).files);
  }

  /**
   * List every direct child of a folder, following page tokens to the end
   */
  async listChildren(folder: FolderRef): Promise<RemoteFileEntry[]> {
    const entries: RemoteFileEntry[] = [];
    let pageToken: string | undefined;

    do {
      const response = await this.files.list({
        q: `'${escapeQueryValue(folder)}' in parents and trashed = false`,
        pageSize: PAGE_SIZE,
        pageToken,
        fields: LIST_FIELDS,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      });

      for (const file of response.data.files ?? []) {
        const entry = toRemoteFileEntry(file);
        if (entry) {
          entries.push(entry);
        }
      }
      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);

    return entries;
  }

  /**
   * Delete every direct child of a folder (not recursive)
   */
  async clearFolder(folder: FolderRef): Promise<number> {
    const children = await this.listChildren(folder);
    for (const child of children) {
      await this.files.delete({
        fileId: child.id,
        supportsAllDrives: true,
      });
    }
    return children.length;
  }

  async uploadFile(
    folder: FolderRef,
    localPath: string,
    displayName: string,
    onProgress?: ProgressCallback
  ): Promise<string> {
    const { size } = await fs.stat(localPath);
    const mimeType = getMimeType(localPath);

    let id: string | null | undefined;
    try {
      const response = await this.files.create(
        {
          requestBody: { name: displayName, mimeType, parents: [folder] },
          media: { mimeType, body: createReadStream(localPath) },
          fields: "id",
          supportsAllDrives: true,
        },
        {
          onUploadProgress: (event: { bytesRead: number }) =>
            onProgress?.({
              bytes: event.bytesRead,
              fraction: size > 0 ? Math.min(event.bytesRead / size, 1) : 1,
            }),
        }
      );
      id = response.data.id;
    } catch (error) {
      throw new TransferError(localPath, error);
    }

    if (!id) {
      throw new BackupError(`Drive returned no id for uploaded ${displayName}`);
    }
    return id;
  }

  async downloadFile(
    entry: RemoteFileEntry,
    destPath: string,
    onProgress?: ProgressCallback
  ): Promise<void> {
    const source = await this.openStream(destPath, () =>
      this.files.get(
        { fileId: entry.id, alt: "media", supportsAllDrives: true },
        { responseType: "stream" }
      )
    );
    await writeStreamToFile(source, destPath, entry.size, onProgress);
  }

  async exportFile(
    entry: RemoteFileEntry,
    exportMimeType: string,
    destPath: string,
    onProgress?: ProgressCallback
  ): Promise<void> {
    const source = await this.openStream(destPath, () =>
      this.files.export(
        { fileId: entry.id, mimeType: exportMimeType },
        { responseType: "stream" }
      )
    );
    await writeStreamToFile(source, destPath, undefined, onProgress);
  }

  private async openStream(
    destPath: string,
    request: () => Promise<{ data: Readable }>
  ): Promise<Readable> {
    try {
      return (await request()).data;
    } catch (error) {
      throw new TransferError(destPath, error);
    }
  }
}

function toRemoteFileEntry(file: drive_v3.Schema$File): RemoteFileEntry | null {
  if (!file.id || !file.name || !file.mimeType) {
    return null;
  }
  const size = file.size ? Number(file.size) : undefined;
  return {
    id: file.id,
    name: file.name,
    mimeType: file.mimeType,
    ...(size !== undefined && Number.isFinite(size) ? { size } : {}),
  };
}

/**
 * Escape a value for use inside a single-quoted Drive query string
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

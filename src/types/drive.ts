export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";
export const NATIVE_MIME_PREFIX = "application/vnd.google-apps.";

/**
 * Opaque Drive folder id scoping list/upload/delete calls
 */
export type FolderRef = string;

/**
 * An entry returned by a folder listing
 */
export interface RemoteFileEntry {
  id: string;
  name: string;
  mimeType: string;
  size?: number;
}

/**
 * OAuth token material persisted between runs, together with the
 * client it was issued to so a refresh needs no client secret file
 */
export interface StoredCredentials {
  client_id?: string | null;
  client_secret?: string | null;
  access_token?: string | null;
  refresh_token?: string | null;
  expiry_date?: number | null;
  token_type?: string | null;
  scope?: string;
}

/**
 * Progress of a chunked transfer
 * fraction is only set when the total size is known
 */
export interface TransferProgress {
  bytes: number;
  fraction?: number;
}

export type ProgressCallback = (progress: TransferProgress) => void;

/**
 * Remote document store operations the backup depends on
 */
export interface DocumentStore {
  listChildren(folder: FolderRef): Promise<RemoteFileEntry[]>;
  clearFolder(folder: FolderRef): Promise<number>;
  uploadFile(
    folder: FolderRef,
    localPath: string,
    displayName: string,
    onProgress?: ProgressCallback
  ): Promise<string>;
  downloadFile(
    entry: RemoteFileEntry,
    destPath: string,
    onProgress?: ProgressCallback
  ): Promise<void>;
  exportFile(
    entry: RemoteFileEntry,
    exportMimeType: string,
    destPath: string,
    onProgress?: ProgressCallback
  ): Promise<void>;
}

import * as fs from "fs/promises";
import { Readable } from "stream";
import {
  DocumentStore,
  FOLDER_MIME_TYPE,
  FolderRef,
  ObjectStorage,
  ProgressCallback,
  RemoteFileEntry,
  UploadResult,
} from "../../src/types";
import { isFile, writeStreamToFile } from "../../src/utils";

export const DOCUMENT_MIME_TYPE = "application/vnd.google-apps.document";

export interface UploadRecord {
  folder: FolderRef;
  name: string;
  content: Buffer;
}

/**
 * In-process document store: folders map to child lists, files to bytes
 */
export class InMemoryDocumentStore implements DocumentStore {
  private folders = new Map<FolderRef, RemoteFileEntry[]>();
  private contents = new Map<string, Buffer>();
  private failing = new Set<string>();
  private nextId = 1;

  readonly listCalls: FolderRef[] = [];
  readonly downloads: string[] = [];
  readonly exports: Array<{ id: string; mimeType: string }> = [];
  readonly uploads: UploadRecord[] = [];
  readonly events: string[] = [];

  addFolder(parent: FolderRef | null, name: string, id?: FolderRef): FolderRef {
    const folderId = id ?? this.newId("folder");
    if (!this.folders.has(folderId)) {
      this.folders.set(folderId, []);
    }
    if (parent !== null) {
      this.children(parent).push({ id: folderId, name, mimeType: FOLDER_MIME_TYPE });
    }
    return folderId;
  }

  addFile(
    parent: FolderRef,
    name: string,
    content: string,
    mimeType: string = "text/plain"
  ): string {
    const id = this.newId("file");
    const bytes = Buffer.from(content);
    this.contents.set(id, bytes);
    const isNative = mimeType.startsWith("application/vnd.google-apps.");
    this.children(parent).push({
      id,
      name,
      mimeType,
      ...(isNative ? {} : { size: bytes.length }),
    });
    return id;
  }

  /**
   * Make transfers of this file fail halfway through
   */
  failTransfer(id: string): void {
    this.failing.add(id);
  }

  names(folder: FolderRef): string[] {
    return this.children(folder).map((entry) => entry.name);
  }

  async listChildren(folder: FolderRef): Promise<RemoteFileEntry[]> {
    this.listCalls.push(folder);
    return [...this.children(folder)];
  }

  async clearFolder(folder: FolderRef): Promise<number> {
    const count = this.children(folder).length;
    this.folders.set(folder, []);
    this.events.push(`clear:${folder}`);
    return count;
  }

  async uploadFile(
    folder: FolderRef,
    localPath: string,
    displayName: string,
    onProgress?: ProgressCallback
  ): Promise<string> {
    if (!(await isFile(localPath))) {
      throw new Error(`upload source missing: ${localPath}`);
    }
    const content = await fs.readFile(localPath);
    onProgress?.({ bytes: content.length, fraction: 1 });

    const id = this.newId("upload");
    this.contents.set(id, content);
    this.children(folder).push({
      id,
      name: displayName,
      mimeType: "application/zip",
      size: content.length,
    });
    this.uploads.push({ folder, name: displayName, content });
    this.events.push(`upload:${displayName}`);
    return id;
  }

  async downloadFile(
    entry: RemoteFileEntry,
    destPath: string,
    onProgress?: ProgressCallback
  ): Promise<void> {
    this.downloads.push(entry.id);
    await writeStreamToFile(this.stream(entry.id), destPath, entry.size, onProgress);
  }

  async exportFile(
    entry: RemoteFileEntry,
    exportMimeType: string,
    destPath: string,
    onProgress?: ProgressCallback
  ): Promise<void> {
    this.exports.push({ id: entry.id, mimeType: exportMimeType });
    await writeStreamToFile(this.stream(entry.id), destPath, undefined, onProgress);
  }

  private stream(id: string): Readable {
    const content = this.contents.get(id) ?? Buffer.alloc(0);
    return this.failing.has(id) ? failingStream(content) : Readable.from([content]);
  }

  private children(folder: FolderRef): RemoteFileEntry[] {
    const children = this.folders.get(folder);
    if (!children) {
      throw new Error(`File not found: ${folder}`);
    }
    return children;
  }

  private newId(prefix: string): string {
    return `${prefix}-${this.nextId++}`;
  }
}

/**
 * Emits the first half of the content, then errors
 */
export function failingStream(content: Buffer): Readable {
  let sent = false;
  return new Readable({
    read() {
      if (!sent) {
        sent = true;
        this.push(content.subarray(0, Math.ceil(content.length / 2)));
      } else {
        this.destroy(new Error("connection reset"));
      }
    },
  });
}

/**
 * Object storage that keeps the uploaded bytes
 */
export class InMemoryObjectStorage implements ObjectStorage {
  readonly uploads: Array<{ bucket: string; key: string; content: Buffer }> = [];

  constructor(private readonly failure?: UploadResult & { ok: false }) {}

  async upload(
    localPath: string,
    bucket: string,
    key: string
  ): Promise<UploadResult> {
    if (this.failure) {
      return this.failure;
    }
    if (!(await isFile(localPath))) {
      return { ok: false, reason: "missing_file", message: localPath };
    }
    this.uploads.push({ bucket, key, content: await fs.readFile(localPath) });
    return { ok: true, bucket, key };
  }
}

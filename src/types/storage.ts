export type UploadFailureReason = "missing_file" | "credentials_rejected";

/**
 * Outcome of an object storage upload
 */
export type UploadResult =
  | { ok: true; bucket: string; key: string }
  | { ok: false; reason: UploadFailureReason; message: string };

/**
 * Object storage operations the backup depends on
 */
export interface ObjectStorage {
  upload(localPath: string, bucket: string, key: string): Promise<UploadResult>;
}

import { S3Client } from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { createReadStream } from "fs";
import { ObjectStorage, S3Settings, UploadResult } from "../types";
import { getMimeType, isFile } from "../utils";
import { out } from "../cli/output";

/**
 * S3 error codes meaning the static keys were refused
 */
const CREDENTIAL_ERRORS = new Set([
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
  "CredentialsProviderError",
  "InvalidClientTokenId",
  "ExpiredToken",
]);

/**
 * Uploads files to an S3 (or S3-compatible) bucket with static keys.
 * A missing local file or refused credentials come back as `ok: false`;
 * every other failure is thrown.
 */
export class S3ObjectStorage implements ObjectStorage {
  private readonly client: S3Client;

  constructor(settings: S3Settings) {
    this.client = new S3Client({
      region: settings.region,
      endpoint: settings.endpoint,
      forcePathStyle: settings.endpoint !== undefined,
      credentials: {
        accessKeyId: settings.accessKeyId,
        secretAccessKey: settings.secretAccessKey,
      },
    });
  }

  async upload(
    localPath: string,
    bucket: string,
    key: string
  ): Promise<UploadResult> {
    if (!(await isFile(localPath))) {
      return {
        ok: false,
        reason: "missing_file",
        message: `The file was not found: ${localPath}`,
      };
    }

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: bucket,
        Key: key,
        Body: createReadStream(localPath),
        ContentType: getMimeType(localPath),
      },
    });
    upload.on("httpUploadProgress", (progress) => {
      out.transfer(`Uploading ${key}`, {
        bytes: progress.loaded ?? 0,
        fraction:
          progress.total && progress.loaded !== undefined
            ? progress.loaded / progress.total
            : undefined,
      });
    });

    try {
      await upload.done();
    } catch (error) {
      if (isCredentialError(error)) {
        return {
          ok: false,
          reason: "credentials_rejected",
          message: `Credentials not accepted: ${error.message}`,
        };
      }
      throw error;
    }

    return { ok: true, bucket, key };
  }

  destroy(): void {
    this.client.destroy();
  }
}

/**
 * SDK errors carry the service error code as their name
 */
export function isCredentialError(error: unknown): error is Error {
  return error instanceof Error && CREDENTIAL_ERRORS.has(error.name);
}

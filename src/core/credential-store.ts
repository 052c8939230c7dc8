import * as fs from "fs/promises";
import * as path from "path";
import { ConfigError, StoredCredentials } from "../types";
import { ensureDirectoryExists, isErrnoException } from "../utils";

/**
 * Persistence for document store credentials between runs
 */
export interface CredentialStore {
  load(): Promise<StoredCredentials | null>;
  save(credentials: StoredCredentials): Promise<void>;
}

/**
 * Credential store backed by a JSON token file
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<StoredCredentials | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new ConfigError(
        `Token file ${this.filePath} is not valid JSON. Delete it and run "drive-backup auth" again.`
      );
    }
    return isStoredCredentials(parsed) ? parsed : null;
  }

  async save(credentials: StoredCredentials): Promise<void> {
    await ensureDirectoryExists(path.dirname(this.filePath));
    await fs.writeFile(this.filePath, JSON.stringify(credentials, null, 2), {
      encoding: "utf8",
      mode: 0o600,
    });
  }
}

/**
 * Credential store kept in memory, for tests and one-off runs
 */
export class MemoryCredentialStore implements CredentialStore {
  constructor(private credentials: StoredCredentials | null = null) {}

  async load(): Promise<StoredCredentials | null> {
    return this.credentials ? { ...this.credentials } : null;
  }

  async save(credentials: StoredCredentials): Promise<void> {
    this.credentials = { ...credentials };
  }
}

function isStoredCredentials(value: unknown): value is StoredCredentials {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  const optionalString = (key: string) =>
    record[key] === undefined ||
    record[key] === null ||
    typeof record[key] === "string";
  return (
    optionalString("access_token") &&
    optionalString("refresh_token") &&
    optionalString("token_type") &&
    optionalString("client_id") &&
    optionalString("client_secret") &&
    (record.scope === undefined || typeof record.scope === "string") &&
    (record.expiry_date === undefined ||
      record.expiry_date === null ||
      typeof record.expiry_date === "number")
  );
}

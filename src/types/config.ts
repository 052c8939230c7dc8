/**
 * Default file locations, relative to the working directory
 */
export const DEFAULT_REPOS_FILE = "repos.json";
export const DEFAULT_TOKEN_FILE = "token.json";
export const DEFAULT_CLIENT_SECRET_FILE = "credentials.json";
export const DEFAULT_S3_REGION = "us-east-1";
export const DEFAULT_BRANCH = "master";

/**
 * A repository to clone and archive
 */
export interface RepositoryDescriptor {
  url: string;
  name: string;
  branch: string;
}

/**
 * Object storage connection settings
 */
export interface S3Settings {
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  region: string;
  endpoint?: string;
}

/**
 * Fully resolved configuration for a backup run
 */
export interface BackupConfig {
  docFolderId: string;
  codeFolderId: string;
  projectName: string;
  s3: S3Settings;
  reposFile: string;
  tokenFile: string;
  clientSecretFile: string;
  workingDir: string;
}

/**
 * Raw environment-style settings, every key optional until validated
 */
export interface EnvironmentSettings {
  GOOGLE_DRIVE_DOC_FOLDER_ID?: string;
  GOOGLE_DRIVE_CODE_FOLDER_ID?: string;
  PROJECT_NAME?: string;
  S3_ACCESS_KEY?: string;
  S3_SECRET_KEY?: string;
  S3_BUCKET?: string;
  S3_REGION?: string;
  S3_ENDPOINT?: string;
  REPOS_FILE?: string;
  GOOGLE_TOKEN_FILE?: string;
  GOOGLE_CLIENT_SECRET_FILE?: string;
}

export type EnvironmentKey = keyof EnvironmentSettings;

/**
 * CLI command options
 */
export interface CommandOptions {
  debug?: boolean;
  envFile?: string;
}

/**
 * Run command specific options
 */
export interface RunOptions extends CommandOptions {
  repos?: string;
  keepGoing?: boolean;
}

/**
 * Pull command specific options
 */
export interface PullOptions extends CommandOptions {}

/**
 * Archive command specific options
 */
export interface ArchiveOptions extends CommandOptions {
  branch?: string;
}

/**
 * Process exit codes
 */
export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  TRANSFER_FAILED = 2,
  UPLOAD_FAILED = 3,
  REPOSITORIES_FAILED = 4,
}

import * as fs from "fs/promises";
import * as path from "path";
import * as dotenv from "dotenv";
import {
  BackupConfig,
  ConfigError,
  DEFAULT_BRANCH,
  DEFAULT_CLIENT_SECRET_FILE,
  DEFAULT_REPOS_FILE,
  DEFAULT_S3_REGION,
  DEFAULT_TOKEN_FILE,
  EnvironmentKey,
  EnvironmentSettings,
  RepositoryDescriptor,
} from "../types";
import { isErrnoException, pathExists } from "../utils";

export const ENVIRONMENT_KEYS: readonly EnvironmentKey[] = [
  "GOOGLE_DRIVE_DOC_FOLDER_ID",
  "GOOGLE_DRIVE_CODE_FOLDER_ID",
  "PROJECT_NAME",
  "S3_ACCESS_KEY",
  "S3_SECRET_KEY",
  "S3_BUCKET",
  "S3_REGION",
  "S3_ENDPOINT",
  "REPOS_FILE",
  "GOOGLE_TOKEN_FILE",
  "GOOGLE_CLIENT_SECRET_FILE",
];

/**
 * Keys a full backup run cannot do without
 */
export const RUN_REQUIRED_KEYS: readonly EnvironmentKey[] = [
  "GOOGLE_DRIVE_DOC_FOLDER_ID",
  "GOOGLE_DRIVE_CODE_FOLDER_ID",
  "PROJECT_NAME",
  "S3_ACCESS_KEY",
  "S3_SECRET_KEY",
  "S3_BUCKET",
];

/**
 * Configuration manager for backup runs
 * Precedence: defaults < .env file < process environment
 */
export class ConfigManager {
  private static readonly ENV_FILENAME = ".env";

  constructor(
    private readonly workingDir: string = process.cwd(),
    private readonly envFile?: string
  ) {}

  /**
   * Read the .env file (if any) and overlay the process environment
   */
  async loadEnvironment(
    env: NodeJS.ProcessEnv = process.env
  ): Promise<EnvironmentSettings> {
    const envPath = path.resolve(
      this.workingDir,
      this.envFile ?? ConfigManager.ENV_FILENAME
    );

    let fileValues: Record<string, string> = {};
    if (await pathExists(envPath)) {
      fileValues = dotenv.parse(await fs.readFile(envPath, "utf8"));
    } else if (this.envFile) {
      throw new ConfigError(`Environment file not found: ${envPath}`);
    }

    const settings: EnvironmentSettings = {};
    for (const key of ENVIRONMENT_KEYS) {
      const value = env[key] ?? fileValues[key];
      if (value !== undefined && value.trim() !== "") {
        settings[key] = value.trim();
      }
    }
    return settings;
  }

  /**
   * Validate settings against the keys a command needs
   */
  validate(
    settings: EnvironmentSettings,
    required: readonly EnvironmentKey[] = RUN_REQUIRED_KEYS
  ): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const key of required) {
      if (!settings[key]) {
        errors.push(`${key} is not set`);
      }
    }

    const projectName = settings.PROJECT_NAME;
    if (projectName && /[\/\\]|^\.\.?$/.test(projectName)) {
      errors.push("PROJECT_NAME must be a plain directory name");
    }

    if (settings.S3_ENDPOINT && !isUrl(settings.S3_ENDPOINT)) {
      errors.push("S3_ENDPOINT must be a URL");
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  /**
   * Load and validate configuration, throwing a ConfigError naming every
   * missing or invalid key
   */
  async load(
    required: readonly EnvironmentKey[] = RUN_REQUIRED_KEYS,
    env: NodeJS.ProcessEnv = process.env
  ): Promise<BackupConfig> {
    const settings = await this.loadEnvironment(env);
    const { valid, errors } = this.validate(settings, required);
    if (!valid) {
      throw new ConfigError("Invalid configuration:", errors);
    }
    return this.resolve(settings);
  }

  /**
   * Fill defaults and resolve file paths against the working directory
   */
  resolve(settings: EnvironmentSettings): BackupConfig {
    const resolvePath = (file: string | undefined, fallback: string) =>
      path.resolve(this.workingDir, file ?? fallback);

    return {
      docFolderId: settings.GOOGLE_DRIVE_DOC_FOLDER_ID ?? "",
      codeFolderId: settings.GOOGLE_DRIVE_CODE_FOLDER_ID ?? "",
      projectName: settings.PROJECT_NAME ?? "",
      s3: {
        accessKeyId: settings.S3_ACCESS_KEY ?? "",
        secretAccessKey: settings.S3_SECRET_KEY ?? "",
        bucket: settings.S3_BUCKET ?? "",
        region: settings.S3_REGION ?? DEFAULT_S3_REGION,
        ...(settings.S3_ENDPOINT ? { endpoint: settings.S3_ENDPOINT } : {}),
      },
      reposFile: resolvePath(settings.REPOS_FILE, DEFAULT_REPOS_FILE),
      tokenFile: resolvePath(settings.GOOGLE_TOKEN_FILE, DEFAULT_TOKEN_FILE),
      clientSecretFile: resolvePath(
        settings.GOOGLE_CLIENT_SECRET_FILE,
        DEFAULT_CLIENT_SECRET_FILE
      ),
      workingDir: path.resolve(this.workingDir),
    };
  }

  /**
   * Load the repository descriptor list
   */
  async loadRepositories(filePath: string): Promise<RepositoryDescriptor[]> {
    const resolved = path.resolve(this.workingDir, filePath);

    let content: string;
    try {
      content = await fs.readFile(resolved, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new ConfigError(`Repository list not found: ${resolved}`);
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(
        `Repository list ${resolved} is not valid JSON: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    return parseRepositories(parsed, resolved);
  }
}

/**
 * Validate a parsed repository list: an array of {url, name, branch?}
 */
export function parseRepositories(
  value: unknown,
  source: string = "repository list"
): RepositoryDescriptor[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${source} must be a JSON array`);
  }

  const problems: string[] = [];
  const repositories: RepositoryDescriptor[] = [];
  const names = new Set<string>();

  value.forEach((item: unknown, index: number) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      problems.push(`[${index}] must be an object`);
      return;
    }
    const { url, name, branch }: Record<string, unknown> = { ...item };

    if (typeof url !== "string" || url.trim() === "") {
      problems.push(`[${index}].url must be a non-empty string`);
    }
    if (typeof name !== "string" || name.trim() === "") {
      problems.push(`[${index}].name must be a non-empty string`);
    } else if (/[\/\\]/.test(name)) {
      problems.push(`[${index}].name must not contain path separators`);
    } else if (names.has(name.trim())) {
      problems.push(`[${index}].name "${name}" is used more than once`);
    }
    if (
      branch !== undefined &&
      (typeof branch !== "string" || branch.trim() === "")
    ) {
      problems.push(`[${index}].branch must be a non-empty string`);
    }

    if (typeof url === "string" && typeof name === "string") {
      names.add(name.trim());
      repositories.push({
        url: url.trim(),
        name: name.trim(),
        branch: typeof branch === "string" ? branch.trim() : DEFAULT_BRANCH,
      });
    }
  });

  if (problems.length > 0) {
    throw new ConfigError(`Invalid ${source}:`, problems);
  }
  return repositories;
}

function isUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

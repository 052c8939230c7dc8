import * as fs from "fs/promises";
import { google, Auth } from "googleapis";
import { authenticate } from "@google-cloud/local-auth";
import { ConfigError, StoredCredentials } from "../types";
import { isErrnoException } from "../utils";
import { out } from "../cli/output";
import { CredentialStore } from "./credential-store";

export const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive"];

/**
 * Tokens this close to expiry are refreshed up front
 */
const EXPIRY_MARGIN_MS = 60_000;

/**
 * OAuth client registration read from the client secret file
 */
export interface ClientSecret {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
}

/**
 * Token fields shared by every google-auth-library Credentials shape
 */
interface TokenFields {
  access_token?: string | null;
  refresh_token?: string | null;
  expiry_date?: number | null;
  token_type?: string | null;
  scope?: string;
}

export type InteractiveFlow = (
  scopes: string[],
  clientSecretFile: string
) => Promise<TokenFields>;

export type TokenRefresher = (
  client: Auth.OAuth2Client
) => Promise<TokenFields>;

export interface AuthorizeOptions {
  store: CredentialStore;
  clientSecretFile: string;
  scopes?: string[];
  interactive?: InteractiveFlow;
  refresh?: TokenRefresher;
  now?: () => number;
}

/**
 * Browser-based consent flow on a local redirect server
 */
export const localServerFlow: InteractiveFlow = async (
  scopes,
  clientSecretFile
) => {
  const client = await authenticate({ scopes, keyfilePath: clientSecretFile });
  return client.credentials;
};

export const refreshAccessToken: TokenRefresher = async (client) => {
  await client.getAccessToken();
  return client.credentials;
};

/**
 * Read an "installed" or "web" OAuth client secret file
 */
export async function readClientSecret(filePath: string): Promise<ClientSecret> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ConfigError(
        `Client secret file not found: ${filePath}. Download it from the Google Cloud console.`
      );
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  const section =
    isRecord(parsed) && (isRecord(parsed.installed) ? parsed.installed : parsed.web);
  if (
    !isRecord(section) ||
    typeof section.client_id !== "string" ||
    typeof section.client_secret !== "string"
  ) {
    throw new ConfigError(
      `Client secret file ${filePath} has no "installed" or "web" client`
    );
  }

  const redirectUris = Array.isArray(section.redirect_uris)
    ? section.redirect_uris.filter((uri): uri is string => typeof uri === "string")
    : [];

  return {
    clientId: section.client_id,
    clientSecret: section.client_secret,
    redirectUri: redirectUris[0],
  };
}

/**
 * Whether stored credentials need a refresh before use
 */
export function isExpired(credentials: StoredCredentials, now: number): boolean {
  if (!credentials.access_token) {
    return true;
  }
  if (credentials.expiry_date === undefined || credentials.expiry_date === null) {
    return false;
  }
  return credentials.expiry_date - EXPIRY_MARGIN_MS <= now;
}

/**
 * Build an authorized Drive OAuth client.
 *
 * Stored credentials are used as-is while valid, refreshed (and re-saved)
 * when expired with a refresh token, and otherwise replaced through the
 * interactive flow. Later implicit refreshes are persisted as well.
 */
export async function authorize(
  options: AuthorizeOptions
): Promise<Auth.OAuth2Client> {
  const {
    store,
    clientSecretFile,
    scopes = DRIVE_SCOPES,
    interactive = localServerFlow,
    refresh = refreshAccessToken,
    now = Date.now,
  } = options;

  const stored = await store.load();
  let credentials: StoredCredentials;
  let client: Auth.OAuth2Client;

  if (stored && !isExpired(stored, now())) {
    client = await createClient(stored, clientSecretFile);
    credentials = stored;
  } else if (stored?.refresh_token) {
    out.taskLine("Refreshing access token");
    client = await createClient(stored, clientSecretFile);
    client.setCredentials(toTokenFields(stored));
    credentials = mergeCredentials(stored, await refresh(client));
    await store.save(credentials);
  } else {
    out.taskLine("Waiting for authorization in the browser");
    const secret = await readClientSecret(clientSecretFile);
    client = clientFromSecret(secret);
    credentials = {
      ...toTokenFields(await interactive(scopes, clientSecretFile)),
      client_id: secret.clientId,
      client_secret: secret.clientSecret,
    };
    await store.save(credentials);
  }

  client.setCredentials(toTokenFields(credentials));

  let latest = credentials;
  client.on("tokens", (tokens) => {
    latest = mergeCredentials(latest, tokens);
    store
      .save(latest)
      .catch((error) => out.warn(`Could not persist refreshed token: ${error}`));
  });

  return client;
}

async function createClient(
  stored: StoredCredentials,
  clientSecretFile: string
): Promise<Auth.OAuth2Client> {
  if (stored.client_id && stored.client_secret) {
    return clientFromSecret({
      clientId: stored.client_id,
      clientSecret: stored.client_secret,
    });
  }
  return clientFromSecret(await readClientSecret(clientSecretFile));
}

function clientFromSecret(secret: ClientSecret): Auth.OAuth2Client {
  return new google.auth.OAuth2(
    secret.clientId,
    secret.clientSecret,
    secret.redirectUri
  );
}

/**
 * A refresh response omits the refresh token; keep the one we had
 */
function mergeCredentials(
  previous: StoredCredentials,
  tokens: TokenFields
): StoredCredentials {
  const next = toTokenFields(tokens);
  return {
    ...previous,
    ...next,
    refresh_token: next.refresh_token || previous.refresh_token,
  };
}

function toTokenFields(tokens: TokenFields): TokenFields {
  const fields: TokenFields = {};
  if (tokens.access_token !== undefined) fields.access_token = tokens.access_token;
  if (tokens.refresh_token !== undefined) fields.refresh_token = tokens.refresh_token;
  if (tokens.expiry_date !== undefined) fields.expiry_date = tokens.expiry_date;
  if (tokens.token_type !== undefined) fields.token_type = tokens.token_type;
  if (tokens.scope !== undefined) fields.scope = tokens.scope;
  return fields;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

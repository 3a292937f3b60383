import { readFile } from "fs/promises";
import { ConfigurationError, errorMessage } from "../core/errors";
import { isRecord } from "../core/guards";
import type { AssistantServiceConfig } from "../types/configuration";

const NO_TOKEN_REMEDIATION =
  "Set ASSISTANT_ACCESS_TOKEN, pass --access-token or point --credentials at a JSON file holding a token.";

/**
 * Returns the bearer token used to open assist calls. A token given directly
 * wins over the credentials file.
 */
export async function loadAccessToken(
  config: Pick<AssistantServiceConfig, "accessToken" | "credentialsPath">,
  read: (path: string) => Promise<string> = (path) => readFile(path, "utf8"),
): Promise<string> {
  if (config.accessToken) {
    return config.accessToken;
  }
  if (!config.credentialsPath) {
    throw authError("No access token or credentials file configured", "CREDENTIALS_MISSING");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await read(config.credentialsPath));
  } catch (error: unknown) {
    throw authError(
      `Cannot load credentials from ${config.credentialsPath}: ${errorMessage(error)}`,
      "CREDENTIALS_UNREADABLE",
      error,
    );
  }
  const token = extractToken(parsed);
  if (!token) {
    throw authError(
      `Credentials file ${config.credentialsPath} holds no "token" or "access_token"`,
      "CREDENTIALS_NO_TOKEN",
    );
  }
  return token;
}

function extractToken(value: unknown): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  for (const key of ["token", "access_token"]) {
    const candidate = value[key];
    if (typeof candidate === "string" && candidate !== "") {
      return candidate;
    }
  }
  return undefined;
}

function authError(message: string, code: string, cause?: unknown): ConfigurationError {
  return new ConfigurationError(
    message,
    [{ path: "assistant.credentialsPath", message, code, severity: "error", remediation: NO_TOKEN_REMEDIATION }],
    { faultDomain: "auth", cause },
  );
}

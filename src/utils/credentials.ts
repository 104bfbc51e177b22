import { readFileSync } from "fs";
import path from "path";
import { ConfigurationError } from "../errors.js";

export const API_KEY_NAME = "OPENROUTER_API_KEY";

export type ApiKeySource = "secrets" | "environment" | "user_input";

export interface ResolvedApiKey {
  apiKey: string;
  source: ApiKeySource;
}

export interface ResolveApiKeyOptions {
  /** Directory of mounted deployment secrets, one file per secret */
  secretsDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Key typed in by the user when the session was opened */
  userProvided?: string | null;
}

function readSecretFile(secretsDir: string): string | null {
  try {
    const value = readFileSync(path.join(secretsDir, API_KEY_NAME), "utf8").trim();
    return value || null;
  } catch (err) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "unknown";
    if (code !== "ENOENT" && code !== "ENOTDIR" && code !== "EISDIR") {
      console.warn(`[Config] Could not read ${API_KEY_NAME} from ${secretsDir}: ${code}`);
    }
    return null;
  }
}

/**
 * Resolve the API key: deployment secret store first, then the
 * environment, then whatever the user entered.
 */
export function resolveApiKey(options: ResolveApiKeyOptions = {}): ResolvedApiKey {
  const { secretsDir, env = process.env, userProvided } = options;

  if (secretsDir) {
    const fromSecrets = readSecretFile(secretsDir);
    if (fromSecrets) {
      return { apiKey: fromSecrets, source: "secrets" };
    }
  }

  const fromEnv = env[API_KEY_NAME]?.trim();
  if (fromEnv) {
    return { apiKey: fromEnv, source: "environment" };
  }

  const fromUser = userProvided?.trim();
  if (fromUser) {
    return { apiKey: fromUser, source: "user_input" };
  }

  throw new ConfigurationError(
    `No API key available: mount ${API_KEY_NAME} as a secret, set it in the environment, or provide api_key when creating a session`
  );
}

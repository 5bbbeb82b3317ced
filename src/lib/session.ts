import { DEFAULTS, loadConfig } from "./config";
import { MissingCredentialError } from "./error";
import type { SessionContext, SessionOptions } from "./types";

export const DEFAULT_KEY_VARIABLE = "OPENAI_API_KEY";

/** Build an immutable session around an explicit API key. */
export function createSession(
  apiKey: string,
  opts: SessionOptions = {},
): SessionContext {
  if (!apiKey) throw new MissingCredentialError(null);

  return Object.freeze({
    apiKey,
    model: opts.model ?? DEFAULTS.model,
    baseURL: opts.baseURL,
    timeoutMs: opts.timeoutMs ?? DEFAULTS.timeoutMs,
  });
}

/**
 * Build a session from the environment. The key comes from `variable`,
 * everything else from the EMBED_* settings.
 */
export function sessionFromEnv(
  variable: string = DEFAULT_KEY_VARIABLE,
  env: Record<string, string | undefined> = process.env,
): SessionContext {
  const apiKey = env[variable]?.trim();
  if (!apiKey) throw new MissingCredentialError(variable);

  const config = loadConfig(env);
  return createSession(apiKey, {
    model: config.model,
    baseURL: config.baseURL,
    timeoutMs: config.timeoutMs,
  });
}

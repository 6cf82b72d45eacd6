import { z } from "zod";
import type { ConfigSnapshot } from "#types/appConfig";
import { LOG_LEVELS } from "#types/appConfig";
import type { ProviderName, ProviderSpec } from "#types/provider";
import { flagSetting, integerSetting, listSetting, parseList, secretSetting } from "./envParsing.js";

export const DEFAULT_TIMEOUT_SECONDS = 30;
// Node timers hold at most 2^31 - 1 ms; longer abort timeouts fire at once.
export const MAX_TIMEOUT_SECONDS = 2147483;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_STORAGE_PATH = "property_intelligence.db";
export const DEFAULT_PORT = 5000;
export const DEFAULT_ALLOWED_ORIGINS = ["http://localhost:3000", "http://localhost:8000"] as const;
export const WILDCARD_ORIGIN = "*";

// Priority order, first is tried first.
export const DEFAULT_MODELS: Readonly<Record<ProviderName, readonly string[]>> = {
  claude: ["claude-3-5-sonnet-20241022", "claude-3-haiku-20240307", "claude-3-sonnet-20240229"],
  gemini: ["gemini-1.5-flash", "gemini-1.5-pro", "gemini-pro"],
  stability_ai: ["sd3.5-large", "sd3.5-medium", "stable-image-core"],
};

// Questions offered by the dashboard. `PRESET_QUESTIONS` replaces them, separated by `|`.
export const DEFAULT_PRESET_QUESTIONS = [
  "What new development applications were submitted in Brisbane this month?",
  "Which Brisbane suburbs are trending in property news?",
  "Are there any major infrastructure projects affecting property values?",
  "What zoning changes have been approved recently?",
  "Which areas have the most development activity?",
] as const;

/**
 * Environment variable prefix of each provider, as in `CLAUDE_API_KEY`.
 */
export const PROVIDER_ENV_PREFIX: Readonly<Record<ProviderName, string>> = {
  claude: "CLAUDE",
  gemini: "GEMINI",
  stability_ai: "STABILITY",
};

export const credentialVariable = (name: ProviderName): string => `${PROVIDER_ENV_PREFIX[name]}_API_KEY`;

/**
 * Environment schema. Every field resolves to a value: malformed input keeps
 * the documented default rather than failing the parse.
 */
export const envSchema = z.object({
  CLAUDE_API_KEY: secretSetting(),
  CLAUDE_ENABLED: flagSetting(true),
  CLAUDE_MODELS: listSetting(DEFAULT_MODELS.claude),

  GEMINI_API_KEY: secretSetting(),
  GEMINI_ENABLED: flagSetting(true),
  GEMINI_MODELS: listSetting(DEFAULT_MODELS.gemini),

  STABILITY_API_KEY: secretSetting(),
  STABILITY_ENABLED: flagSetting(true),
  STABILITY_MODELS: listSetting(DEFAULT_MODELS.stability_ai),

  LLM_TIMEOUT: integerSetting(DEFAULT_TIMEOUT_SECONDS, 1, MAX_TIMEOUT_SECONDS),
  LLM_MAX_RETRIES: integerSetting(DEFAULT_MAX_RETRIES, 0),

  DATABASE_PATH: z.string().catch(DEFAULT_STORAGE_PATH),
  PRESET_QUESTIONS: listSetting(DEFAULT_PRESET_QUESTIONS, "|"),

  CORS_ORIGINS: z
    .string()
    .optional()
    .transform((value) => parseList(value)),
  NODE_ENV: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() === "development"),
  ALLOW_DEV_WILDCARD_ORIGIN: flagSetting(false),

  PORT: integerSetting(DEFAULT_PORT, 1),
  LOG_LEVEL: z.enum(LOG_LEVELS).catch("info"),
});

export type EnvSettings = z.infer<typeof envSchema>;

type DevelopmentOriginOptions = {
  developmentMode: boolean;
  /** Explicit opt-in; development mode alone never opens CORS. */
  allowWildcard: boolean;
};

/**
 * Appends the wildcard origin when running in development mode with the
 * opt-in set. This accepts requests from any origin, so it must stay off in
 * deployed environments.
 */
export function addDevelopmentOrigin(
  origins: readonly string[],
  { developmentMode, allowWildcard }: DevelopmentOriginOptions,
): string[] {
  if (!developmentMode || !allowWildcard || origins.includes(WILDCARD_ORIGIN)) {
    return [...origins];
  }
  return [...origins, WILDCARD_ORIGIN];
}

function provider(
  name: ProviderName,
  category: ProviderSpec["category"],
  credential: string | undefined,
  enabled: boolean,
  models: readonly string[],
): ProviderSpec {
  const spec: ProviderSpec = {
    name,
    category,
    enabled,
    modelPriorityList: Object.freeze([...models]),
  };
  if (credential !== undefined) {
    spec.credential = credential;
  }
  return Object.freeze(spec);
}

/**
 * Builds the snapshot from parsed settings.
 */
export const createSnapshot = (data: EnvSettings): ConfigSnapshot => {
  const baseOrigins = data.CORS_ORIGINS.length > 0 ? data.CORS_ORIGINS : [...DEFAULT_ALLOWED_ORIGINS];
  const allowedOrigins = addDevelopmentOrigin(baseOrigins, {
    developmentMode: data.NODE_ENV,
    allowWildcard: data.ALLOW_DEV_WILDCARD_ORIGIN,
  });

  const providers: Record<ProviderName, ProviderSpec> = {
    claude: provider("claude", "text", data.CLAUDE_API_KEY, data.CLAUDE_ENABLED, data.CLAUDE_MODELS),
    gemini: provider("gemini", "text", data.GEMINI_API_KEY, data.GEMINI_ENABLED, data.GEMINI_MODELS),
    stability_ai: provider(
      "stability_ai",
      "image",
      data.STABILITY_API_KEY,
      data.STABILITY_ENABLED,
      data.STABILITY_MODELS,
    ),
  };

  return Object.freeze({
    providers: Object.freeze(providers),
    timeoutSeconds: data.LLM_TIMEOUT,
    maxRetries: data.LLM_MAX_RETRIES,
    storagePath: data.DATABASE_PATH,
    presetQuestions: Object.freeze(data.PRESET_QUESTIONS),
    allowedOrigins: Object.freeze(allowedOrigins),
    developmentMode: data.NODE_ENV,
    port: data.PORT,
    logLevel: data.LOG_LEVEL,
  });
};

/**
 * Reads the integration settings from `env` and returns a frozen snapshot.
 * Never throws; unrecognized or malformed values keep their defaults.
 */
export function loadConfig(env: Record<string, string | undefined>): ConfigSnapshot {
  return createSnapshot(envSchema.parse(env));
}

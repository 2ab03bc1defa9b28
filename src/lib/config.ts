import { existsSync, readFileSync, writeFileSync } from "fs";
import { resolve } from "path";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { ConfigurationError, OutputError, getErrorMessage } from "./errors.js";
import { LENGTHS, MAX_IMAGE_COUNT, TONES, type Settings } from "./types.js";

export const DEFAULT_ENV_FILE = ".env";

export const DEFAULTS = {
  model: "gpt-4o-mini",
  language: "Korean",
  tone: "professional",
  length: "medium",
  temperature: 0.7,
  imageCount: 1,
  author: "Auto-Blogger",
  researchTool: "microsoft_docs_search",
  requestTimeoutMs: 60_000,
} as const;

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const numberFrom = (schema: z.ZodNumber) =>
  optionalString
    .transform((value) => (value === undefined ? undefined : Number(value)))
    .pipe(schema.optional());

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_API_BASE: optionalString,
  DEFAULT_MODEL: optionalString,
  DEFAULT_LANGUAGE: optionalString,
  DEFAULT_TONE: optionalString.pipe(z.enum(TONES).optional()),
  DEFAULT_LENGTH: optionalString.pipe(z.enum(LENGTHS).optional()),
  TEMPERATURE: numberFrom(z.number().min(0).max(2)),
  IMAGE_COUNT: numberFrom(z.number().int().min(0).max(MAX_IMAGE_COUNT)),
  DEFAULT_AUTHOR: optionalString,
  MCP_SERVERS: optionalString,
  RESEARCH_TOOL: optionalString,
  REQUEST_TIMEOUT_MS: numberFrom(z.number().int().positive()),
  UNSPLASH_APPLICATION_ID: optionalString,
  UNSPLASH_ACCESS_KEY: optionalString,
  UNSPLASH_SECRET_KEY: optionalString,
});

export interface LoadSettingsOptions {
  /** Path of the key=value settings file. Defaults to `.env` in the working directory. */
  envPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Read the settings file (if present) and overlay the process environment.
 * A non-blank process variable wins over the file, matching dotenv's default.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const envPath = resolve(options.envPath ?? DEFAULT_ENV_FILE);
  const env = options.env ?? process.env;

  let fileValues: Record<string, string> = {};
  if (existsSync(envPath)) {
    try {
      fileValues = parseDotenv(readFileSync(envPath));
    } catch (error) {
      throw new ConfigurationError(`Could not read ${envPath}: ${getErrorMessage(error)}`, { envPath });
    }
  } else if (options.envPath) {
    throw new ConfigurationError(`Settings file not found: ${envPath}`, { envPath });
  }

  const merged: Record<string, string | undefined> = { ...fileValues };
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      merged[key] = value;
    }
  }

  const result = envSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue?.path.join(".") ?? "settings";
    throw new ConfigurationError(`Invalid value for ${variable}: ${issue?.message ?? "invalid"}`, {
      variable,
    });
  }

  const vars = result.data;
  return Object.freeze({
    openaiApiKey: vars.OPENAI_API_KEY ?? "",
    openaiApiBase: vars.OPENAI_API_BASE,
    model: vars.DEFAULT_MODEL ?? DEFAULTS.model,
    defaultLanguage: vars.DEFAULT_LANGUAGE ?? DEFAULTS.language,
    defaultTone: vars.DEFAULT_TONE ?? DEFAULTS.tone,
    defaultLength: vars.DEFAULT_LENGTH ?? DEFAULTS.length,
    temperature: vars.TEMPERATURE ?? DEFAULTS.temperature,
    imageCount: vars.IMAGE_COUNT ?? DEFAULTS.imageCount,
    author: vars.DEFAULT_AUTHOR ?? DEFAULTS.author,
    mcpServers: Object.freeze(parseServerList(vars.MCP_SERVERS)),
    researchTool: vars.RESEARCH_TOOL ?? DEFAULTS.researchTool,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS ?? DEFAULTS.requestTimeoutMs,
    unsplash: Object.freeze({
      applicationId: vars.UNSPLASH_APPLICATION_ID,
      accessKey: vars.UNSPLASH_ACCESS_KEY,
      secretKey: vars.UNSPLASH_SECRET_KEY,
    }),
  });
}

export function parseServerList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((server) => server.trim())
    .filter((server) => server.length > 0);
}

export function requireApiKey(settings: Settings): string {
  if (!settings.openaiApiKey) {
    throw new ConfigurationError(
      "OPENAI_API_KEY is not set. Run `autoblog init` and add your key to .env, or export it."
    );
  }
  return settings.openaiApiKey;
}

export function hasUnsplashCredentials(settings: Settings): boolean {
  return Boolean(settings.unsplash.accessKey);
}

export function maskSecret(value: string | undefined): string {
  if (!value) return "(not set)";
  if (value.length <= 8) return "****";
  return `${value.slice(0, 3)}…${value.slice(-4)}`;
}

/** Flat, display-safe view of the settings for `autoblog config`. */
export function describeSettings(settings: Settings): Record<string, string> {
  return {
    OPENAI_API_KEY: maskSecret(settings.openaiApiKey),
    OPENAI_API_BASE: settings.openaiApiBase ?? "(default)",
    DEFAULT_MODEL: settings.model,
    DEFAULT_LANGUAGE: settings.defaultLanguage,
    DEFAULT_TONE: settings.defaultTone,
    DEFAULT_LENGTH: settings.defaultLength,
    TEMPERATURE: String(settings.temperature),
    IMAGE_COUNT: String(settings.imageCount),
    DEFAULT_AUTHOR: settings.author,
    MCP_SERVERS: settings.mcpServers.length ? settings.mcpServers.join(", ") : "(none)",
    RESEARCH_TOOL: settings.researchTool,
    REQUEST_TIMEOUT_MS: String(settings.requestTimeoutMs),
    UNSPLASH_APPLICATION_ID: maskSecret(settings.unsplash.applicationId),
    UNSPLASH_ACCESS_KEY: maskSecret(settings.unsplash.accessKey),
    UNSPLASH_SECRET_KEY: maskSecret(settings.unsplash.secretKey),
  };
}

export function renderSettingsTemplate(): string {
  return `# autoblog configuration
OPENAI_API_KEY=your-api-key-here
DEFAULT_MODEL=${DEFAULTS.model}
DEFAULT_LANGUAGE=${DEFAULTS.language}
DEFAULT_TONE=${DEFAULTS.tone}
DEFAULT_LENGTH=${DEFAULTS.length}
TEMPERATURE=${DEFAULTS.temperature}
DEFAULT_AUTHOR=${DEFAULTS.author}
REQUEST_TIMEOUT_MS=${DEFAULTS.requestTimeoutMs}

# OpenAI-compatible API endpoint (optional)
# Azure OpenAI: https://your-resource.openai.azure.com/
# Other compatible services: https://api.your-service.com/v1
OPENAI_API_BASE=

# MCP research servers (comma-separated Streamable HTTP endpoints)
# Example: MCP_SERVERS=http://localhost:8000/mcp,https://learn.microsoft.com/api/mcp
MCP_SERVERS=
RESEARCH_TOOL=${DEFAULTS.researchTool}

# Unsplash images (optional, 0-3 per post)
IMAGE_COUNT=${DEFAULTS.imageCount}
UNSPLASH_APPLICATION_ID=
UNSPLASH_ACCESS_KEY=
UNSPLASH_SECRET_KEY=
`;
}

/**
 * Write the `init` template. Returns false when the file exists and `force` is off.
 */
export function writeSettingsTemplate(path: string, options: { force?: boolean } = {}): boolean {
  if (existsSync(path) && !options.force) {
    return false;
  }
  try {
    writeFileSync(path, renderSettingsTemplate(), "utf-8");
  } catch (error) {
    throw new OutputError(path, getErrorMessage(error), error);
  }
  return true;
}

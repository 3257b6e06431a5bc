/**
 * @oapi-guard/server: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ErrorResponseContentType } from "@oapi-guard/validator";

export const DEFAULT_SPEC_PATH = fileURLToPath(
  new URL("../openapi/petstore.json", import.meta.url),
);

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Validation
  OPENAPI_SPEC: z.string().min(1).default(DEFAULT_SPEC_PATH),
  ERROR_CONTENT_TYPE: z.enum(["plain", "json", "xml"]).default("plain"),
  MULTI_ERROR: booleanFlag,
  EXCLUDE_REQUEST_BODY: booleanFlag,
  VALIDATE_RESPONSES: booleanFlag,

  // Auth
  API_KEYS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

const CONTENT_TYPES: Record<AppConfig["ERROR_CONTENT_TYPE"], ErrorResponseContentType> = {
  plain: ErrorResponseContentType.Plain,
  json: ErrorResponseContentType.JSON,
  xml: ErrorResponseContentType.XML,
};

export function errorContentType(
  value: AppConfig["ERROR_CONTENT_TYPE"],
): ErrorResponseContentType {
  return CONTENT_TYPES[value];
}

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into a key set.
 *
 * Format: "key1,key2,key3"
 */
export function parseApiKeys(raw: string): ReadonlySet<string> {
  const keys = new Set<string>();

  for (const entry of raw.split(",")) {
    const key = entry.trim();
    if (key === "") {
      continue;
    }
    if (/\s/.test(key)) {
      throw new Error(`Invalid API_KEYS entry: "${key}". Keys cannot contain whitespace`);
    }
    keys.add(key);
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

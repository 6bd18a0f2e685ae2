import { z } from "zod";
import { ConfigValidationError } from "./errors.js";

/**
 * Module: Configuration
 * Purpose: Parse environment variables into a typed, validated configuration.
 * All environment access goes through `loadConfig`.
 */

export const COAR_RESOURCE_TYPE_NAMESPACE = "http://purl.org/coar/resource_type/";

const booleanString = z
  .string()
  .optional()
  .transform((val) => (val ? ["true", "1", "yes"].includes(val.toLowerCase()) : false));

export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const coreConfigSchema = z.object({
  resourceTypeNamespace: z.string().url().default(COAR_RESOURCE_TYPE_NAMESPACE),
  dataStatus: z.enum(["pending", "published"]).default("pending"),
  collectionStatus: z.enum(["private", "public"]).default("private"),
  logLevel: logLevelSchema.default("info"),
  logPretty: booleanString,
});

export type CoreConfig = z.infer<typeof coreConfigSchema>;

export const DEFAULT_CONFIG: CoreConfig = coreConfigSchema.parse({});

// Empty strings count as unset so `FOO=` falls back to the default
const envValue = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const v = env[key];
  return v === undefined || v.trim() === "" ? undefined : v.trim();
};

/**
 * Read `METADATA_*` variables. Throws `ConfigValidationError` listing every
 * invalid variable at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoreConfig {
  const result = coreConfigSchema.safeParse({
    resourceTypeNamespace: envValue(env, "METADATA_RESOURCE_TYPE_NAMESPACE"),
    dataStatus: envValue(env, "METADATA_DEFAULT_STATUS"),
    collectionStatus: envValue(env, "METADATA_COLLECTION_STATUS"),
    logLevel: envValue(env, "METADATA_LOG_LEVEL"),
    logPretty: envValue(env, "METADATA_LOG_PRETTY"),
  });
  if (!result.success) {
    throw new ConfigValidationError(
      "environment",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

let current: CoreConfig | undefined;

/** Configuration read once from `process.env` and reused afterwards. */
export function getConfig(): CoreConfig {
  if (!current) current = loadConfig();
  return current;
}

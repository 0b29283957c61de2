import { existsSync, readFileSync } from "node:fs";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Treat blank environment values as unset, so `MODE=` behaves like no MODE.
 */
const blankAsUndefined = (val: unknown) =>
  typeof val === "string" && val.trim() === "" ? undefined : val;

/** Split a shell-ish string on whitespace. No quoting rules. */
export function splitTokens(value: string): string[] {
  return value.split(/\s+/).filter((token) => token.length > 0);
}

// =============================================================================
// Mode
// =============================================================================

export const MODES = ["development", "production"] as const;
export type Mode = (typeof MODES)[number];

const MODE_SPELLINGS = new Map<string, Mode>([
  ["development", "development"],
  ["dev", "development"],
  ["production", "production"],
  ["prod", "production"],
]);

/**
 * Accepts the enum values and their short spellings (`dev`, `prod`).
 * Anything else is rejected; there is no fallback to development.
 */
export const modeSchema = z.string().transform((val, ctx): Mode => {
  const mode = MODE_SPELLINGS.get(val.trim().toLowerCase());
  if (mode === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown mode "${val}" (expected one of: ${MODES.join(", ")})`,
    });
    return z.NEVER;
  }
  return mode;
});

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z
  .object({
    // ===========================================================================
    // Dispatch inputs (overridable per invocation by --mode/--service/--args/--file)
    // ===========================================================================
    MODE: z.preprocess(blankAsUndefined, modeSchema.default("development")),
    SERVICE: z.preprocess(blankAsUndefined, z.string().default("backend")),
    ARGS: z.string().default("").transform(splitTokens),
    FILE: z.preprocess(blankAsUndefined, z.string().optional()),

    // ===========================================================================
    // Orchestration tool
    // ===========================================================================
    /** Binary plus leading args, e.g. "docker compose" or "docker-compose" */
    COMPOSE_COMMAND: z
      .string()
      .default("docker compose")
      .transform(splitTokens)
      .refine((tokens) => tokens.length > 0, "COMPOSE_COMMAND must not be blank"),
    COMPOSE_FILE_DEVELOPMENT: z.string().min(1).default("docker/compose.development.yaml"),
    COMPOSE_FILE_PRODUCTION: z.string().min(1).default("docker/compose.production.yaml"),
    /**
     * Passed to the orchestration tool as --env-file, and read by this CLI.
     * Only the process environment can set it (see loadConfig).
     */
    ENV_FILE: z.string().min(1).default(".env"),
    DOCKER_COMMAND: z.string().min(1).default("docker"),

    // ===========================================================================
    // Database (MongoDB container)
    // ===========================================================================
    DB_SERVICE: z.string().min(1).default("mongo"),
    DB_NAME: z.string().min(1).default("app"),
    DB_AUTH_DATABASE: z.string().min(1).default("admin"),
    DB_USERNAME: z.preprocess(blankAsUndefined, z.string().optional()),
    DB_PASSWORD: z.preprocess(blankAsUndefined, z.string().optional()),
    BACKUP_DIR: z.string().min(1).default("./backup"),

    // ===========================================================================
    // Health probes
    // ===========================================================================
    GATEWAY_HEALTH_URL: z.string().url().default("http://localhost:5921/health"),
    BACKEND_HEALTH_URL: z.string().url().default("http://localhost:5921/api/health"),

    // ===========================================================================
    // Backend workspace
    // ===========================================================================
    BACKEND_DIR: z.string().min(1).default("backend"),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.COMPOSE_FILE_DEVELOPMENT === cfg.COMPOSE_FILE_PRODUCTION) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COMPOSE_FILE_PRODUCTION"],
        message: "development and production must use different compose files",
      });
    }
  });

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;
export type EnvSource = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Parse a flat env record. Throws ConfigError listing every bad key.
 */
export function parseConfig(env: EnvSource): Config {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const key = issue.path.join(".");
        return key ? `${key}: ${issue.message}` : issue.message;
      })
    );
  }

  return result.data;
}

/**
 * Read KEY=value pairs from an env file. A missing file yields no values.
 */
export function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) {
    return {};
  }
  return parseDotenv(readFileSync(path, "utf-8"));
}

/**
 * Build the config for one invocation.
 *
 * Precedence, lowest first: env file, process environment, overrides.
 * Overrides with an undefined value are ignored. ENV_FILE itself is taken
 * from the process environment only, so the file this CLI reads is always
 * the one handed to the orchestration tool.
 */
export function loadConfig(env: EnvSource = process.env, overrides: EnvSource = {}): Config {
  const envFile = env.ENV_FILE ?? ".env";
  const fileValues = readEnvFile(envFile);
  const merged: EnvSource = { ...fileValues, ...env, ENV_FILE: envFile };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  return parseConfig(merged);
}

/** Mode → compose file. Total over Mode. */
export function composeFiles(config: Config): Record<Mode, string> {
  return {
    development: config.COMPOSE_FILE_DEVELOPMENT,
    production: config.COMPOSE_FILE_PRODUCTION,
  };
}

export function resolveComposeFile(mode: Mode, config: Config): string {
  return composeFiles(config)[mode];
}

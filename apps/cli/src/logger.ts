import pino from "pino";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

// =============================================================================
// Structured Logger
// =============================================================================
//
// Usage patterns:
//
// SUCCESS (short, info level):
//   log.db.info({ file }, "backup saved")
//
// FAILURE (detailed, error level):
//   logFailure("dispatch", "spawn failed", err, { command })
//
// The orchestration tool writes straight to the terminal; these logs only
// carry what the CLI itself has to say.
// =============================================================================

/**
 * A known pino level name, or the fallback. An unknown name would make pino
 * throw while this module loads, before main can report anything.
 */
export function resolveLogLevel(requested: string | undefined, fallback: string): string {
  if (requested === undefined) return fallback;
  const level = requested.trim().toLowerCase();
  return level === "silent" || Object.hasOwn(pino.levels.values, level) ? level : fallback;
}

const baseConfig: pino.LoggerOptions = {
  level: resolveLogLevel(process.env.LOG_LEVEL, isTest ? "silent" : "info"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,
};

// stderr only: stdout belongs to the wrapped tools and to help output.
// Pretty, single-line output on a terminal; JSON in production.
export const logger = isProduction || isTest
  ? pino(baseConfig, pino.destination(2))
  : pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname,component",
          messageFormat: "{component} | {msg}",
          singleLine: true,
          destination: 2,
        },
      },
    });

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Operation resolution and external invocations
  dispatch: logger.child({ component: "dispatch" }),

  // Database reset/backup/restore
  db: logger.child({ component: "db" }),

  // Health probes
  health: logger.child({ component: "health" }),

  // Startup, usage errors
  system: logger.child({ component: "system" }),
};

export type LogComponent = keyof typeof log;

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: LogComponent,
  event: string,
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(!isProduction && { stack: err.stack }),
  }, event);
}

/**
 * Log a warning for unexpected but non-critical issues
 */
export function logWarning(
  component: LogComponent,
  event: string,
  context: Record<string, unknown>
): void {
  log[component].warn(context, event);
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => string {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    const ms = Number(end - start) / 1_000_000;
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  };
}

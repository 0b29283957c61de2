import { access, mkdir } from "node:fs/promises";
import * as path from "node:path";
import { composeInvocation, dockerInvocation } from "./compose.js";
import type { DispatchContext } from "./context.js";
import { UsageError } from "./errors.js";
import { log } from "./logger.js";
import type { CommandRunner, Invocation } from "./runner.js";

interface Credentials {
  username: string;
  password: string;
}

function credentials(ctx: DispatchContext): Credentials {
  const { DB_USERNAME, DB_PASSWORD } = ctx.config;
  if (DB_USERNAME === undefined || DB_PASSWORD === undefined) {
    throw new UsageError(
      "Database credentials are not configured",
      `Set DB_USERNAME and DB_PASSWORD in the environment or in ${ctx.config.ENV_FILE}`
    );
  }
  return { username: DB_USERNAME, password: DB_PASSWORD };
}

function authArgs(ctx: DispatchContext): string[] {
  const { username, password } = credentials(ctx);
  return ["-u", username, "-p", password, "--authenticationDatabase", ctx.config.DB_AUTH_DATABASE];
}

/**
 * `exec` into the database service. `-T` disables the pseudo-TTY, which
 * is required when stdin/stdout are redirected to a file.
 */
function dbExec(ctx: DispatchContext, tool: string, args: readonly string[], tty = true): Invocation {
  return composeInvocation(ctx.config, ctx.composeFile, [
    "exec",
    ...(tty ? [] : ["-T"]),
    ctx.config.DB_SERVICE,
    tool,
    ...args,
  ]);
}

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * `YYYYMMDD-HHMMSS` in local time. Second granularity: two backups in the
 * same second get the same name.
 */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function backupFileName(date: Date): string {
  return `db-backup-${formatBackupTimestamp(date)}.archive`;
}

export function dbShellInvocation(ctx: DispatchContext): Invocation {
  return dbExec(ctx, "mongosh", authArgs(ctx));
}

export function dbResetInvocation(ctx: DispatchContext): Invocation {
  return dbExec(ctx, "mongosh", [
    ...authArgs(ctx),
    "--eval",
    `db.getSiblingDB('${ctx.config.DB_NAME}').dropDatabase()`,
  ]);
}

export function dbBackupInvocation(ctx: DispatchContext, outputFile: string): Invocation {
  return {
    ...dbExec(ctx, "mongodump", [...authArgs(ctx), "--db", ctx.config.DB_NAME, "--archive"], false),
    stdoutFile: outputFile,
  };
}

export function dbRestoreInvocation(ctx: DispatchContext, sourceFile: string): Invocation {
  return {
    ...dbExec(ctx, "mongorestore", [...authArgs(ctx), "--archive"], false),
    stdinFile: sourceFile,
  };
}

export function dbListVolumesInvocation(ctx: DispatchContext): Invocation {
  return dockerInvocation(ctx.config, ["volume", "ls", "--filter", `name=${ctx.config.DB_SERVICE}`]);
}

// =============================================================================
// Operations
// =============================================================================

export async function backupDatabase(
  ctx: DispatchContext,
  runner: CommandRunner,
  now: Date
): Promise<number> {
  const outputFile = path.join(ctx.config.BACKUP_DIR, backupFileName(now));
  // Credentials are checked before mkdir: a usage error leaves no directory behind
  const invocation = dbBackupInvocation(ctx, outputFile);

  await mkdir(ctx.config.BACKUP_DIR, { recursive: true });

  const code = await runner.run(invocation);
  if (code === 0) {
    log.db.info({ file: outputFile }, `backup saved to ${ctx.config.BACKUP_DIR}`);
  }
  return code;
}

export async function restoreDatabase(ctx: DispatchContext, runner: CommandRunner): Promise<number> {
  const usage = "Usage: stackctl db-restore --file backup/db-backup-YYYYMMDD-HHMMSS.archive";
  const { sourceFile } = ctx;

  if (sourceFile === undefined) {
    throw new UsageError("db-restore needs a source file", usage);
  }

  try {
    await access(sourceFile);
  } catch {
    throw new UsageError(`Backup file not found: ${sourceFile}`, usage);
  }

  const code = await runner.run(dbRestoreInvocation(ctx, sourceFile));
  if (code === 0) {
    log.db.info({ file: sourceFile }, `database restored from ${sourceFile}`);
  }
  return code;
}

import { spawn } from "node:child_process";
import { createReadStream, createWriteStream } from "node:fs";
import { constants } from "node:os";
import { pipeline } from "node:stream/promises";
import { log } from "./logger.js";

/**
 * One external process: what to run, where, and which files feed or
 * receive its standard streams. Everything else is inherited.
 */
export interface Invocation {
  command: string;
  args: string[];
  cwd?: string;
  /** stdout is streamed into this file instead of the terminal */
  stdoutFile?: string;
  /** stdin is read from this file instead of the terminal */
  stdinFile?: string;
}

export interface CommandRunner {
  /** Run to completion and resolve with the exit code. */
  run(invocation: Invocation): Promise<number>;
}

/**
 * Render an invocation the way a shell user would type it.
 */
export function formatInvocation(invocation: Invocation): string {
  const quote = (token: string) => (/[\s"'$`\\]/.test(token) ? JSON.stringify(token) : token);
  let line = [invocation.command, ...invocation.args].map(quote).join(" ");
  if (invocation.stdinFile) line += ` < ${invocation.stdinFile}`;
  if (invocation.stdoutFile) line += ` > ${invocation.stdoutFile}`;
  return invocation.cwd ? `(cd ${invocation.cwd} && ${line})` : line;
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  // Shell convention for death by signal
  const signo = signal === null ? undefined : SIGNAL_NUMBERS.get(signal);
  return signo === undefined ? 1 : 128 + signo;
}

/**
 * Spawns real processes. No timeout: a hung tool hangs the CLI.
 */
export class ProcessRunner implements CommandRunner {
  async run(invocation: Invocation): Promise<number> {
    log.dispatch.debug({ command: formatInvocation(invocation) }, "exec");

    const child = spawn(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      env: process.env,
      stdio: [
        invocation.stdinFile ? "pipe" : "inherit",
        invocation.stdoutFile ? "pipe" : "inherit",
        "inherit",
      ],
    });

    const exit = new Promise<number>((resolve, reject) => {
      child.once("error", reject);
      child.once("close", (code, signal) => resolve(exitCodeOf(code, signal)));
    });

    const transfers: Promise<void>[] = [];
    if (invocation.stdoutFile && child.stdout) {
      transfers.push(pipeline(child.stdout, createWriteStream(invocation.stdoutFile)));
    }
    if (invocation.stdinFile && child.stdin) {
      transfers.push(pipeline(createReadStream(invocation.stdinFile), child.stdin));
    }
    // Settled to a value; only inspected once the exit code is known
    const transferError = Promise.all(transfers).then(
      () => undefined,
      (err: unknown) => err
    );

    const code = await exit;
    const streamError = await transferError;

    if (streamError !== undefined) {
      if (code !== 0) {
        // The tool already failed; its exit code is the one to report
        log.dispatch.debug({ error: String(streamError) }, "stream closed early");
        return code;
      }
      throw streamError;
    }

    return code;
  }
}

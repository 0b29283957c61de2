import { ConfigError, loadConfig } from "@stackctl/config";
import { parseCommandLine } from "./args.js";
import { createContext } from "./context.js";
import { dispatch } from "./dispatcher.js";
import { EXIT_FAILURE, EXIT_USAGE, UsageError } from "./errors.js";
import { log, logFailure } from "./logger.js";
import type { OperationDeps } from "./operations.js";
import { ProcessRunner } from "./runner.js";

export function defaultDeps(): OperationDeps {
  return {
    runner: new ProcessRunner(),
    fetch,
    now: () => new Date(),
    write: (text) => {
      process.stdout.write(text);
    },
  };
}

/**
 * Parse argv, resolve the environment and run one command.
 * Resolves with the process exit code; never rejects.
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: OperationDeps = defaultDeps()
): Promise<number> {
  try {
    const commandLine = parseCommandLine(argv);

    return await dispatch(
      commandLine.command ?? "help",
      () => createContext(loadConfig(env, commandLine.overrides), commandLine.trailing),
      deps
    );
  } catch (error) {
    if (error instanceof UsageError) {
      log.system.error(error.message);
      if (error.hint) log.system.info(error.hint);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigError) {
      log.system.error({ issues: error.issues }, "Missing or invalid environment variables");
      return EXIT_USAGE;
    }
    logFailure("system", "command failed", error, { argv });
    return EXIT_FAILURE;
  }
}

import type { Config } from "@stackctl/config";
import type { DispatchContext } from "./context.js";
import type { CommandRunner, Invocation } from "./runner.js";

/**
 * `<compose command> -f <file> --env-file <env> <rest...>`
 */
export function composeInvocation(config: Config, composeFile: string, rest: readonly string[]): Invocation {
  const [command, ...prefix] = config.COMPOSE_COMMAND;
  return {
    command,
    args: [...prefix, "-f", composeFile, "--env-file", config.ENV_FILE, ...rest],
  };
}

export function dockerInvocation(config: Config, args: readonly string[]): Invocation {
  return { command: config.DOCKER_COMMAND, args: [...args] };
}

/** Which optional inputs a compose operation appends after its subcommand. */
export interface ComposeTemplate {
  subcommand: (ctx: DispatchContext) => readonly string[];
  extraArgs?: boolean;
  trailing?: boolean;
  service?: boolean;
}

/**
 * Order: subcommand, extra args, trailing tokens, service.
 */
export function buildComposeCommand(ctx: DispatchContext, template: ComposeTemplate): Invocation {
  return composeInvocation(ctx.config, ctx.composeFile, [
    ...template.subcommand(ctx),
    ...(template.extraArgs ? ctx.extraArgs : []),
    ...(template.trailing ? ctx.trailing : []),
    ...(template.service ? [ctx.service] : []),
  ]);
}

export const COMPOSE_TEMPLATES = {
  up: { subcommand: () => ["up"], extraArgs: true, trailing: true },
  down: { subcommand: () => ["down"], extraArgs: true, trailing: true },
  build: { subcommand: () => ["build"], extraArgs: true, trailing: true },
  logs: { subcommand: () => ["logs"], extraArgs: true, service: true },
  restart: { subcommand: () => ["restart"], trailing: true },
  shell: { subcommand: (ctx) => ["exec", ctx.service, "sh"] },
  ps: { subcommand: () => ["ps"] },
} satisfies Record<string, ComposeTemplate>;

export type ComposeOperationName = keyof typeof COMPOSE_TEMPLATES;

/**
 * Run invocations in order, stopping at the first non-zero exit code.
 * Resolves with that code, or the last one.
 */
export async function runSequence(
  runner: CommandRunner,
  invocations: readonly Invocation[]
): Promise<number> {
  let code = 0;
  for (const invocation of invocations) {
    code = await runner.run(invocation);
    if (code !== 0) {
      return code;
    }
  }
  return code;
}

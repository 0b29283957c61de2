import { resolveComposeFile, type Config, type Mode } from "@stackctl/config";

/**
 * The inputs an alias may pre-bind.
 */
export interface Binding {
  mode?: Mode;
  service?: string;
  extraArgs?: readonly string[];
}

/**
 * Everything one invocation needs, resolved once up front and never
 * mutated. `composeFile` is always derived from `mode`.
 */
export interface DispatchContext {
  readonly config: Config;
  readonly mode: Mode;
  readonly composeFile: string;
  readonly service: string;
  readonly extraArgs: readonly string[];
  /** Unrecognized command-line tokens, forwarded verbatim and last */
  readonly trailing: readonly string[];
  readonly sourceFile?: string;
}

export function createContext(config: Config, trailing: readonly string[] = []): DispatchContext {
  return {
    config,
    mode: config.MODE,
    composeFile: resolveComposeFile(config.MODE, config),
    service: config.SERVICE,
    extraArgs: config.ARGS,
    trailing,
    sourceFile: config.FILE,
  };
}

/**
 * Apply an alias binding. Bound values replace the context's own; the
 * compose file follows the (possibly new) mode.
 */
export function applyBinding(ctx: DispatchContext, binding: Binding): DispatchContext {
  const mode = binding.mode ?? ctx.mode;
  return {
    ...ctx,
    mode,
    composeFile: resolveComposeFile(mode, ctx.config),
    service: binding.service ?? ctx.service,
    extraArgs: binding.extraArgs ?? ctx.extraArgs,
  };
}

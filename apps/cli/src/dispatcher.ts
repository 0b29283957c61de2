import { applyBinding, type DispatchContext } from "./context.js";
import { UsageError } from "./errors.js";
import { createTimer, log } from "./logger.js";
import { CATALOG, type CatalogEntry, type ContextOperation, type OperationDeps } from "./operations.js";

export function lookup(name: string): CatalogEntry {
  const entry = CATALOG.get(name);
  if (entry === undefined) {
    throw new UsageError(`Unknown command "${name}"`, "Run `stackctl help` for the list of commands");
  }
  return entry;
}

/**
 * Resolve a context operation by name, applying an alias binding when
 * the name is an alias.
 */
export function resolveOperation(
  name: string,
  ctx: DispatchContext
): { operation: ContextOperation; ctx: DispatchContext } {
  const entry = lookup(name);

  switch (entry.kind) {
    case "operation":
      return { operation: entry, ctx };
    case "alias": {
      const target = CATALOG.get(entry.target);
      if (target?.kind !== "operation") {
        throw new Error(`Alias ${entry.name} points at ${entry.target}, which is not a base operation`);
      }
      return { operation: target, ctx: applyBinding(ctx, entry.bind) };
    }
    case "standalone":
      throw new Error(`${name} does not take a dispatch context`);
  }
}

/**
 * Run one named command. The context is only built when the command needs
 * it, so `help` works with a broken environment.
 *
 * Resolves with the exit code of the last external command.
 */
export async function dispatch(
  name: string,
  resolveContext: () => DispatchContext,
  deps: OperationDeps
): Promise<number> {
  const entry = lookup(name);

  if (entry.kind === "standalone") {
    return entry.run(deps);
  }

  const { operation, ctx } = resolveOperation(name, resolveContext());
  const elapsed = createTimer();
  log.dispatch.debug({ command: name, operation: operation.name, mode: ctx.mode }, "dispatch");

  const code = await operation.run(ctx, deps);
  log.dispatch.debug({ command: name, code, duration: elapsed() }, "done");
  return code;
}

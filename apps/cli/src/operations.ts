import { composeFiles } from "@stackctl/config";
import {
  buildComposeCommand,
  COMPOSE_TEMPLATES,
  composeInvocation,
  dockerInvocation,
  runSequence,
  type ComposeOperationName,
} from "./compose.js";
import type { Binding, DispatchContext } from "./context.js";
import {
  backupDatabase,
  dbListVolumesInvocation,
  dbResetInvocation,
  dbShellInvocation,
  restoreDatabase,
} from "./database.js";
import { checkAll, healthChecks, type FetchFn } from "./health-checker.js";
import { renderHelp, type Group } from "./help.js";
import type { CommandRunner, Invocation } from "./runner.js";

/**
 * Side-effecting collaborators, injected so tests can record instead of run.
 */
export interface OperationDeps {
  runner: CommandRunner;
  fetch: FetchFn;
  now: () => Date;
  write: (text: string) => void;
}

interface EntryBase {
  name: string;
  group: Group;
  summary: string;
  /** Shown in help; these cannot be undone */
  irreversible?: boolean;
}

/** Needs the resolved mode, compose file and inputs. */
export interface ContextOperation extends EntryBase {
  kind: "operation";
  run(ctx: DispatchContext, deps: OperationDeps): Promise<number>;
}

/** Runs without configuration, so it works even when the environment is broken. */
export interface StandaloneOperation extends EntryBase {
  kind: "standalone";
  run(deps: OperationDeps): Promise<number>;
}

/** Pre-binds inputs of a context operation. No logic of its own. */
export interface Alias extends EntryBase {
  kind: "alias";
  target: string;
  bind: Binding;
}

export type CatalogEntry = ContextOperation | StandaloneOperation | Alias;

// =============================================================================
// Base operations
// =============================================================================

function single(build: (ctx: DispatchContext) => Invocation) {
  return (ctx: DispatchContext, deps: OperationDeps) => deps.runner.run(build(ctx));
}

function compose(name: ComposeOperationName, summary: string): ContextOperation {
  return {
    kind: "operation",
    name,
    group: "Compose",
    summary,
    run: single((ctx) => buildComposeCommand(ctx, COMPOSE_TEMPLATES[name])),
  };
}

function backend(name: string, script: readonly string[], summary: string): ContextOperation {
  return {
    kind: "operation",
    name,
    group: "Backend",
    summary,
    run: single((ctx) => ({ command: "npm", args: [...script], cwd: ctx.config.BACKEND_DIR })),
  };
}

/** `down --remove-orphans` on both compose files, whatever the mode, then drop unused networks. */
export function cleanInvocations(ctx: DispatchContext): Invocation[] {
  const files = composeFiles(ctx.config);
  return [
    composeInvocation(ctx.config, files.development, ["down", "--remove-orphans"]),
    composeInvocation(ctx.config, files.production, ["down", "--remove-orphans"]),
    dockerInvocation(ctx.config, ["network", "prune", "-f"]),
  ];
}

const operations: CatalogEntry[] = [
  compose("up", "Start containers"),
  compose("down", "Stop and remove containers"),
  compose("build", "Build images"),
  compose("logs", "Show logs for SERVICE (default: backend)"),
  compose("restart", "Restart containers"),
  compose("shell", "Open a shell in SERVICE"),
  compose("ps", "List containers"),

  {
    kind: "operation",
    name: "db-reset",
    group: "Database",
    summary: "Drop the application database",
    run: single(dbResetInvocation),
  },
  {
    kind: "operation",
    name: "db-backup",
    group: "Database",
    summary: "Dump the database to BACKUP_DIR/db-backup-<timestamp>.archive",
    run: (ctx, deps) => backupDatabase(ctx, deps.runner, deps.now()),
  },
  {
    kind: "operation",
    name: "db-restore",
    group: "Database",
    summary: "Restore the database (use: stackctl db-restore --file backup/file.archive)",
    run: (ctx, deps) => restoreDatabase(ctx, deps.runner),
  },
  {
    kind: "operation",
    name: "db-shell",
    group: "Database",
    summary: "Open a MongoDB shell",
    run: single(dbShellInvocation),
  },
  {
    kind: "operation",
    name: "db-list-volumes",
    group: "Database",
    summary: "List database volumes",
    run: single(dbListVolumesInvocation),
  },

  backend("backend-build", ["run", "build"], "Build the backend"),
  backend("backend-install", ["install"], "Install backend dependencies"),
  backend("backend-type-check", ["run", "type-check"], "Type-check the backend"),
  backend("backend-dev", ["run", "dev"], "Run the backend dev server"),

  {
    kind: "operation",
    name: "clean",
    group: "Cleanup",
    summary: "Remove containers and networks of both environments",
    run: (ctx, deps) => runSequence(deps.runner, cleanInvocations(ctx)),
  },
  {
    kind: "operation",
    name: "clean-all",
    group: "Cleanup",
    summary: "clean, then remove ALL unused images, networks and volumes",
    irreversible: true,
    run: (ctx, deps) =>
      runSequence(deps.runner, [
        ...cleanInvocations(ctx),
        dockerInvocation(ctx.config, ["system", "prune", "-af", "--volumes"]),
      ]),
  },
  {
    kind: "operation",
    name: "clean-volumes",
    group: "Cleanup",
    summary: "Remove unused volumes",
    irreversible: true,
    run: single((ctx) => dockerInvocation(ctx.config, ["volume", "prune", "-f"])),
  },

  {
    kind: "operation",
    name: "health",
    group: "Utilities",
    summary: "Probe the gateway and backend health endpoints",
    run: async (ctx, deps) => {
      await checkAll(healthChecks(ctx.config), deps.fetch);
      // Probe failures are warnings only
      return 0;
    },
  },
  {
    kind: "standalone",
    name: "help",
    group: "Utilities",
    summary: "Show this help",
    run: async (deps) => {
      deps.write(renderHelp(CATALOG));
      return 0;
    },
  },
];

// =============================================================================
// Aliases
// =============================================================================

const BUILD_DETACHED = ["--build", "-d"] as const;

function alias(name: string, group: Group, target: string, bind: Binding, summary: string): Alias {
  return { kind: "alias", name, group, target, bind, summary };
}

const aliases: Alias[] = [
  alias("dev-up", "Development", "up", { mode: "development", extraArgs: BUILD_DETACHED }, "Start development environment"),
  alias("dev-down", "Development", "down", { mode: "development" }, "Stop development environment"),
  alias("dev-build", "Development", "build", { mode: "development" }, "Build development images"),
  alias("dev-logs", "Development", "logs", { mode: "development" }, "View development logs"),
  alias("dev-restart", "Development", "restart", { mode: "development" }, "Restart development environment"),
  alias("dev-shell", "Development", "shell", { mode: "development", service: "backend" }, "Open shell in backend container"),
  alias("dev-ps", "Development", "ps", { mode: "development" }, "List development containers"),

  alias("prod-up", "Production", "up", { mode: "production", extraArgs: BUILD_DETACHED }, "Start production environment"),
  alias("prod-down", "Production", "down", { mode: "production" }, "Stop production environment"),
  alias("prod-build", "Production", "build", { mode: "production" }, "Build production images"),
  alias("prod-logs", "Production", "logs", { mode: "production" }, "View production logs"),
  alias("prod-restart", "Production", "restart", { mode: "production" }, "Restart production environment"),

  alias("backend-shell", "Compose", "shell", { service: "backend" }, "Open shell in backend container"),
  alias("gateway-shell", "Compose", "shell", { service: "gateway" }, "Open shell in gateway container"),
  alias("mongo-shell", "Database", "db-shell", {}, "Same as db-shell"),
  alias("status", "Utilities", "ps", {}, "Same as ps"),
];

export const CATALOG: ReadonlyMap<string, CatalogEntry> = new Map(
  [...operations, ...aliases].map((entry) => [entry.name, entry])
);

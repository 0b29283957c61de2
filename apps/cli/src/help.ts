import type { CatalogEntry } from "./operations.js";

/** Help sections, in print order */
export const GROUPS = [
  "Compose",
  "Development",
  "Production",
  "Database",
  "Backend",
  "Cleanup",
  "Utilities",
] as const;
export type Group = (typeof GROUPS)[number];

const NAME_WIDTH = 20;

export const USAGE =
  "Usage: stackctl <command> [--mode development|production] [--service NAME] " +
  '[--args "..."] [--file PATH] [extra args...]';

function formatEntry(entry: CatalogEntry): string {
  const note = entry.irreversible ? " (IRREVERSIBLE)" : "";
  return `    ${entry.name.padEnd(NAME_WIDTH)} - ${entry.summary}${note}`;
}

/**
 * Static catalog of every command and alias, grouped for reading.
 */
export function renderHelp(catalog: ReadonlyMap<string, CatalogEntry>): string {
  const lines = [USAGE, "", "Available commands:"];

  for (const group of GROUPS) {
    const entries = [...catalog.values()].filter((entry) => entry.group === group);
    if (entries.length === 0) continue;

    lines.push(`  ${group}:`);
    lines.push(...entries.map(formatEntry));
    lines.push("");
  }

  lines.push(
    "Inputs may also come from the environment or the env file: MODE, SERVICE, ARGS, FILE.",
    "Unrecognized arguments are passed through to the underlying command."
  );

  return `${lines.join("\n")}\n`;
}

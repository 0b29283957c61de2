import { parseArgs } from "node:util";
import { UsageError } from "./errors.js";

/** Dispatcher options and the config keys they override. */
const OVERRIDE_KEYS = {
  mode: "MODE",
  service: "SERVICE",
  args: "ARGS",
  file: "FILE",
} as const;

type OptionName = keyof typeof OVERRIDE_KEYS;
export type Overrides = Partial<Record<(typeof OVERRIDE_KEYS)[OptionName], string>>;

function isOptionName(name: string): name is OptionName {
  return Object.hasOwn(OVERRIDE_KEYS, name);
}

export interface CommandLine {
  /** First positional token, if any */
  command?: string;
  overrides: Overrides;
  /** Every other token, in its original order */
  trailing: string[];
}

/**
 * Split argv into the command name, the dispatcher's own options and
 * everything else. Unknown flags and positionals are never rejected: they
 * end up in `trailing` untouched.
 */
export function parseCommandLine(argv: readonly string[]): CommandLine {
  const { tokens } = parseArgs({
    args: [...argv],
    options: {
      mode: { type: "string" },
      service: { type: "string" },
      args: { type: "string" },
      file: { type: "string" },
    },
    strict: false,
    allowPositionals: true,
    tokens: true,
  });

  const consumed = new Set<number>();
  const overrides: Overrides = {};
  let command: string | undefined;

  for (const token of tokens) {
    if (token.kind === "option-terminator") {
      break;
    }

    if (token.kind === "positional") {
      if (command === undefined) {
        command = token.value;
        consumed.add(token.index);
      }
      continue;
    }

    if (!isOptionName(token.name)) {
      continue;
    }

    if (token.value === undefined) {
      throw new UsageError(`--${token.name} needs a value`);
    }

    overrides[OVERRIDE_KEYS[token.name]] = token.value;
    consumed.add(token.index);
    if (!token.inlineValue) {
      consumed.add(token.index + 1);
    }
  }

  return {
    command,
    overrides,
    trailing: argv.filter((_, index) => !consumed.has(index)),
  };
}

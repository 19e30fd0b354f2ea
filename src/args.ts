import { z } from "zod";
import { CliError } from "./errors.js";

export type ParsedArgs<T> =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; options: T };

type BooleanFlag<T> = {
  [K in keyof T]-?: T[K] extends boolean ? K : never;
}[keyof T];

// Maps `-x` / `--long` to the option it sets and the value it sets it to.
export type FlagTable<T> = Record<string, readonly [BooleanFlag<T>, boolean]>;

const HELP_FLAGS = new Set(["-h", "--help"]);
const VERSION_FLAGS = new Set(["-v", "--version"]);

/**
 * Walk argv left to right. `--help` / `--version` win as soon as they are seen;
 * unknown flags and a second positional are user errors.
 */
function parseWith<T extends { target?: string }>(
  command: string,
  argv: readonly string[],
  flags: FlagTable<T>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): ParsedArgs<T> {
  const raw: Record<string, unknown> = {};

  for (const arg of argv) {
    if (HELP_FLAGS.has(arg)) return { kind: "help" };
    if (VERSION_FLAGS.has(arg)) return { kind: "version" };

    const flag = Object.hasOwn(flags, arg) ? flags[arg] : undefined;
    if (flag) {
      raw[String(flag[0])] = flag[1];
      continue;
    }

    if (arg.startsWith("-")) {
      throw new CliError(`Unknown option: ${arg}\nUse '${command} --help' for usage information`);
    }
    if (raw.target !== undefined) {
      throw new CliError("Multiple target paths specified");
    }
    raw.target = arg;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CliError(`Invalid arguments: ${parsed.error.issues.map((i) => i.message).join(", ")}`);
  }
  return { kind: "run", options: parsed.data };
}

export const installArgsSchema = z.object({
  force: z.boolean().default(false),
  backup: z.boolean().default(true),
  quiet: z.boolean().default(false),
  local: z.boolean().default(false),
  target: z.string().min(1).optional(),
});

export type InstallArgs = z.infer<typeof installArgsSchema>;

const INSTALL_FLAGS: FlagTable<InstallArgs> = {
  "-f": ["force", true],
  "--force": ["force", true],
  "-b": ["backup", false],
  "--no-backup": ["backup", false],
  "-q": ["quiet", true],
  "--quiet": ["quiet", true],
  "-l": ["local", true],
  "--local": ["local", true],
  "-s": ["local", false],
  "--system": ["local", false],
};

export function parseInstallArgs(argv: readonly string[]): ParsedArgs<InstallArgs> {
  return parseWith<InstallArgs>("vault-dotfiles", argv, INSTALL_FLAGS, installArgsSchema);
}

export const organizeArgsSchema = z.object({
  yes: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  headings: z.boolean().default(true),
  quiet: z.boolean().default(false),
  target: z.string().min(1).optional(),
});

export type OrganizeArgs = z.infer<typeof organizeArgsSchema>;

const ORGANIZE_FLAGS: FlagTable<OrganizeArgs> = {
  "-y": ["yes", true],
  "--yes": ["yes", true],
  "-n": ["dryRun", true],
  "--dry-run": ["dryRun", true],
  "--no-headings": ["headings", false],
  "-q": ["quiet", true],
  "--quiet": ["quiet", true],
};

export function parseOrganizeArgs(argv: readonly string[]): ParsedArgs<OrganizeArgs> {
  return parseWith<OrganizeArgs>("vault-organize", argv, ORGANIZE_FLAGS, organizeArgsSchema);
}

export const linkArgsSchema = z.object({
  perFolder: z.boolean().default(false),
  quiet: z.boolean().default(false),
  target: z.string().min(1).optional(),
});

export type LinkArgs = z.infer<typeof linkArgsSchema>;

const LINK_FLAGS: FlagTable<LinkArgs> = {
  "--per-folder": ["perFolder", true],
  "-q": ["quiet", true],
  "--quiet": ["quiet", true],
};

export function parseLinkArgs(argv: readonly string[]): ParsedArgs<LinkArgs> {
  return parseWith<LinkArgs>("vault-link", argv, LINK_FLAGS, linkArgsSchema);
}

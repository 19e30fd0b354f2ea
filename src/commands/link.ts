import path from "path";
import { parseLinkArgs } from "../args.js";
import { APP_VERSION, loadConfig } from "../config.js";
import { isDirectory } from "../fsutil.js";
import { linkNotes } from "../link.js";
import { createLogger } from "../log.js";
import { withCliErrors, type CommandIO } from "./io.js";

const COMMAND = "vault-link";

export function linkHelp(): string {
  return `Obsidian Note Linker

Usage:
  ${COMMAND} [OPTIONS] [DIR]

Appends a "**Next:** [[M-D-YYYY]]" link to every daily note, pointing at the
next note in date order. DIR defaults to $VAULT_TIDY_VAULT_DIR, or the current
directory.

Options:
  -h, --help          Show this help message
  -v, --version       Show version information
      --per-folder    Link notes within each YYYY-MM folder only
                      (default: across the whole vault)
  -q, --quiet         Suppress non-error output`;
}

export async function runLink(argv: readonly string[], io: CommandIO): Promise<number> {
  return withCliErrors(io, async () => {
    const parsed = parseLinkArgs(argv);
    if (parsed.kind === "help") {
      io.out(linkHelp());
      return 0;
    }
    if (parsed.kind === "version") {
      io.out(`Obsidian Note Linker\nVersion: ${APP_VERSION}`);
      return 0;
    }

    const args = parsed.options;
    const config = loadConfig(io.env);
    const logger = createLogger({ quiet: args.quiet, color: config.color && io.tty, out: io.out, err: io.err });

    const requested = args.target ?? config.vaultDir;
    const dir = path.resolve(io.cwd, requested);
    if (!(await isDirectory(dir))) {
      logger.error(`Directory '${requested}' does not exist`);
      return 1;
    }

    logger.info(`Linking notes in: ${dir}`);
    const summary = await linkNotes(dir, args.perFolder ? "folder" : "vault", logger);

    logger.plain("");
    logger.info(`Summary: ${summary.linked} links added, ${summary.skipped} files skipped`);
    if (summary.errors.length > 0) {
      logger.error(`Errors encountered: ${summary.errors.length}`);
      return 1;
    }
    logger.success("Linking complete!");
    return 0;
  });
}

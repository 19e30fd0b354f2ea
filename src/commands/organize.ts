import path from "path";
import { parseOrganizeArgs } from "../args.js";
import { APP_VERSION, loadConfig } from "../config.js";
import { isDirectory } from "../fsutil.js";
import { createLogger } from "../log.js";
import { organizeNotes, printOrganizeSummary } from "../organize.js";
import { withCliErrors, type CommandIO } from "./io.js";

const COMMAND = "vault-organize";

export function organizeHelp(): string {
  return `Obsidian File Organizer

Usage:
  ${COMMAND} [OPTIONS] [DIR]

Moves daily notes named M-D-YYYY.md from DIR into YYYY-MM folders.
DIR defaults to $VAULT_TIDY_VAULT_DIR, or the current directory.

Options:
  -h, --help          Show this help message
  -v, --version       Show version information
  -y, --yes           Don't ask for confirmation
  -n, --dry-run       Show where files would go without moving them
      --no-headings   Don't add a top-level heading to notes missing one
  -q, --quiet         Suppress non-error output`;
}

export async function runOrganize(argv: readonly string[], io: CommandIO): Promise<number> {
  return withCliErrors(io, async () => {
    const parsed = parseOrganizeArgs(argv);
    if (parsed.kind === "help") {
      io.out(organizeHelp());
      return 0;
    }
    if (parsed.kind === "version") {
      io.out(`Obsidian File Organizer\nVersion: ${APP_VERSION}`);
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

    logger.info(`Organizing files in: ${dir}`);

    if (!args.yes && !args.dryRun) {
      const response = (await io.ask("Do you want to proceed? (y/N): ")).trim().toLowerCase();
      if (response !== "y" && response !== "yes") {
        logger.info("Operation cancelled");
        return 0;
      }
    }

    const summary = await organizeNotes(dir, {
      fixHeadings: args.headings,
      dryRun: args.dryRun,
      logger,
    });
    if (summary.total === 0) return 0;

    printOrganizeSummary(summary, logger);
    logger.plain("");
    if (args.dryRun) {
      logger.success("Dry run complete; no files were changed");
    } else {
      logger.success("Organization complete!");
    }
    return summary.errors.length > 0 ? 1 : 0;
  });
}

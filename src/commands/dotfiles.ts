import path from "path";
import { parseInstallArgs, type InstallArgs } from "../args.js";
import { APP_VERSION, loadConfig, type Config } from "../config.js";
import { discoverVaultConfigs } from "../discover.js";
import { errorMessage } from "../errors.js";
import { isDirectory } from "../fsutil.js";
import { installDotfiles } from "../install.js";
import { createLogger, type Logger } from "../log.js";
import { parseSelection } from "../select.js";
import { withCliErrors, type CommandIO } from "./io.js";

const COMMAND = "vault-dotfiles";

export function dotfilesHelp(): string {
  return `Obsidian Dotfiles Installer

Usage:
  ${COMMAND} [OPTIONS] [TARGET_PATH]

Options:
  -h, --help          Show this help message
  -v, --version       Show version information
  -f, --force         Install to every directory found without asking
  -b, --no-backup     Skip creating backups
  -q, --quiet         Suppress non-error output
  -l, --local         Search only the current directory and subdirectories
  -s, --system        Search the entire system (default)

Arguments:
  TARGET_PATH         Specific .obsidian directory to install to

Examples:
  ${COMMAND}                              # Search entire system and install
  ${COMMAND} -l                           # Search only current directory
  ${COMMAND} /path/to/vault/.obsidian     # Install to a specific path
  ${COMMAND} -f -b                        # Install everywhere, no backups

The .obsidian folder in the current directory is the source. Existing
configurations are copied to <dir>_backup_YYYYMMDD_HHMMSS before they are
overwritten.`;
}

export function dotfilesVersion(): string {
  return `Obsidian Dotfiles Installer\nVersion: ${APP_VERSION}\nLicense: MIT`;
}

interface InstallContext {
  args: InstallArgs;
  source: string;
  logger: Logger;
  io: CommandIO;
}

async function installOne(ctx: InstallContext, target: string): Promise<boolean> {
  const { logger } = ctx;
  logger.info(`Installing to: ${target}`);
  try {
    const result = await installDotfiles(target, {
      source: ctx.source,
      backup: ctx.args.backup,
      now: ctx.io.now,
    });
    if (result.backupPath) {
      logger.warn(`Created backup: ${result.backupPath}`);
    }
    logger.success(`Successfully installed to: ${target}`);
    return true;
  } catch (error) {
    logger.error(`Failed to install to ${target}: ${errorMessage(error)}`);
    return false;
  }
}

async function chooseTargets(ctx: InstallContext, found: string[]): Promise<string[]> {
  const { logger, io } = ctx;
  if (found.length === 1) {
    logger.info("Automatically installing to the only found directory...");
    return found;
  }
  if (ctx.args.force) {
    logger.info("Force mode enabled: installing to all directories...");
    return found;
  }

  // The list is needed to answer the prompt, so it bypasses quiet mode.
  if (ctx.args.quiet) {
    found.forEach((dir, i) => io.out(`  ${i + 1}. ${dir}`));
  }
  logger.plain("");
  logger.info("Multiple .obsidian directories found. Which one(s) would you like to install to?");
  logger.info("Enter numbers separated by spaces (e.g., '1 3') or 'all' for all directories:");

  const selection = parseSelection(await io.ask("> "), found.length);
  for (const token of selection.invalid) {
    logger.error(`Invalid selection: ${token}`);
  }
  return selection.indices.map((i) => found[i]);
}

async function discoverTargets(ctx: InstallContext, config: Config): Promise<string[]> {
  const { args, logger, io } = ctx;
  const mode = args.local ? "local" : "system";
  const root = args.local ? io.cwd : path.parse(io.cwd).root;

  if (args.local) {
    logger.info("Searching for .obsidian directories in current directory and subdirectories...");
  } else {
    logger.info("Searching for .obsidian directories on entire system...");
    logger.warn("This may take a while depending on your system size");
  }

  const result = await discoverVaultConfigs({
    root,
    mode,
    sourceDir: ctx.source,
    name: path.basename(config.sourceDir),
    maxResults: config.maxResults,
  });

  if (result.truncated) {
    logger.warn(
      `Stopped after ${config.maxResults} results; use --local or pass a TARGET_PATH to narrow the search`,
    );
  }
  return result.directories;
}

export async function runDotfiles(argv: readonly string[], io: CommandIO): Promise<number> {
  return withCliErrors(io, async () => {
    const parsed = parseInstallArgs(argv);
    if (parsed.kind === "help") {
      io.out(dotfilesHelp());
      return 0;
    }
    if (parsed.kind === "version") {
      io.out(dotfilesVersion());
      return 0;
    }

    const args = parsed.options;
    const config = loadConfig(io.env);
    const logger = createLogger({
      quiet: args.quiet,
      color: config.color && io.tty,
      out: io.out,
      err: io.err,
    });

    const source = path.resolve(io.cwd, config.sourceDir);
    if (!(await isDirectory(source))) {
      logger.error(`Source directory '${config.sourceDir}' not found in current directory`);
      logger.info("Please ensure you have a .obsidian directory in the current folder");
      return 1;
    }

    logger.info("Starting Obsidian dotfiles installation...");
    logger.info(`Source directory: ${source}`);
    const ctx: InstallContext = { args, source, logger, io };

    if (args.target) {
      const target = path.resolve(io.cwd, args.target);
      if (!(await isDirectory(target))) {
        logger.error(`Target path '${args.target}' does not exist`);
        return 1;
      }
      if (!(await installOne(ctx, target))) return 1;
      logger.success("Installation complete!");
      return 0;
    }

    const found = await discoverTargets(ctx, config);
    if (found.length === 0) {
      logger.warn("No .obsidian directories found");
      if (args.local) {
        logger.info("Try using --system to search the entire system");
      }
      logger.info("You can manually specify a target directory by running:");
      logger.info(`  ${COMMAND} /path/to/your/vault/.obsidian`);
      return 0;
    }

    logger.info(`Found ${found.length} .obsidian directory(ies):`);
    found.forEach((dir, i) => logger.plain(`  ${i + 1}. ${dir}`));

    const targets = await chooseTargets(ctx, found);
    let failures = 0;
    for (const target of targets) {
      if (!(await installOne(ctx, target))) failures++;
    }

    if (targets.length === 0) {
      logger.warn("Nothing selected; no directories were changed");
      return 0;
    }
    if (failures > 0) {
      logger.error(`${failures} of ${targets.length} installation(s) failed`);
      return 1;
    }
    logger.success("Installation complete!");
    if (args.backup) {
      logger.info("Note: Backups were created for existing .obsidian directories");
    }
    return 0;
  });
}

// Library surface behind the vault-dotfiles, vault-organize and vault-link commands.
export { parseInstallArgs, parseLinkArgs, parseOrganizeArgs } from "./args.js";
export type { InstallArgs, LinkArgs, OrganizeArgs, ParsedArgs } from "./args.js";
export { APP_VERSION, SYSTEM_EXCLUDES, loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { bucketLabel, formatLongDate, isCalendarDate, parseNoteDate } from "./date.js";
export type { NoteDate } from "./date.js";
export { discoverVaultConfigs, isExcludedPath } from "./discover.js";
export type { DiscoveryOptions, DiscoveryResult, SearchMode } from "./discover.js";
export { CliError, isCliError } from "./errors.js";
export { parseFrontmatter } from "./frontmatter.js";
export { ensureHeading, withHeading } from "./heading.js";
export { backupPathFor, installDotfiles } from "./install.js";
export type { InstallOptions, InstallResult } from "./install.js";
export { linkNotes, planNextLinks } from "./link.js";
export type { LinkScope, LinkSummary } from "./link.js";
export { createLogger, createMemoryLogger } from "./log.js";
export type { Logger } from "./log.js";
export { moveWithoutClobber, resolveFreePath } from "./move.js";
export { organizeNotes } from "./organize.js";
export type { OrganizeOptions, OrganizeSummary } from "./organize.js";
export { parseSelection } from "./select.js";
export type { Selection } from "./select.js";
export { runDotfiles } from "./commands/dotfiles.js";
export { runLink } from "./commands/link.js";
export { runOrganize } from "./commands/organize.js";
export type { CommandIO } from "./commands/io.js";

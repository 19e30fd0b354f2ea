import { z } from "zod";
import { CliError } from "./errors.js";

export const APP_NAME = "vault-tidy";
export const APP_VERSION = "1.0.0";

// Directories never searched in system mode.
export const SYSTEM_EXCLUDES = ["proc", "sys", "dev", "tmp", "var", "usr", "etc"] as const;

const configSchema = z.object({
  // Name of the config folder to copy from and discover
  sourceDir: z.string().min(1).default(".obsidian"),
  // Discovery stops after this many matches
  maxResults: z.coerce.number().int().positive().default(100),
  // Default vault for vault-organize / vault-link when no DIR is given
  vaultDir: z.string().min(1).default("."),
  color: z.boolean(),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.safeParse({
    sourceDir: env.VAULT_TIDY_SOURCE_DIR || undefined,
    maxResults: env.VAULT_TIDY_MAX_RESULTS || undefined,
    vaultDir: env.VAULT_TIDY_VAULT_DIR || undefined,
    color: !env.NO_COLOR,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CliError(`Invalid configuration: ${issue.path.join(".")}: ${issue.message}`);
  }
  return parsed.data;
}

import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';

export const TOOL_DIR_NAME = 'mailsync-units';

const configSchema = z.object({
  /** Root the sync binary resolves `imapmaildir/accounts/<name>.toml` against */
  configHome: z.string().min(1),
  binaryPath: z.string().min(1),
  registryPath: z.string().min(1),
  /** Where generated files are written; normally the same as configHome */
  outputDir: z.string().min(1),
});

export type MailsyncUnitsConfig = z.infer<typeof configSchema>;

const fileConfigSchema = configSchema.omit({ configHome: true }).partial();

function expandHome(path: string): string {
  return path.replace(/^~(?=\/|$)/, homedir());
}

/** `$XDG_CONFIG_HOME`, falling back to `~/.config`. */
export function defaultConfigHome(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? expandHome(xdg) : join(homedir(), '.config');
}

function readFileConfig(configPath: string): Partial<MailsyncUnitsConfig> {
  if (!existsSync(configPath)) return {};
  try {
    const parsed = fileConfigSchema.safeParse(JSON.parse(readFileSync(configPath, 'utf-8')));
    if (parsed.success) return parsed.data;
    console.warn('[mailsync-units] Ignoring invalid config file:', configPath, parsed.error.issues[0].message);
  } catch {
    console.warn('[mailsync-units] Ignoring malformed config file:', configPath);
  }
  return {};
}

/**
 * Resolve tool settings: defaults, then environment, then
 * `<configHome>/mailsync-units/config.json`, then explicit overrides.
 */
export function resolveConfig(overrides?: Partial<MailsyncUnitsConfig>): MailsyncUnitsConfig {
  const env = process.env;
  const configHome = overrides?.configHome ?? defaultConfigHome();
  const fileConfig = readFileConfig(join(configHome, TOOL_DIR_NAME, 'config.json'));

  return configSchema.parse({
    configHome,
    binaryPath: overrides?.binaryPath
      ?? fileConfig.binaryPath
      ?? env.MAILSYNC_UNITS_BINARY
      ?? 'imapmaildir',
    registryPath: overrides?.registryPath
      ?? fileConfig.registryPath
      ?? (env.MAILSYNC_UNITS_REGISTRY ? expandHome(env.MAILSYNC_UNITS_REGISTRY) : undefined)
      ?? join(configHome, TOOL_DIR_NAME, 'accounts.json5'),
    outputDir: overrides?.outputDir
      ?? fileConfig.outputDir
      ?? (env.MAILSYNC_UNITS_OUTPUT_DIR ? expandHome(env.MAILSYNC_UNITS_OUTPUT_DIR) : undefined)
      ?? configHome,
  });
}

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { getConfigPath, getDefaultVaultPath } from "../config/paths.js";
import { ConfigError } from "./errors.js";

// ============================================================================
// Atomic file writes
// ============================================================================

/**
 * Flush a file's contents to the storage device
 */
async function fsyncFile(filePath: string): Promise<void> {
  const handle = await fs.open(filePath, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Write a file atomically: temp file, fsync, rename. Mode 0o600, parent
 * directory created with 0o700. On failure the temp file is removed and the
 * target is left as it was.
 */
export async function atomicWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });

  const tempFile = `${filePath}.tmp`;
  try {
    await fs.writeFile(tempFile, content, { mode: 0o600 });
    await fsyncFile(tempFile);
    await fs.rename(tempFile, filePath);
  } catch (error) {
    await fs.rm(tempFile, { force: true });
    throw error;
  }
}

/**
 * Read a text file, returning null when it does not exist
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) {
      return null;
    }
    throw err;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ============================================================================
// App config
// ============================================================================

const CURRENT_CONFIG_VERSION = 1;

export const AppConfigSchema = z.object({
  version: z.literal(CURRENT_CONFIG_VERSION),
  vaultPath: z.string().min(1).optional(),
  autoUpload: z.boolean().default(false),
  backupTimeoutMs: z.number().int().positive().default(30_000),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

function defaultAppConfig(): AppConfig {
  return {
    version: CURRENT_CONFIG_VERSION,
    autoUpload: false,
    backupTimeoutMs: 30_000,
  };
}

/**
 * Read app config. A missing file yields the defaults; a malformed one is a
 * ConfigError.
 */
export async function readAppConfig(): Promise<AppConfig> {
  const configPath = getConfigPath();
  const content = await readFileIfExists(configPath);
  if (content === null) {
    return defaultAppConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Config file is not valid JSON: ${configPath}`);
  }

  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file: ${configPath}`, parsed.error.issues);
  }
  return parsed.data;
}

export type AppConfigChanges = Partial<Omit<AppConfig, "version">>;

/**
 * Merge changes into the stored config, validate, write atomically.
 * Fields left undefined keep their current value.
 */
export async function updateAppConfig(changes: AppConfigChanges): Promise<AppConfig> {
  const current = await readAppConfig();
  const merged: Record<string, unknown> = { ...current };
  for (const [field, value] of Object.entries(changes)) {
    if (value !== undefined) {
      merged[field] = value;
    }
  }

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError("Invalid config value", parsed.error.issues);
  }
  await atomicWriteFile(getConfigPath(), JSON.stringify(parsed.data, null, 2));
  return parsed.data;
}

/**
 * Vault file location: the configured path, else the default one
 */
export function resolveVaultPath(config: AppConfig): string {
  return config.vaultPath ?? getDefaultVaultPath();
}

import path from "path";
import os from "os";

export const APP_NAME = "coffer";
export const APP_VERSION = "0.1.0";

const VAULT_FILE = "vault.json";
const CONFIG_FILE = "config.json";

/**
 * Storage directory. Override with the COFFER_HOME environment variable.
 */
export function getStorageDir(): string {
  return process.env.COFFER_HOME || path.join(os.homedir(), `.${APP_NAME}`);
}

export function getConfigPath(): string {
  return path.join(getStorageDir(), CONFIG_FILE);
}

/**
 * Default vault location, used when the config names none
 */
export function getDefaultVaultPath(): string {
  return path.join(getStorageDir(), VAULT_FILE);
}

/**
 * Remote object name used for the off-site copy of a vault file
 */
export function getBackupName(vaultPath: string): string {
  return `${path.basename(vaultPath)}.BAK`;
}

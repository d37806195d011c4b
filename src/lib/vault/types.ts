/**
 * Types for the vault engine.
 *
 * On disk (vault.json) every byte field is base64. Container ids are stored in
 * the clear; names and data only ever appear inside `cipher`.
 */

import type { ScryptParams } from "../utils/encryption.js";
import type { BackupGateway, BackupCredentials, BackupToken } from "../services/backup-gateway.js";

export const VAULT_FILE_VERSION = 1 as const;

/** Reserved container ids for the backup settings */
export const CREDENTIALS_CONTAINER_ID = -1;
export const TOKEN_CONTAINER_ID = -2;

/**
 * Key header: everything needed to re-derive the vault key from the password
 */
export interface KeyHeader {
  /** 32-byte scrypt salt (base64) */
  salt: string;
  /** 16-byte key-generation nonce (base64), bound into the vault MAC */
  iv: string;
  kdf: ScryptParams;
}

/**
 * A single encrypted container as stored on disk
 */
export interface ContainerRecord {
  id: number;
  /** AES-256-CBC ciphertext of {"name","data"} (base64) */
  cipher: string;
  /** HMAC-SHA256 over id, salt, iv and cipher (base64) */
  mac: string;
  /** Salt of the key this record was encrypted under (base64) */
  salt: string;
  /** 16-byte IV, fresh per encryption (base64) */
  iv: string;
}

/**
 * Top-level structure of vault.json
 */
export interface VaultFile {
  version: typeof VAULT_FILE_VERSION;
  key: KeyHeader;
  /** Next container id to hand out; ids are never reused */
  nextId: number;
  containers: ContainerRecord[];
  /** HMAC-SHA256 over the key header, nextId and each container's id, salt and MAC (base64) */
  mac: string;
}

/**
 * Plaintext view of a container, safe to hand to callers
 */
export interface ContainerInfo {
  id: number;
  name: string;
  data: string;
}

export type ContainerSummary = Omit<ContainerInfo, "data">;

export type ContainerStatus = "ok" | "integrity" | "corrupt";

/**
 * Result of checking every persisted record under the current key
 */
export interface IntegrityReport {
  /** true only when the vault MAC and every container verified */
  ok: boolean;
  vaultMac: boolean;
  containers: Array<{ id: number; status: ContainerStatus }>;
}

export type BackupGatewayFactory = (
  credentials: BackupCredentials,
  token: BackupToken | null
) => BackupGateway;

export interface VaultOptions {
  /** Location of vault.json */
  path: string;
  /** Scrypt cost for new key material; existing vaults use the cost in their header */
  kdf?: ScryptParams;
  /** Builds the backup client from the stored credentials */
  gatewayFactory?: BackupGatewayFactory;
  /** Remote object name; defaults to "<file name>.BAK" */
  backupName?: string;
}

export interface BackupReceipt {
  remoteName: string;
}

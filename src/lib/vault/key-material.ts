/**
 * Vault key material: salt + iv + keys derived from the master password.
 *
 * The scrypt output is never stored. It is expanded into three sub-keys
 * (container encryption, container MAC, vault MAC) and then zeroed.
 */

import {
  DEFAULT_SCRYPT_PARAMS,
  IV_BYTES,
  SALT_BYTES,
  KEY_BYTES,
  deriveKey,
  expandKey,
  randomBytes,
  type ScryptParams,
} from "../utils/encryption.js";
import { CorruptFormatError, InvalidPasswordError, VaultLockedError } from "../utils/errors.js";
import { err, ok, type Result } from "../utils/result.js";
import type { KeyHeader } from "./types.js";

const MIN_LOG2_N = 10;
const MAX_LOG2_N = 18;
const MAX_R = 16;
const MAX_P = 4;

/**
 * Check scrypt parameters read from disk. Returns a reason when they are out
 * of bounds, null when they are acceptable. The bounds cap a derivation at
 * about 512 MiB of memory.
 */
export function checkScryptParams(params: ScryptParams): string | null {
  const { N, r, p, keyLen } = params;
  const log2N = Math.log2(N);
  if (!Number.isInteger(log2N) || log2N < MIN_LOG2_N || log2N > MAX_LOG2_N) {
    return `scrypt N must be a power of two between 2^${MIN_LOG2_N} and 2^${MAX_LOG2_N}`;
  }
  if (!Number.isInteger(r) || r < 1 || r > MAX_R) {
    return `scrypt r must be an integer between 1 and ${MAX_R}`;
  }
  if (!Number.isInteger(p) || p < 1 || p > MAX_P) {
    return `scrypt p must be an integer between 1 and ${MAX_P}`;
  }
  if (keyLen !== KEY_BYTES) {
    return `scrypt keyLen must be ${KEY_BYTES}`;
  }
  return null;
}

export class KeyMaterial {
  private destroyed = false;

  private constructor(
    readonly salt: Buffer,
    readonly iv: Buffer,
    readonly kdf: ScryptParams,
    private readonly encKey: Buffer,
    private readonly containerMacKey: Buffer,
    private readonly headerMacKey: Buffer
  ) {}

  /**
   * Fresh random salt and iv, then derive. Used on vault creation, password
   * change and key regeneration.
   */
  static async generate(
    password: string,
    kdf: ScryptParams = DEFAULT_SCRYPT_PARAMS
  ): Promise<Result<KeyMaterial, InvalidPasswordError | CorruptFormatError>> {
    return KeyMaterial.derive(password, randomBytes(SALT_BYTES), randomBytes(IV_BYTES), kdf);
  }

  /**
   * Derive key material from the password and an existing salt/iv.
   * Deterministic for fixed inputs.
   */
  static async derive(
    password: string,
    salt: Buffer,
    iv: Buffer,
    kdf: ScryptParams
  ): Promise<Result<KeyMaterial, InvalidPasswordError | CorruptFormatError>> {
    if (!password) {
      return err(new InvalidPasswordError());
    }
    if (salt.length !== SALT_BYTES) {
      return err(new CorruptFormatError(`salt must be ${SALT_BYTES} bytes, got ${salt.length}`));
    }
    if (iv.length !== IV_BYTES) {
      return err(new CorruptFormatError(`iv must be ${IV_BYTES} bytes, got ${iv.length}`));
    }
    const problem = checkScryptParams(kdf);
    if (problem) {
      return err(new CorruptFormatError(problem, { kdf }));
    }

    let master: Buffer;
    try {
      master = await deriveKey(password, salt, kdf);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new CorruptFormatError(`key derivation failed: ${reason}`, { kdf }));
    }
    try {
      return ok(
        new KeyMaterial(
          Buffer.from(salt),
          Buffer.from(iv),
          { ...kdf },
          expandKey(master, salt, "coffer/container-enc/v1"),
          expandKey(master, salt, "coffer/container-mac/v1"),
          expandKey(master, salt, "coffer/vault-mac/v1")
        )
      );
    } finally {
      master.fill(0);
    }
  }

  /**
   * Re-derive from a persisted key header
   */
  static async fromHeader(
    password: string,
    header: KeyHeader
  ): Promise<Result<KeyMaterial, InvalidPasswordError | CorruptFormatError>> {
    return KeyMaterial.derive(
      password,
      Buffer.from(header.salt, "base64"),
      Buffer.from(header.iv, "base64"),
      header.kdf
    );
  }

  toHeader(): KeyHeader {
    return {
      salt: this.salt.toString("base64"),
      iv: this.iv.toString("base64"),
      kdf: { ...this.kdf },
    };
  }

  get encryptionKey(): Buffer {
    return this.use(this.encKey);
  }

  get macKey(): Buffer {
    return this.use(this.containerMacKey);
  }

  get vaultMacKey(): Buffer {
    return this.use(this.headerMacKey);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Zero the derived keys. The object is unusable afterwards.
   */
  destroy(): void {
    this.encKey.fill(0);
    this.containerMacKey.fill(0);
    this.headerMacKey.fill(0);
    this.destroyed = true;
  }

  private use(key: Buffer): Buffer {
    if (this.destroyed) {
      throw new VaultLockedError();
    }
    return key;
  }
}

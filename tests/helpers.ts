import fs from "fs/promises";
import os from "os";
import path from "path";
import type { ScryptParams } from "../src/lib/utils/encryption.js";
import type { BackupGateway } from "../src/lib/services/backup-gateway.js";
import { decodeVaultFile, encodeVaultFile } from "../src/lib/vault/codec.js";
import type { VaultFile } from "../src/lib/vault/types.js";
import { unwrap } from "../src/lib/utils/result.js";

/** Lowest accepted scrypt cost, so tests do not spend seconds per derivation */
export const FAST_KDF: ScryptParams = { N: 1024, r: 8, p: 1, keyLen: 32 };

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "coffer-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function readVaultFile(filePath: string): Promise<VaultFile> {
  return unwrap(decodeVaultFile(await fs.readFile(filePath, "utf8")));
}

export async function writeVaultFile(filePath: string, file: VaultFile): Promise<void> {
  await fs.writeFile(filePath, encodeVaultFile(file));
}

/** Flip the lowest bit of the first byte of a base64 field */
export function flipBit(base64: string): string {
  const bytes = Buffer.from(base64, "base64");
  bytes[0] ^= 0x01;
  return bytes.toString("base64");
}

/**
 * In-process backup store. Objects live in a Map; failures are switched on
 * per test.
 */
export class MemoryBackupGateway implements BackupGateway {
  readonly objects = new Map<string, Buffer>();
  failWith: Error | null = null;
  reject = false;

  async upload(localPath: string, remoteName: string): Promise<boolean> {
    this.check();
    if (this.reject) return false;
    this.objects.set(remoteName, await fs.readFile(localPath));
    return true;
  }

  async download(remoteName: string, localPath: string): Promise<boolean> {
    this.check();
    const bytes = this.objects.get(remoteName);
    if (this.reject || !bytes) return false;
    await fs.writeFile(localPath, bytes);
    return true;
  }

  async delete(remoteName: string): Promise<boolean> {
    this.check();
    if (this.reject) return false;
    return this.objects.delete(remoteName);
  }

  private check(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

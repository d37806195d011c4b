import { z } from "zod";
import {
  IV_BYTES,
  computeMac,
  decryptBytes,
  encryptBytes,
  macEquals,
  randomBytes,
} from "../utils/encryption.js";
import { CorruptFormatError, IntegrityError } from "../utils/errors.js";
import { err, ok, type Result } from "../utils/result.js";
import type { KeyMaterial } from "./key-material.js";
import type { ContainerInfo, ContainerRecord } from "./types.js";

const PayloadSchema = z.object({
  name: z.string(),
  data: z.string(),
});

/**
 * MAC input: the clear-text id is authenticated together with the ciphertext,
 * so a record cannot be moved to another id.
 */
function macParts(id: number, salt: Buffer, iv: Buffer, cipher: Buffer): Buffer[] {
  return [Buffer.from(String(id), "utf8"), salt, iv, cipher];
}

/**
 * A named secret. Plaintext in memory; the Vault persists it via encrypt().
 */
export class Container {
  constructor(
    readonly id: number,
    private name: string,
    private data: string
  ) {}

  getName(): string {
    return this.name;
  }

  getData(): string {
    return this.data;
  }

  /** Changes this object only; persist through Vault.updateContainer */
  setName(name: string): void {
    this.name = name;
  }

  /** Changes this object only; persist through Vault.updateContainer */
  setData(data: string): void {
    this.data = data;
  }

  toInfo(): ContainerInfo {
    return { id: this.id, name: this.name, data: this.data };
  }

  /**
   * Encrypt-then-MAC under the given key with a fresh IV
   */
  encrypt(key: KeyMaterial): ContainerRecord {
    const iv = randomBytes(IV_BYTES);
    const plaintext = Buffer.from(JSON.stringify({ name: this.name, data: this.data }), "utf8");
    const cipher = encryptBytes(plaintext, key.encryptionKey, iv);
    plaintext.fill(0);
    const mac = computeMac(key.macKey, macParts(this.id, key.salt, iv, cipher));

    return {
      id: this.id,
      cipher: cipher.toString("base64"),
      mac: mac.toString("base64"),
      salt: key.salt.toString("base64"),
      iv: iv.toString("base64"),
    };
  }

  /**
   * Verify the MAC, then decrypt. A MAC mismatch is an IntegrityError and
   * nothing is decrypted. Anything wrong after a good MAC means the payload
   * was written badly, which is a CorruptFormatError.
   */
  static decrypt(
    key: KeyMaterial,
    record: ContainerRecord
  ): Result<Container, IntegrityError | CorruptFormatError> {
    const salt = Buffer.from(record.salt, "base64");
    const iv = Buffer.from(record.iv, "base64");
    const cipher = Buffer.from(record.cipher, "base64");
    const expected = computeMac(key.macKey, macParts(record.id, salt, iv, cipher));

    if (!macEquals(expected, Buffer.from(record.mac, "base64"))) {
      return err(new IntegrityError(record.id));
    }

    let plaintext: Buffer;
    try {
      plaintext = decryptBytes(cipher, key.encryptionKey, iv);
    } catch {
      return err(new CorruptFormatError(`container ${record.id} has invalid padding`));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(plaintext.toString("utf8"));
    } catch {
      return err(new CorruptFormatError(`container ${record.id} payload is not valid JSON`));
    } finally {
      plaintext.fill(0);
    }

    const payload = PayloadSchema.safeParse(raw);
    if (!payload.success) {
      return err(
        new CorruptFormatError(`container ${record.id} payload has the wrong shape`, payload.error.issues)
      );
    }
    return ok(new Container(record.id, payload.data.name, payload.data.data));
  }
}

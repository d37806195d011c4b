/**
 * vault.json codec: schema validation on load, canonical serialization on
 * save, and the vault-level MAC that binds the key header to the records.
 */

import { z } from "zod";
import { IV_BYTES, MAC_BYTES, SALT_BYTES, computeMac, macEquals } from "../utils/encryption.js";
import { CorruptFormatError } from "../utils/errors.js";
import { err, ok, type Result } from "../utils/result.js";
import type { KeyMaterial } from "./key-material.js";
import { VAULT_FILE_VERSION, type ContainerRecord, type KeyHeader, type VaultFile } from "./types.js";

const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function base64Bytes(length?: number) {
  return z
    .string()
    .regex(BASE64_REGEX, "must be base64")
    .refine((val) => length === undefined || Buffer.from(val, "base64").length === length, {
      message: `must decode to ${length} bytes`,
    });
}

const cipherSchema = base64Bytes().refine(
  (val) => {
    const size = Buffer.from(val, "base64").length;
    return size > 0 && size % IV_BYTES === 0;
  },
  { message: "must be a non-empty multiple of the block size" }
);

const ScryptParamsSchema = z.object({
  N: z.number().int(),
  r: z.number().int(),
  p: z.number().int(),
  keyLen: z.number().int(),
});

const KeyHeaderSchema = z.object({
  salt: base64Bytes(SALT_BYTES),
  iv: base64Bytes(IV_BYTES),
  kdf: ScryptParamsSchema,
});

const ContainerRecordSchema = z.object({
  id: z.number().int(),
  cipher: cipherSchema,
  mac: base64Bytes(MAC_BYTES),
  salt: base64Bytes(SALT_BYTES),
  iv: base64Bytes(IV_BYTES),
});

export const VaultFileSchema = z
  .object({
    version: z.literal(VAULT_FILE_VERSION),
    key: KeyHeaderSchema,
    nextId: z.number().int().min(1),
    containers: z.array(ContainerRecordSchema),
    mac: base64Bytes(MAC_BYTES),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<number>();
    for (const record of file.containers) {
      if (seen.has(record.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate container id ${record.id}` });
      }
      seen.add(record.id);
      if (record.id >= file.nextId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `container id ${record.id} is not below nextId ${file.nextId}`,
        });
      }
    }
  });

/**
 * Parse and validate vault.json. Never coerces: any deviation is CorruptFormat.
 */
export function decodeVaultFile(content: string): Result<VaultFile, CorruptFormatError> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return err(new CorruptFormatError("vault file is not valid JSON (file may be empty or truncated)"));
  }

  const parsed = VaultFileSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new CorruptFormatError(
        "vault file does not match the expected schema",
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      )
    );
  }
  return ok(parsed.data);
}

export function encodeVaultFile(file: VaultFile): string {
  return JSON.stringify(file, null, 2);
}

/**
 * Vault MAC over the key header, nextId and every container's id, salt and
 * MAC in id order. Catches dropped or swapped records, a replaced record salt
 * and a wrong password on an empty vault.
 */
export function computeVaultMac(
  key: KeyMaterial,
  header: KeyHeader,
  nextId: number,
  containers: readonly ContainerRecord[]
): string {
  const { N, r, p, keyLen } = header.kdf;
  const parts: Buffer[] = [
    Buffer.from(String(VAULT_FILE_VERSION), "utf8"),
    Buffer.from(header.salt, "base64"),
    Buffer.from(header.iv, "base64"),
    Buffer.from(`${N}:${r}:${p}:${keyLen}`, "utf8"),
    Buffer.from(String(nextId), "utf8"),
  ];
  const sorted = [...containers].sort((a, b) => a.id - b.id);
  for (const record of sorted) {
    parts.push(
      Buffer.from(String(record.id), "utf8"),
      Buffer.from(record.salt, "base64"),
      Buffer.from(record.mac, "base64")
    );
  }
  return computeMac(key.vaultMacKey, parts).toString("base64");
}

export function verifyVaultMac(key: KeyMaterial, file: VaultFile): boolean {
  const expected = Buffer.from(computeVaultMac(key, file.key, file.nextId, file.containers), "base64");
  return macEquals(expected, Buffer.from(file.mac, "base64"));
}

/**
 * Assemble a complete, MAC'd vault file
 */
export function buildVaultFile(
  key: KeyMaterial,
  nextId: number,
  containers: ContainerRecord[]
): VaultFile {
  const header = key.toHeader();
  return {
    version: VAULT_FILE_VERSION,
    key: header,
    nextId,
    containers,
    mac: computeVaultMac(key, header, nextId, containers),
  };
}

import crypto from "crypto";

/**
 * Scrypt cost parameters, stored next to the salt so a vault always
 * re-derives with the cost it was created with
 */
export interface ScryptParams {
  N: number; // CPU/memory cost
  r: number; // Block size
  p: number; // Parallelization
  keyLen: number; // Key length
}

// Cost for newly generated keys
export const DEFAULT_SCRYPT_PARAMS: ScryptParams = {
  N: 32768, // 2^15
  r: 8,
  p: 1,
  keyLen: 32,
};

export const SALT_BYTES = 32;
export const IV_BYTES = 16; // AES block size
export const KEY_BYTES = 32;
export const MAC_BYTES = 32; // HMAC-SHA256

const CIPHER = "aes-256-cbc";
const MAC_DIGEST = "sha256";

/**
 * Derive the master key from a password using scrypt
 */
export function deriveKey(
  password: string,
  salt: Buffer,
  params: ScryptParams
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.scrypt(
      password,
      salt,
      params.keyLen,
      {
        N: params.N,
        r: params.r,
        p: params.p,
        maxmem: 256 * params.N * params.r,
      },
      (err, derivedKey) => {
        if (err) {
          reject(err);
        } else {
          resolve(derivedKey);
        }
      }
    );
  });
}

/**
 * Expand a sub-key from the master key with HKDF-SHA256. Encryption and MAC
 * keys use different labels.
 */
export function expandKey(masterKey: Buffer, salt: Buffer, label: string): Buffer {
  return Buffer.from(crypto.hkdfSync(MAC_DIGEST, masterKey, salt, label, KEY_BYTES));
}

/**
 * AES-256-CBC encrypt. The caller supplies a fresh IV for every call.
 */
export function encryptBytes(plaintext: Buffer, key: Buffer, iv: Buffer): Buffer {
  const cipher = crypto.createCipheriv(CIPHER, key, iv);
  return Buffer.concat([cipher.update(plaintext), cipher.final()]);
}

/**
 * AES-256-CBC decrypt. Throws on bad padding; only call after the MAC checked out.
 */
export function decryptBytes(ciphertext: Buffer, key: Buffer, iv: Buffer): Buffer {
  const decipher = crypto.createDecipheriv(CIPHER, key, iv);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}

/**
 * HMAC-SHA256 over length-prefixed parts, so part boundaries are unambiguous
 */
export function computeMac(key: Buffer, parts: Buffer[]): Buffer {
  const hmac = crypto.createHmac(MAC_DIGEST, key);
  for (const part of parts) {
    const length = Buffer.alloc(4);
    length.writeUInt32BE(part.length);
    hmac.update(length);
    hmac.update(part);
  }
  return hmac.digest();
}

/**
 * Constant-time MAC comparison
 */
export function macEquals(expected: Buffer, actual: Buffer): boolean {
  if (expected.length !== actual.length) {
    return false;
  }
  return crypto.timingSafeEqual(expected, actual);
}

/**
 * Generate cryptographically secure random bytes
 */
export function randomBytes(length: number): Buffer {
  return crypto.randomBytes(length);
}

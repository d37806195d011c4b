import crypto from "crypto";

const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";
const UPPERCASE = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const DIGITS = "0123456789";
const SYMBOLS = "!#$%&()*+,-./:;<=>?@[]^_{|}~";

export interface PasswordOptions {
  length: number;
  uppercase?: boolean;
  digits?: boolean;
  symbols?: boolean;
}

export const MIN_PASSWORD_LENGTH = 8;
export const MAX_PASSWORD_LENGTH = 256;

/**
 * Generate a random password from crypto.randomInt (no modulo bias).
 * Every enabled character class appears at least once.
 */
export function generatePassword(options: PasswordOptions): string {
  const { length, uppercase = true, digits = true, symbols = true } = options;
  if (!Number.isInteger(length) || length < MIN_PASSWORD_LENGTH || length > MAX_PASSWORD_LENGTH) {
    throw new RangeError(
      `Password length must be an integer between ${MIN_PASSWORD_LENGTH} and ${MAX_PASSWORD_LENGTH}`
    );
  }

  const classes = [LOWERCASE];
  if (uppercase) classes.push(UPPERCASE);
  if (digits) classes.push(DIGITS);
  if (symbols) classes.push(SYMBOLS);
  const alphabet = classes.join("");

  const chars = classes.map((set) => set[crypto.randomInt(set.length)]);
  while (chars.length < length) {
    chars.push(alphabet[crypto.randomInt(alphabet.length)]);
  }

  // Fisher-Yates, so the guaranteed characters are not always first
  for (let i = chars.length - 1; i > 0; i--) {
    const j = crypto.randomInt(i + 1);
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }
  return chars.join("");
}

import { redactSensitive } from "./redact.js";

/**
 * Base error class for coffer
 */
export class CofferError extends Error {
  public readonly suggestion: string;

  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
    suggestion?: string
  ) {
    super(message);
    this.name = "CofferError";
    this.suggestion =
      suggestion ?? "Run: coffer verify-integrity --password <password> to inspect the vault";
  }
}

/**
 * The master password does not unlock the vault. Does not say which record
 * failed.
 */
export class AuthError extends CofferError {
  constructor() {
    super(
      "Cannot unlock vault: the password is incorrect or the vault file has been tampered with.",
      "AUTH_ERROR",
      undefined,
      "Check the password. If it is correct, run: coffer recover --password <password>"
    );
    this.name = "AuthError";
  }
}

/**
 * A single container failed MAC verification under an otherwise valid key
 */
export class IntegrityError extends CofferError {
  constructor(public readonly containerId: number) {
    super(
      `Integrity error: invalid MAC for container ${containerId}. The container may have been tampered with.`,
      "INTEGRITY_ERROR",
      { containerId },
      "Restore the vault from a backup (coffer download) or drop the container with coffer recover"
    );
    this.name = "IntegrityError";
  }
}

/**
 * Error when a container id is not in the vault
 */
export class NotFoundError extends CofferError {
  constructor(public readonly containerId: number) {
    super(
      `Container with ID ${containerId} not found`,
      "NOT_FOUND",
      { containerId },
      "Run: coffer list --password <password> to see the available ids"
    );
    this.name = "NotFoundError";
  }
}

/**
 * The vault file (or a decrypted payload) does not have the expected shape
 */
export class CorruptFormatError extends CofferError {
  constructor(message: string, details?: unknown) {
    super(
      `Corrupt vault: ${message}`,
      "CORRUPT_FORMAT",
      details,
      "Restore the vault from a backup with: coffer download --password <password>"
    );
    this.name = "CorruptFormatError";
  }
}

/**
 * Any failure talking to the backup store. Local state is never touched.
 */
export class BackupTransportError extends CofferError {
  constructor(message: string, details?: unknown) {
    super(
      message,
      "BACKUP_TRANSPORT_ERROR",
      details,
      "Check the backup credentials with: coffer set-credentials --file <credentials.json>"
    );
    this.name = "BackupTransportError";
  }
}

export class VaultExistsError extends CofferError {
  constructor(public readonly vaultPath: string) {
    super(
      `A vault already exists at ${vaultPath}`,
      "VAULT_EXISTS",
      { vaultPath },
      "Open the existing vault instead, or move it away before creating a new one"
    );
    this.name = "VaultExistsError";
  }
}

export class VaultNotFoundError extends CofferError {
  constructor(public readonly vaultPath: string) {
    super(
      `No vault found at ${vaultPath}`,
      "VAULT_NOT_FOUND",
      { vaultPath },
      "Create one with: coffer init --password <password>"
    );
    this.name = "VaultNotFoundError";
  }
}

export class VaultLockedError extends CofferError {
  constructor() {
    super("Vault is locked", "VAULT_LOCKED", undefined, "Open the vault again before using it");
    this.name = "VaultLockedError";
  }
}

export class InvalidPasswordError extends CofferError {
  constructor(message = "Master password must not be empty") {
    super(message, "INVALID_PASSWORD", undefined, "Pass --password <password> or set COFFER_PASSWORD");
    this.name = "InvalidPasswordError";
  }
}

export class ConfigError extends CofferError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIG_ERROR", details, "Fix or delete the config file (see: coffer print-paths)");
    this.name = "ConfigError";
  }
}

/**
 * Format error for CLI output
 */
export function formatError(error: unknown): {
  message: string;
  code?: string;
  details?: unknown;
  suggestion?: string;
} {
  if (error instanceof CofferError) {
    return {
      message: redactSensitive(error.message),
      code: error.code,
      details: error.details,
      suggestion: error.suggestion,
    };
  }

  if (error instanceof Error) {
    return { message: redactSensitive(error.message) };
  }

  return { message: "Unknown error occurred" };
}

import { describe, it, expect } from "vitest";
import {
  AuthError,
  CofferError,
  CorruptFormatError,
  IntegrityError,
  formatError,
} from "../../src/lib/utils/errors.js";

describe("errors", () => {
  it("gives every error a code and a suggestion", () => {
    const error = new IntegrityError(2);

    expect(error).toBeInstanceOf(CofferError);
    expect(error.code).toBe("INTEGRITY_ERROR");
    expect(error.containerId).toBe(2);
    expect(error.details).toEqual({ containerId: 2 });
    expect(error.suggestion).toBe(
      "Restore the vault from a backup (coffer download) or drop the container with coffer recover"
    );
  });

  it("says nothing about which record failed on an auth error", () => {
    expect(new AuthError().message).toBe(
      "Cannot unlock vault: the password is incorrect or the vault file has been tampered with."
    );
  });

  it("falls back to the default suggestion", () => {
    expect(new CofferError("odd", "ODD").suggestion).toBe(
      "Run: coffer verify-integrity --password <password> to inspect the vault"
    );
  });

  describe("formatError", () => {
    it("formats a CofferError with its code", () => {
      expect(formatError(new CorruptFormatError("bad nextId", ["nextId: too small"]))).toEqual({
        message: "Corrupt vault: bad nextId",
        code: "CORRUPT_FORMAT",
        details: ["nextId: too small"],
        suggestion: "Restore the vault from a backup with: coffer download --password <password>",
      });
    });

    it("redacts secrets in plain errors", () => {
      expect(formatError(new Error('request failed {"password":"hunter2"}'))).toEqual({
        message: 'request failed {"password":"[REDACTED]"}',
      });
    });

    it("handles values that are not errors", () => {
      expect(formatError("nope")).toEqual({ message: "Unknown error occurred" });
    });
  });
});

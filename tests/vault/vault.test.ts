import fs from "fs/promises";
import path from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Vault } from "../../src/lib/vault/vault.js";
import { KeyMaterial } from "../../src/lib/vault/key-material.js";
import type { VaultOptions } from "../../src/lib/vault/types.js";
import {
  AuthError,
  CorruptFormatError,
  InvalidPasswordError,
  NotFoundError,
  VaultExistsError,
  VaultLockedError,
  VaultNotFoundError,
} from "../../src/lib/utils/errors.js";
import { isErr, isOk, unwrap } from "../../src/lib/utils/result.js";
import { FAST_KDF, flipBit, makeTempDir, readVaultFile, removeDir, writeVaultFile } from "../helpers.js";

describe("Vault", () => {
  let dir: string;
  let options: VaultOptions;

  beforeEach(async () => {
    dir = await makeTempDir();
    options = { path: path.join(dir, "vault.json"), kdf: FAST_KDF };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  async function createVault(password = "test-secret"): Promise<Vault> {
    return unwrap(await Vault.create(password, options));
  }

  async function openVault(password = "test-secret"): Promise<Vault> {
    return unwrap(await Vault.open(password, options));
  }

  describe("create", () => {
    it("writes an empty vault that opens again", async () => {
      const vault = await createVault();
      vault.lock();

      const reopened = await openVault();
      const file = await readVaultFile(options.path);

      expect(reopened.listContainers()).toEqual([]);
      expect(file.nextId).toBe(1);
      expect(file.containers).toEqual([]);
      expect(file.key.kdf).toEqual(FAST_KDF);
    });

    it("refuses to overwrite an existing vault", async () => {
      await createVault();
      const before = await fs.readFile(options.path, "utf8");

      const result = await Vault.create("other-secret", options);

      expect(isErr(result) && result.error).toBeInstanceOf(VaultExistsError);
      expect(await fs.readFile(options.path, "utf8")).toBe(before);
    });

    it("rejects an empty password without writing anything", async () => {
      const result = await Vault.create("", options);

      expect(isErr(result) && result.error).toBeInstanceOf(InvalidPasswordError);
      await expect(fs.access(options.path)).rejects.toThrow();
    });
  });

  describe("open", () => {
    it("returns VaultNotFoundError when there is no file", async () => {
      const result = await Vault.open("test-secret", options);

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error).toBeInstanceOf(VaultNotFoundError);
        expect(result.error.message).toBe(`No vault found at ${options.path}`);
      }
    });

    it("rejects a wrong password", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");

      const result = await Vault.open("wrong-secret", options);

      expect(isErr(result) && result.error).toBeInstanceOf(AuthError);
    });

    it("rejects a wrong password on an empty vault", async () => {
      await createVault();

      const result = await Vault.open("wrong-secret", options);

      expect(isErr(result) && result.error).toBeInstanceOf(AuthError);
    });

    it("rejects a vault with one flipped ciphertext bit", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");
      await vault.addContainer("Mail", "hunter2");

      const file = await readVaultFile(options.path);
      file.containers[1].cipher = flipBit(file.containers[1].cipher);
      await writeVaultFile(options.path, file);

      const result = await Vault.open("test-secret", options);

      expect(isErr(result) && result.error).toBeInstanceOf(AuthError);
    });

    it("rejects a replaced record salt before deriving a key for it", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");
      vault.lock();
      const file = await readVaultFile(options.path);
      file.containers[0].salt = Buffer.alloc(32, 9).toString("base64");
      await writeVaultFile(options.path, file);
      const derive = vi.spyOn(KeyMaterial, "derive");

      const result = await Vault.open("test-secret", options);

      expect(isErr(result) && result.error).toBeInstanceOf(AuthError);
      expect(derive).toHaveBeenCalledTimes(1);
    });

    it("reports a malformed file as corrupt", async () => {
      await fs.writeFile(options.path, '{"version":1,');

      const result = await Vault.open("test-secret", options);

      expect(isErr(result) && result.error).toBeInstanceOf(CorruptFormatError);
    });
  });

  describe("containers", () => {
    it("round-trips containers through the file", async () => {
      const vault = await createVault();
      const bank = await vault.addContainer("Bank", "pin 0000");
      await vault.addContainer("Mail", "hunter2");
      vault.lock();

      const reopened = await openVault();

      expect(bank.id).toBe(1);
      expect(reopened.listContainers()).toEqual([
        { id: 1, name: "Bank" },
        { id: 2, name: "Mail" },
      ]);
      expect(unwrap(reopened.getContainer(2)).getData()).toBe("hunter2");
    });

    it("names an unnamed container after its id", async () => {
      const vault = await createVault();

      const container = await vault.addContainer("", "text");

      expect(container.getName()).toBe("Container 1");
    });

    it("never reuses an id", async () => {
      const vault = await createVault();
      await vault.addContainer("a", "1");
      await vault.addContainer("b", "2");
      await vault.addContainer("c", "3");
      unwrap(await vault.removeContainer(2));
      const d = await vault.addContainer("d", "4");

      expect(d.id).toBe(4);
      expect(vault.listContainers().map((entry) => entry.id)).toEqual([1, 3, 4]);

      unwrap(await vault.removeContainer(4));
      vault.lock();
      const reopened = await openVault();
      const e = await reopened.addContainer("e", "5");

      expect(e.id).toBe(5);
    });

    it("updates only the given fields", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");
      const before = await readVaultFile(options.path);

      unwrap(await vault.updateContainer(1, { name: "Savings" }));
      const after = await readVaultFile(options.path);
      vault.lock();
      const container = unwrap((await openVault()).getContainer(1));

      expect(container.toInfo()).toEqual({ id: 1, name: "Savings", data: "pin 0000" });
      expect(after.containers[0].iv).not.toBe(before.containers[0].iv);
    });

    it("updates the text in place", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");

      const updated = unwrap(await vault.updateContainer(1, { data: "pin 1234" }));

      expect(updated.toInfo()).toEqual({ id: 1, name: "Bank", data: "pin 1234" });
      expect(unwrap(vault.getContainer(1)).toInfo()).toEqual({ id: 1, name: "Bank", data: "pin 1234" });
    });

    it("hands out copies that do not reach the vault", async () => {
      const vault = await createVault();
      const added = await vault.addContainer("Bank", "pin 0000");
      added.setName("Changed");
      unwrap(vault.getContainer(1)).setData("MUTATED");
      unwrap(await vault.updateContainer(1, { name: "Savings" })).setData("MUTATED");

      await vault.addContainer("Mail", "hunter2");
      unwrap(await vault.regenerateKeys());
      vault.lock();
      const reopened = await openVault();

      expect(unwrap(reopened.getContainer(1)).toInfo()).toEqual({ id: 1, name: "Savings", data: "pin 0000" });
    });

    it("returns NotFoundError for unknown ids", async () => {
      const vault = await createVault();

      const get = vault.getContainer(7);
      const update = await vault.updateContainer(7, { name: "x" });
      const remove = await vault.removeContainer(7);

      expect(isErr(get) && get.error).toBeInstanceOf(NotFoundError);
      expect(isErr(update) && update.error.message).toBe("Container with ID 7 not found");
      expect(isErr(remove) && remove.error).toBeInstanceOf(NotFoundError);
    });

    it("removes a container from the file", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");
      await vault.addContainer("Mail", "hunter2");

      unwrap(await vault.removeContainer(1));
      const file = await readVaultFile(options.path);

      expect(file.containers.map((record) => record.id)).toEqual([2]);
      expect(file.nextId).toBe(3);
    });
  });

  describe("fetchContainer", () => {
    it("decrypts a single container without opening the vault", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");
      vault.lock();

      const container = unwrap(await Vault.fetchContainer("test-secret", 1, options));

      expect(container.toInfo()).toEqual({ id: 1, name: "Bank", data: "pin 0000" });
    });

    it("does not expose the reserved containers", async () => {
      const vault = await createVault();
      unwrap(await vault.setCloudCredentials('{"endpoint":"https://backup.example.test"}'));

      const result = await Vault.fetchContainer("test-secret", -1, options);

      expect(isErr(result) && result.error).toBeInstanceOf(NotFoundError);
    });

    it("reports unknown ids and wrong passwords", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");

      const missing = await Vault.fetchContainer("test-secret", 9, options);
      const wrong = await Vault.fetchContainer("wrong-secret", 1, options);

      expect(isErr(missing) && missing.error).toBeInstanceOf(NotFoundError);
      expect(isErr(wrong) && wrong.error).toBeInstanceOf(AuthError);
    });
  });

  describe("verifyIntegrity", () => {
    it("reports a clean vault", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");

      const report = unwrap(await vault.verifyIntegrity());

      expect(report).toEqual({ ok: true, vaultMac: true, containers: [{ id: 1, status: "ok" }] });
    });

    it("names only the container whose MAC was altered", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");
      await vault.addContainer("Mail", "hunter2");
      await vault.addContainer("Notes", "buy milk");

      const file = await readVaultFile(options.path);
      file.containers[1].mac = flipBit(file.containers[1].mac);
      await writeVaultFile(options.path, file);

      const report = unwrap(await vault.verifyIntegrity());

      expect(report).toEqual({
        ok: false,
        vaultMac: false,
        containers: [
          { id: 1, status: "ok" },
          { id: 2, status: "integrity" },
          { id: 3, status: "ok" },
        ],
      });
    });

    it("catches a flipped ciphertext bit that leaves the vault MAC intact", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");

      const file = await readVaultFile(options.path);
      file.containers[0].cipher = flipBit(file.containers[0].cipher);
      await writeVaultFile(options.path, file);

      const report = unwrap(await vault.verifyIntegrity());

      expect(report.vaultMac).toBe(true);
      expect(report.ok).toBe(false);
      expect(report.containers).toEqual([{ id: 1, status: "integrity" }]);
    });

    it("returns CorruptFormatError for an unreadable file", async () => {
      const vault = await createVault();
      await fs.writeFile(options.path, "");

      const result = await vault.verifyIntegrity();

      expect(isErr(result) && result.error).toBeInstanceOf(CorruptFormatError);
    });
  });

  describe("key management", () => {
    it("changes the master password", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");

      unwrap(await vault.changeMasterPassword("new-secret"));
      await vault.addContainer("Mail", "hunter2");
      vault.lock();

      const old = await Vault.open("test-secret", options);
      const reopened = await openVault("new-secret");

      expect(isErr(old) && old.error).toBeInstanceOf(AuthError);
      expect(reopened.listContainers()).toEqual([
        { id: 1, name: "Bank" },
        { id: 2, name: "Mail" },
      ]);
    });

    it("rejects an empty new password", async () => {
      const vault = await createVault();

      const result = await vault.changeMasterPassword("");

      expect(isErr(result) && result.error).toBeInstanceOf(InvalidPasswordError);
    });

    it("regenerates salt, iv and every ciphertext", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");
      const before = await readVaultFile(options.path);

      unwrap(await vault.regenerateKeys());
      const after = await readVaultFile(options.path);
      vault.lock();
      const reopened = await openVault();

      expect(after.key.salt).not.toBe(before.key.salt);
      expect(after.key.iv).not.toBe(before.key.iv);
      expect(after.containers[0].cipher).not.toBe(before.containers[0].cipher);
      expect(after.containers[0].salt).toBe(after.key.salt);
      expect(unwrap(reopened.getContainer(1)).getData()).toBe("pin 0000");
    });

    it("leaves file and session untouched when the write fails", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");
      const before = await fs.readFile(options.path, "utf8");

      vi.spyOn(fs, "rename").mockRejectedValueOnce(new Error("disk full"));
      await expect(vault.changeMasterPassword("new-secret")).rejects.toThrow("disk full");

      expect(await fs.readFile(options.path, "utf8")).toBe(before);
      await expect(fs.access(`${options.path}.tmp`)).rejects.toThrow();

      const next = await vault.addContainer("Mail", "hunter2");
      vault.lock();
      const reopened = await openVault("test-secret");

      expect(next.id).toBe(2);
      expect(reopened.listContainers().map((entry) => entry.id)).toEqual([1, 2]);
    });

    it("does not consume an id when adding fails", async () => {
      const vault = await createVault();

      vi.spyOn(fs, "rename").mockRejectedValueOnce(new Error("disk full"));
      await expect(vault.addContainer("Bank", "pin 0000")).rejects.toThrow("disk full");
      const container = await vault.addContainer("Bank", "pin 0000");

      expect(container.id).toBe(1);
      expect(vault.listContainers()).toEqual([{ id: 1, name: "Bank" }]);
    });
  });

  describe("recover", () => {
    it("keeps the containers that verify and reports the rest", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");
      await vault.addContainer("Mail", "hunter2");
      await vault.addContainer("Notes", "buy milk");
      vault.lock();

      const file = await readVaultFile(options.path);
      file.containers[1].cipher = flipBit(file.containers[1].cipher);
      await writeVaultFile(options.path, file);

      const { vault: recovered, report } = unwrap(await Vault.recover("test-secret", options));

      expect(report).toEqual({
        ok: false,
        vaultMac: true,
        containers: [
          { id: 1, status: "ok" },
          { id: 2, status: "integrity" },
          { id: 3, status: "ok" },
        ],
      });
      expect(recovered.isDegraded).toBe(true);
      expect(recovered.listContainers().map((entry) => entry.id)).toEqual([1, 3]);

      await recovered.save();
      expect(recovered.isDegraded).toBe(false);
      const next = await recovered.addContainer("Keys", "garage");
      recovered.lock();

      const reopened = await openVault();
      expect(next.id).toBe(4);
      expect(reopened.listContainers().map((entry) => entry.id)).toEqual([1, 3, 4]);
    });

    it("is not degraded for a healthy vault", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");

      const { vault: recovered, report } = unwrap(await Vault.recover("test-secret", options));

      expect(report.ok).toBe(true);
      expect(recovered.isDegraded).toBe(false);
    });

    it("fails with a wrong password", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");

      const result = await Vault.recover("wrong-secret", options);

      expect(isErr(result) && result.error).toBeInstanceOf(AuthError);
    });
  });

  describe("lock", () => {
    it("makes every further call fail", async () => {
      const vault = await createVault();
      await vault.addContainer("Bank", "pin 0000");

      vault.lock();

      expect(vault.isLocked).toBe(true);
      expect(() => vault.listContainers()).toThrow(VaultLockedError);
      expect(() => vault.getContainer(1)).toThrow(VaultLockedError);
      await expect(vault.addContainer("Mail", "hunter2")).rejects.toThrow(VaultLockedError);
    });

    it("can be called twice", async () => {
      const vault = await createVault();

      vault.lock();
      vault.lock();

      expect(vault.isLocked).toBe(true);
      expect(isOk(await Vault.open("test-secret", options))).toBe(true);
    });
  });
});

#!/usr/bin/env node
/**
 * coffer CLI
 * Local encrypted secrets vault. Results are printed as JSON on stdout.
 *
 * Usage: coffer <subcommand> [options]
 * The master password comes from --password or the COFFER_PASSWORD variable.
 */

import fs from "fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { Vault, type VaultOptions } from "../src/lib/vault/index.js";
import { createHttpBackupGateway } from "../src/lib/services/backup-gateway.js";
import { APP_VERSION, getConfigPath } from "../src/lib/config/paths.js";
import {
  readAppConfig,
  resolveVaultPath,
  updateAppConfig,
  type AppConfig,
} from "../src/lib/utils/storage.js";
import { InvalidPasswordError } from "../src/lib/utils/errors.js";
import { isErr, unwrap } from "../src/lib/utils/result.js";
import { generatePassword } from "../src/lib/utils/password-generator.js";
import { handleError, logDiagnostic, printJson } from "../src/lib/utils/cli.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseId(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError("Container id must be an integer.");
  }
  return Number.parseInt(value, 10);
}

function parseLength(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Length must be a positive integer.");
  }
  return Number.parseInt(value, 10);
}

function parseSwitch(value: string): boolean {
  if (value !== "on" && value !== "off") {
    throw new InvalidArgumentError("Expected on or off.");
  }
  return value === "on";
}

function parseTimeout(value: string): number {
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) === 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of milliseconds.");
  }
  return Number.parseInt(value, 10);
}

function resolvePassword(password?: string): string {
  const resolved = password ?? process.env.COFFER_PASSWORD;
  if (!resolved) {
    throw new InvalidPasswordError("Master password required: pass --password or set COFFER_PASSWORD");
  }
  return resolved;
}

function vaultOptions(config: AppConfig): VaultOptions {
  return {
    path: resolveVaultPath(config),
    gatewayFactory: (credentials, token) =>
      createHttpBackupGateway(credentials, token, { timeoutMs: config.backupTimeoutMs }),
  };
}

/**
 * Open the vault, run the action, always lock afterwards
 */
async function withVault<T>(
  password: string | undefined,
  action: (vault: Vault, config: AppConfig) => Promise<T>
): Promise<T> {
  const config = await readAppConfig();
  const vault = unwrap(await Vault.open(resolvePassword(password), vaultOptions(config)));
  try {
    return await action(vault, config);
  } finally {
    vault.lock();
  }
}

/**
 * Upload after a successful change when autoUpload is on. A failed upload is
 * reported but does not fail the command.
 */
async function autoUpload(vault: Vault, config: AppConfig): Promise<Record<string, unknown>> {
  if (!config.autoUpload) {
    return {};
  }
  const uploaded = await vault.uploadBackup();
  if (isErr(uploaded)) {
    logDiagnostic(`Auto-upload failed: ${uploaded.error.message}`);
    return { backup: { uploaded: false, error: uploaded.error.message } };
  }
  return { backup: { uploaded: true, remoteName: uploaded.value.remoteName } };
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("coffer")
  .description("Local encrypted secrets vault. Store, view, and manage named secrets.")
  .version(APP_VERSION, "-v, --version");

// ---------------------------------------------------------------------------
// init
// ---------------------------------------------------------------------------

program
  .command("init")
  .description("Create a new, empty vault (never overwrites an existing one)")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { password?: string }) => {
    try {
      const config = await readAppConfig();
      const vault = unwrap(await Vault.create(resolvePassword(opts.password), vaultOptions(config)));
      const vaultPath = vault.filePath;
      vault.lock();
      printJson({ success: true, message: "Vault created", path: vaultPath });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// create
// ---------------------------------------------------------------------------

program
  .command("create")
  .description("Create a new container")
  .option("--name <name>", "Name for the container (default: Container <id>)", "")
  .requiredOption("--text <text>", "Text for the container (sensitive)")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { name: string; text: string; password?: string }) => {
    try {
      const output = await withVault(opts.password, async (vault, config) => {
        const container = await vault.addContainer(opts.name, opts.text);
        return {
          success: true,
          id: container.id,
          name: container.getName(),
          ...(await autoUpload(vault, config)),
        };
      });
      printJson(output);
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// view
// ---------------------------------------------------------------------------

program
  .command("view")
  .description("View a container (decrypts only that container; full vault integrity not verified)")
  .requiredOption("--id <id>", "Container id", parseId)
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { id: number; password?: string }) => {
    try {
      const config = await readAppConfig();
      const container = unwrap(
        await Vault.fetchContainer(resolvePassword(opts.password), opts.id, vaultOptions(config))
      );
      printJson(container.toInfo());
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

program
  .command("list")
  .description("List container ids and names (no secret text returned)")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { password?: string }) => {
    try {
      const containers = await withVault(opts.password, async (vault) => vault.listContainers());
      printJson({ count: containers.length, containers });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// edit
// ---------------------------------------------------------------------------

program
  .command("edit")
  .description("Edit a container's name and/or text")
  .requiredOption("--id <id>", "Container id", parseId)
  .option("--name <name>", "New name")
  .option("--text <text>", "New text (sensitive)")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { id: number; name?: string; text?: string; password?: string }) => {
    try {
      if (opts.text === undefined && opts.name === undefined) {
        throw new InvalidArgumentError("edit requires --name or --text.");
      }
      const output = await withVault(opts.password, async (vault, config) => {
        const container = unwrap(await vault.updateContainer(opts.id, { name: opts.name, data: opts.text }));
        return {
          success: true,
          id: container.id,
          name: container.getName(),
          ...(await autoUpload(vault, config)),
        };
      });
      printJson(output);
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// delete
// ---------------------------------------------------------------------------

program
  .command("delete")
  .description("Permanently delete a container")
  .requiredOption("--id <id>", "Container id", parseId)
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { id: number; password?: string }) => {
    try {
      const output = await withVault(opts.password, async (vault, config) => {
        unwrap(await vault.removeContainer(opts.id));
        return { success: true, deleted: opts.id, ...(await autoUpload(vault, config)) };
      });
      printJson(output);
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// verify-integrity
// ---------------------------------------------------------------------------

program
  .command("verify-integrity")
  .description("Check the vault MAC and every container against the current key")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { password?: string }) => {
    try {
      const report = await withVault(opts.password, async (vault) => unwrap(await vault.verifyIntegrity()));
      printJson(report);
      if (!report.ok) {
        process.exitCode = 1;
      }
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// recover
// ---------------------------------------------------------------------------

program
  .command("recover")
  .description("Unlock a damaged vault, report what verifies, optionally keep only that")
  .option("--save", "Rewrite the vault with only the containers that verified", false)
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { save: boolean; password?: string }) => {
    try {
      const config = await readAppConfig();
      const { vault, report } = unwrap(
        await Vault.recover(resolvePassword(opts.password), vaultOptions(config))
      );
      try {
        if (opts.save) {
          await vault.save();
        }
        printJson({ saved: opts.save, report, containers: vault.listContainers() });
      } finally {
        vault.lock();
      }
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// upload / download / delete-backup
// ---------------------------------------------------------------------------

program
  .command("upload")
  .description("Upload an encrypted backup of the vault (see set-credentials)")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { password?: string }) => {
    try {
      const receipt = await withVault(opts.password, async (vault) => unwrap(await vault.uploadBackup()));
      printJson({ success: true, message: "Vault uploaded", remoteName: receipt.remoteName });
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("download")
  .description("Replace the vault with the backup copy, even when it no longer opens (current file kept as <file>.old)")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { password?: string }) => {
    try {
      const config = await readAppConfig();
      const restored = unwrap(await Vault.restoreBackup(resolvePassword(opts.password), vaultOptions(config)));
      restored.vault.lock();
      printJson({ success: true, message: "Vault downloaded", remoteName: restored.remoteName });
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("delete-backup")
  .description("Delete the remote backup copy")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { password?: string }) => {
    try {
      const receipt = await withVault(opts.password, async (vault) => unwrap(await vault.deleteBackup()));
      printJson({ success: true, deleted: receipt.remoteName });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// change-password / regenerate-keys
// ---------------------------------------------------------------------------

program
  .command("change-password")
  .description("Re-encrypt the whole vault under a new master password")
  .requiredOption("--new-password <password>", "New master password (sensitive)")
  .option("--password <password>", "Current master password (sensitive)")
  .action(async (opts: { newPassword: string; password?: string }) => {
    try {
      const output = await withVault(opts.password, async (vault, config) => {
        unwrap(await vault.changeMasterPassword(opts.newPassword));
        return { success: true, message: "Master password changed", ...(await autoUpload(vault, config)) };
      });
      printJson(output);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("regenerate-keys")
  .description("Issue a fresh salt and key and re-encrypt every container")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { password?: string }) => {
    try {
      const output = await withVault(opts.password, async (vault, config) => {
        unwrap(await vault.regenerateKeys());
        return { success: true, message: "Keys regenerated", ...(await autoUpload(vault, config)) };
      });
      printJson(output);
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// set-credentials / sign-out
// ---------------------------------------------------------------------------

program
  .command("set-credentials")
  .description("Store backup store credentials (and optionally a token) inside the vault")
  .requiredOption("--file <path>", "JSON file with {endpoint, bucket?}")
  .option("--token-file <path>", "JSON file with {accessToken, expiresAt?}")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { file: string; tokenFile?: string; password?: string }) => {
    try {
      const credentials = await fs.readFile(opts.file, "utf8");
      const token = opts.tokenFile ? await fs.readFile(opts.tokenFile, "utf8") : undefined;
      await withVault(opts.password, async (vault) => {
        unwrap(await vault.setCloudCredentials(credentials, token));
      });
      printJson({ success: true, message: "Credentials set" });
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("sign-out")
  .description("Remove the stored backup token (the credentials stay)")
  .option("--password <password>", "Master password (sensitive)")
  .action(async (opts: { password?: string }) => {
    try {
      await withVault(opts.password, async (vault) => {
        unwrap(await vault.signOut());
      });
      printJson({ success: true, message: "Signed out" });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// config / print-paths
// ---------------------------------------------------------------------------

program
  .command("config")
  .description("Show the app config, or change the given settings")
  .option("--vault-path <path>", "Vault file location")
  .option("--auto-upload <on|off>", "Upload a backup after every change", parseSwitch)
  .option("--backup-timeout <ms>", "Backup request timeout in milliseconds", parseTimeout)
  .action(async (opts: { vaultPath?: string; autoUpload?: boolean; backupTimeout?: number }) => {
    try {
      const config = await updateAppConfig({
        vaultPath: opts.vaultPath,
        autoUpload: opts.autoUpload,
        backupTimeoutMs: opts.backupTimeout,
      });
      printJson({ config, path: getConfigPath() });
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("print-paths")
  .description("Print the vault file and config file locations")
  .action(async () => {
    try {
      const config = await readAppConfig();
      printJson({ vault: resolveVaultPath(config), config: getConfigPath() });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// generate-password
// ---------------------------------------------------------------------------

program
  .command("generate-password")
  .description("Generate a random password (nothing is stored)")
  .option("--length <length>", "Password length", parseLength, 20)
  .option("--no-uppercase", "Leave out uppercase letters")
  .option("--no-digits", "Leave out digits")
  .option("--no-symbols", "Leave out symbols")
  .action((opts: { length: number; uppercase: boolean; digits: boolean; symbols: boolean }) => {
    try {
      printJson({ password: generatePassword(opts) });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);

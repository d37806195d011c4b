/**
 * Vault: the unlocked, in-memory collection of containers plus the active key.
 *
 * A Vault is an owned value. Vault.create / Vault.open / Vault.recover hand one
 * to the caller, who keeps it for the session and calls lock() at the end.
 * Every mutating call writes the whole vault atomically (temp file + rename)
 * and only then updates memory, so a failed write leaves both the file and
 * the session as they were.
 *
 * Access guarantees differ by operation:
 *   - open() verifies the vault MAC and every container before unlocking.
 *   - getContainer() returns a copy of the in-memory container and
 *     re-verifies nothing. Changes go through updateContainer().
 *   - verifyIntegrity() re-reads the file and checks everything against the
 *     current key. Call it when a stronger guarantee is needed.
 */

import fs from "fs/promises";
import type { z } from "zod";
import { getBackupName } from "../config/paths.js";
import {
  BackupCredentialsSchema,
  BackupTokenSchema,
  createHttpBackupGateway,
  type BackupCredentials,
  type BackupGateway,
  type BackupToken,
} from "../services/backup-gateway.js";
import {
  AuthError,
  BackupTransportError,
  CorruptFormatError,
  IntegrityError,
  InvalidPasswordError,
  NotFoundError,
  VaultExistsError,
  VaultLockedError,
  VaultNotFoundError,
} from "../utils/errors.js";
import { err, isErr, ok, tryCatch, type Result } from "../utils/result.js";
import { atomicWriteFile, fileExists, readFileIfExists } from "../utils/storage.js";
import { buildVaultFile, decodeVaultFile, encodeVaultFile, verifyVaultMac } from "./codec.js";
import { Container } from "./container.js";
import { KeyMaterial } from "./key-material.js";
import {
  CREDENTIALS_CONTAINER_ID,
  TOKEN_CONTAINER_ID,
  type BackupReceipt,
  type ContainerRecord,
  type ContainerStatus,
  type ContainerSummary,
  type IntegrityReport,
  type VaultFile,
  type VaultOptions,
} from "./types.js";

export type OpenError = AuthError | CorruptFormatError | VaultNotFoundError | InvalidPasswordError;

export type DownloadError = BackupTransportError | OpenError;

export interface RecoveredVault {
  vault: Vault;
  report: IntegrityReport;
}

export interface RestoredVault extends BackupReceipt {
  vault: Vault;
}

export interface ContainerChanges {
  name?: string;
  data?: string;
}

export interface BackupSettings {
  credentials: BackupCredentials | null;
  token: BackupToken | null;
}

interface Session {
  password: string;
  key: KeyMaterial;
  /** User containers, in insertion order */
  containers: Map<number, Container>;
  /** Reserved containers (backup credentials and token) */
  reserved: Map<number, Container>;
  /** Encrypted form of every container, reused until the container changes */
  records: Map<number, ContainerRecord>;
  nextId: number;
}

// ============================================================================
// File loading
// ============================================================================

async function loadVaultFile(
  filePath: string
): Promise<Result<VaultFile, CorruptFormatError | VaultNotFoundError>> {
  const content = await readFileIfExists(filePath);
  if (content === null) {
    return err(new VaultNotFoundError(filePath));
  }
  return decodeVaultFile(content);
}

/**
 * Records normally share the vault salt, but each carries its own. Derive a
 * separate key for any record whose salt differs, once per distinct salt.
 */
class RecordKeys {
  private readonly extra = new Map<string, KeyMaterial>();

  constructor(
    private readonly primary: KeyMaterial,
    private readonly password: string,
    private readonly file: VaultFile
  ) {}

  async forRecord(
    record: ContainerRecord
  ): Promise<Result<KeyMaterial, CorruptFormatError | InvalidPasswordError>> {
    if (record.salt === this.primary.salt.toString("base64")) {
      return ok(this.primary);
    }
    const cached = this.extra.get(record.salt);
    if (cached) {
      return ok(cached);
    }
    const derived = await KeyMaterial.derive(
      this.password,
      Buffer.from(record.salt, "base64"),
      Buffer.from(this.file.key.iv, "base64"),
      this.file.key.kdf
    );
    if (isErr(derived)) {
      return derived;
    }
    this.extra.set(record.salt, derived.value);
    return ok(derived.value);
  }

  destroy(): void {
    for (const key of this.extra.values()) {
      key.destroy();
    }
    this.extra.clear();
  }
}

type RecordOutcome =
  | { id: number; status: "ok"; container: Container }
  | { id: number; status: Exclude<ContainerStatus, "ok">; error: IntegrityError | CorruptFormatError };

async function decryptRecords(
  file: VaultFile,
  key: KeyMaterial,
  password: string
): Promise<Result<RecordOutcome[], CorruptFormatError | InvalidPasswordError>> {
  const keys = new RecordKeys(key, password, file);
  try {
    const outcomes: RecordOutcome[] = [];
    for (const record of file.containers) {
      const recordKey = await keys.forRecord(record);
      if (isErr(recordKey)) {
        return recordKey;
      }
      const decrypted = Container.decrypt(recordKey.value, record);
      if (isErr(decrypted)) {
        const status = decrypted.error instanceof IntegrityError ? "integrity" : "corrupt";
        outcomes.push({ id: record.id, status, error: decrypted.error });
      } else {
        outcomes.push({ id: record.id, status: "ok", container: decrypted.value });
      }
    }
    return ok(outcomes);
  } finally {
    keys.destroy();
  }
}

function isReservedId(id: number): boolean {
  return id === CREDENTIALS_CONTAINER_ID || id === TOKEN_CONTAINER_ID;
}

function buildSession(
  password: string,
  key: KeyMaterial,
  file: VaultFile,
  containers: Container[]
): Session {
  const session: Session = {
    password,
    key,
    containers: new Map(),
    reserved: new Map(),
    records: new Map(),
    nextId: file.nextId,
  };
  const recordsById = new Map(file.containers.map((record) => [record.id, record]));
  for (const container of containers) {
    const record = recordsById.get(container.id);
    if (!record) {
      continue;
    }
    session.records.set(container.id, record);
    if (isReservedId(container.id)) {
      session.reserved.set(container.id, container);
    } else if (container.id > 0) {
      session.containers.set(container.id, container);
    }
  }
  return session;
}

/** A copy the caller can change without touching the session */
function detached(container: Container): Container {
  return new Container(container.id, container.getName(), container.getData());
}

/**
 * Decrypt one record on its own, with a key derived from the record's salt.
 * A MAC failure is an AuthError, because without the vault MAC a wrong
 * password looks the same.
 */
async function decryptStandalone(
  password: string,
  file: VaultFile,
  record: ContainerRecord
): Promise<Result<Container, AuthError | CorruptFormatError | InvalidPasswordError>> {
  const key = await KeyMaterial.derive(
    password,
    Buffer.from(record.salt, "base64"),
    Buffer.from(file.key.iv, "base64"),
    file.key.kdf
  );
  if (isErr(key)) {
    return key;
  }
  try {
    const decrypted = Container.decrypt(key.value, record);
    if (isErr(decrypted)) {
      return err(decrypted.error instanceof IntegrityError ? new AuthError() : decrypted.error);
    }
    return decrypted;
  } finally {
    key.value.destroy();
  }
}

async function readReservedText(
  password: string,
  file: VaultFile,
  id: number
): Promise<Result<string | null, AuthError | CorruptFormatError | InvalidPasswordError>> {
  const record = file.containers.find((candidate) => candidate.id === id);
  if (!record) {
    return ok(null);
  }
  const decrypted = await decryptStandalone(password, file, record);
  if (isErr(decrypted)) {
    return decrypted;
  }
  return ok(decrypted.value.getData());
}

function parseBackupSettings(
  credentialsText: string | null | undefined,
  tokenText: string | null | undefined
): Result<BackupSettings, CorruptFormatError> {
  let credentials: BackupCredentials | null = null;
  if (credentialsText) {
    const parsed = parseJsonDocument(credentialsText, BackupCredentialsSchema, "backup credentials");
    if (isErr(parsed)) {
      return parsed;
    }
    credentials = parsed.value;
  }
  let token: BackupToken | null = null;
  if (tokenText) {
    const parsed = parseJsonDocument(tokenText, BackupTokenSchema, "backup token");
    if (isErr(parsed)) {
      return parsed;
    }
    token = parsed.value;
  }
  return ok({ credentials, token });
}

function openGateway(
  options: VaultOptions,
  settings: Result<BackupSettings, CorruptFormatError>
): Result<BackupGateway, BackupTransportError> {
  if (isErr(settings)) {
    return err(new BackupTransportError(settings.error.message));
  }
  const { credentials, token } = settings.value;
  if (!credentials) {
    return err(new BackupTransportError("No backup credentials configured"));
  }
  const factory = options.gatewayFactory ?? createHttpBackupGateway;
  return ok(factory(credentials, token));
}

function remoteNameFor(options: VaultOptions): string {
  return options.backupName ?? getBackupName(options.path);
}

// ============================================================================
// Vault
// ============================================================================

export class Vault {
  private session: Session | null;
  private degraded: boolean;

  private constructor(
    private readonly options: VaultOptions,
    session: Session,
    degraded = false
  ) {
    this.session = session;
    this.degraded = degraded;
  }

  // --------------------------------------------------------------------------
  // Session lifecycle
  // --------------------------------------------------------------------------

  /**
   * Create a new, empty vault and write it to options.path.
   * Refuses to overwrite an existing file.
   */
  static async create(
    masterPassword: string,
    options: VaultOptions
  ): Promise<Result<Vault, VaultExistsError | InvalidPasswordError | CorruptFormatError>> {
    if (!masterPassword) {
      return err(new InvalidPasswordError());
    }
    if (await fileExists(options.path)) {
      return err(new VaultExistsError(options.path));
    }

    const key = await KeyMaterial.generate(masterPassword, options.kdf);
    if (isErr(key)) {
      return key;
    }

    const vault = new Vault(options, {
      password: masterPassword,
      key: key.value,
      containers: new Map(),
      reserved: new Map(),
      records: new Map(),
      nextId: 1,
    });
    try {
      await vault.write(key.value, 1, new Map());
    } catch (error) {
      key.value.destroy();
      throw error;
    }
    return ok(vault);
  }

  /**
   * Unlock an existing vault. Either the vault MAC and every container verify
   * under the derived key, or the call fails with a single AuthError; a wrong
   * password and a tampered record are indistinguishable here.
   */
  static async open(masterPassword: string, options: VaultOptions): Promise<Result<Vault, OpenError>> {
    if (!masterPassword) {
      return err(new InvalidPasswordError());
    }
    const file = await loadVaultFile(options.path);
    if (isErr(file)) {
      return file;
    }
    const key = await KeyMaterial.fromHeader(masterPassword, file.value.key);
    if (isErr(key)) {
      return key;
    }

    if (!verifyVaultMac(key.value, file.value)) {
      key.value.destroy();
      return err(new AuthError());
    }

    const outcomes = await decryptRecords(file.value, key.value, masterPassword);
    if (isErr(outcomes)) {
      key.value.destroy();
      return outcomes;
    }

    const containers: Container[] = [];
    for (const outcome of outcomes.value) {
      if (outcome.status === "ok") {
        containers.push(outcome.container);
        continue;
      }
      key.value.destroy();
      return err(outcome.error instanceof CorruptFormatError ? outcome.error : new AuthError());
    }

    return ok(new Vault(options, buildSession(masterPassword, key.value, file.value, containers)));
  }

  /**
   * Degraded unlock for recovery: keeps every container that verifies and
   * reports the rest. The returned vault is marked degraded; its next write
   * persists only the surviving containers.
   *
   * Fails with AuthError when nothing verifies, since that is what a wrong
   * password looks like.
   */
  static async recover(
    masterPassword: string,
    options: VaultOptions
  ): Promise<Result<RecoveredVault, OpenError>> {
    if (!masterPassword) {
      return err(new InvalidPasswordError());
    }
    const file = await loadVaultFile(options.path);
    if (isErr(file)) {
      return file;
    }
    const key = await KeyMaterial.fromHeader(masterPassword, file.value.key);
    if (isErr(key)) {
      return key;
    }

    const vaultMac = verifyVaultMac(key.value, file.value);
    const outcomes = await decryptRecords(file.value, key.value, masterPassword);
    if (isErr(outcomes)) {
      key.value.destroy();
      return outcomes;
    }

    const survivors: Container[] = [];
    for (const outcome of outcomes.value) {
      if (outcome.status === "ok") {
        survivors.push(outcome.container);
      }
    }
    if (!vaultMac && survivors.length === 0) {
      key.value.destroy();
      return err(new AuthError());
    }

    const report: IntegrityReport = {
      ok: vaultMac && survivors.length === outcomes.value.length,
      vaultMac,
      containers: outcomes.value.map(({ id, status }) => ({ id, status })),
    };
    const session = buildSession(masterPassword, key.value, file.value, survivors);
    return ok({ vault: new Vault(options, session, !report.ok), report });
  }

  /**
   * Decrypt a single container straight from the file, without unlocking or
   * verifying the rest of the vault. A MAC failure is reported as AuthError,
   * because without the vault MAC a wrong password looks the same.
   */
  static async fetchContainer(
    masterPassword: string,
    id: number,
    options: VaultOptions
  ): Promise<Result<Container, OpenError | NotFoundError>> {
    if (!masterPassword) {
      return err(new InvalidPasswordError());
    }
    const file = await loadVaultFile(options.path);
    if (isErr(file)) {
      return file;
    }
    const record = file.value.containers.find((candidate) => candidate.id === id);
    if (!record || isReservedId(id)) {
      return err(new NotFoundError(id));
    }
    return decryptStandalone(masterPassword, file.value, record);
  }

  /**
   * Replace the vault with its remote copy when the local file no longer
   * opens. Only the stored backup credentials and token have to verify; the
   * remote copy must still open under the same password before anything
   * moves. The replaced file is kept as "<file>.old".
   */
  static async restoreBackup(
    masterPassword: string,
    options: VaultOptions
  ): Promise<Result<RestoredVault, DownloadError>> {
    if (!masterPassword) {
      return err(new InvalidPasswordError());
    }
    const file = await loadVaultFile(options.path);
    if (isErr(file)) {
      return file;
    }
    const credentials = await readReservedText(masterPassword, file.value, CREDENTIALS_CONTAINER_ID);
    if (isErr(credentials)) {
      return credentials;
    }
    const token = await readReservedText(masterPassword, file.value, TOKEN_CONTAINER_ID);
    if (isErr(token)) {
      return token;
    }

    const gateway = openGateway(options, parseBackupSettings(credentials.value, token.value));
    if (isErr(gateway)) {
      return gateway;
    }
    const pulled = await Vault.pullBackup(masterPassword, options, gateway.value);
    if (isErr(pulled)) {
      return pulled;
    }
    return ok({ vault: new Vault(options, pulled.value.session), remoteName: pulled.value.remoteName });
  }

  /**
   * End the session: zero the key material and drop every plaintext.
   */
  lock(): void {
    if (!this.session) {
      return;
    }
    this.session.key.destroy();
    this.session.containers.clear();
    this.session.reserved.clear();
    this.session.records.clear();
    this.session.password = "";
    this.session = null;
  }

  get isLocked(): boolean {
    return this.session === null;
  }

  /** True for a vault from recover() that dropped containers and has not been saved since */
  get isDegraded(): boolean {
    return this.degraded;
  }

  get filePath(): string {
    return this.options.path;
  }

  // --------------------------------------------------------------------------
  // Containers
  // --------------------------------------------------------------------------

  listContainers(): ContainerSummary[] {
    const session = this.requireSession();
    return [...session.containers.values()].map((container) => ({
      id: container.id,
      name: container.getName(),
    }));
  }

  /**
   * A copy of the in-memory container. Does not re-verify the rest of the
   * vault; use verifyIntegrity() for that.
   */
  getContainer(id: number): Result<Container, NotFoundError> {
    const container = this.requireSession().containers.get(id);
    return container ? ok(detached(container)) : err(new NotFoundError(id));
  }

  /**
   * Add a container under the next unused id and persist. An empty name
   * becomes "Container <id>".
   */
  async addContainer(name: string, data: string): Promise<Container> {
    const session = this.requireSession();
    const id = session.nextId;
    const container = new Container(id, name === "" ? `Container ${id}` : name, data);

    const records = new Map(session.records);
    records.set(id, container.encrypt(session.key));
    await this.write(session.key, id + 1, records);

    session.records = records;
    session.nextId = id + 1;
    session.containers.set(id, container);
    return detached(container);
  }

  /**
   * Change the given fields, re-encrypt with a fresh IV, persist.
   */
  async updateContainer(id: number, changes: ContainerChanges): Promise<Result<Container, NotFoundError>> {
    const session = this.requireSession();
    const container = session.containers.get(id);
    if (!container) {
      return err(new NotFoundError(id));
    }

    const name = changes.name ?? container.getName();
    const data = changes.data ?? container.getData();
    const staged = new Container(id, name, data);
    const records = new Map(session.records);
    records.set(id, staged.encrypt(session.key));
    await this.write(session.key, session.nextId, records);

    session.records = records;
    session.containers.set(id, staged);
    return ok(detached(staged));
  }

  /**
   * Remove a container and persist. Its id is not handed out again.
   */
  async removeContainer(id: number): Promise<Result<void, NotFoundError>> {
    const session = this.requireSession();
    if (!session.containers.has(id)) {
      return err(new NotFoundError(id));
    }

    const records = new Map(session.records);
    records.delete(id);
    await this.write(session.key, session.nextId, records);

    session.records = records;
    session.containers.delete(id);
    return ok(undefined);
  }

  // --------------------------------------------------------------------------
  // Integrity
  // --------------------------------------------------------------------------

  /**
   * Re-read the vault file and check the vault MAC and every container record
   * under the current key. The only operation that checks the whole vault.
   */
  async verifyIntegrity(): Promise<
    Result<IntegrityReport, CorruptFormatError | VaultNotFoundError | InvalidPasswordError>
  > {
    const session = this.requireSession();
    const file = await loadVaultFile(this.options.path);
    if (isErr(file)) {
      return file;
    }

    const vaultMac = verifyVaultMac(session.key, file.value);
    const outcomes = await decryptRecords(file.value, session.key, session.password);
    if (isErr(outcomes)) {
      return outcomes;
    }
    const containers = outcomes.value.map(({ id, status }) => ({ id, status }));
    return ok({
      ok: vaultMac && containers.every((entry) => entry.status === "ok"),
      vaultMac,
      containers,
    });
  }

  // --------------------------------------------------------------------------
  // Key management
  // --------------------------------------------------------------------------

  /**
   * Re-key the vault under a new password. The file on disk stays under the
   * old password until the new one has been fully written.
   */
  async changeMasterPassword(
    newPassword: string
  ): Promise<Result<void, InvalidPasswordError | CorruptFormatError>> {
    return this.rekey(newPassword);
  }

  /**
   * Fresh salt, iv and key for the same password; every container is
   * re-encrypted. Same atomicity as changeMasterPassword.
   */
  async regenerateKeys(): Promise<Result<void, InvalidPasswordError | CorruptFormatError>> {
    return this.rekey(this.requireSession().password);
  }

  private async rekey(password: string): Promise<Result<void, InvalidPasswordError | CorruptFormatError>> {
    const session = this.requireSession();
    const generated = await KeyMaterial.generate(password, this.options.kdf ?? session.key.kdf);
    if (isErr(generated)) {
      return generated;
    }
    const newKey = generated.value;

    try {
      const records = new Map<number, ContainerRecord>();
      for (const container of [...session.containers.values(), ...session.reserved.values()]) {
        records.set(container.id, container.encrypt(newKey));
      }
      await this.write(newKey, session.nextId, records);

      session.key.destroy();
      session.key = newKey;
      session.password = password;
      session.records = records;
      return ok(undefined);
    } catch (error) {
      newKey.destroy();
      throw error;
    }
  }

  // --------------------------------------------------------------------------
  // Backup
  // --------------------------------------------------------------------------

  /**
   * Store backup credentials and/or token inside the vault (encrypted like
   * any container). undefined leaves a value as is; null or "" clears it.
   * Both are JSON documents validated before anything is written.
   */
  async setCloudCredentials(
    credentials?: string | null,
    token?: string | null
  ): Promise<Result<void, CorruptFormatError>> {
    const session = this.requireSession();

    const updates: Array<[number, string | null]> = [];
    if (credentials !== undefined) {
      if (credentials) {
        const parsed = parseJsonDocument(credentials, BackupCredentialsSchema, "backup credentials");
        if (isErr(parsed)) {
          return parsed;
        }
      }
      updates.push([CREDENTIALS_CONTAINER_ID, credentials || null]);
    }
    if (token !== undefined) {
      if (token) {
        const parsed = parseJsonDocument(token, BackupTokenSchema, "backup token");
        if (isErr(parsed)) {
          return parsed;
        }
      }
      updates.push([TOKEN_CONTAINER_ID, token || null]);
    }

    const records = new Map(session.records);
    const staged = new Map(session.reserved);
    for (const [id, value] of updates) {
      if (value === null) {
        records.delete(id);
        staged.delete(id);
      } else {
        const container = new Container(id, id === CREDENTIALS_CONTAINER_ID ? "Credential" : "Token", value);
        records.set(id, container.encrypt(session.key));
        staged.set(id, container);
      }
    }
    await this.write(session.key, session.nextId, records);

    session.records = records;
    session.reserved = staged;
    return ok(undefined);
  }

  /**
   * Forget the backup token; the credentials stay.
   */
  async signOut(): Promise<Result<void, CorruptFormatError>> {
    return this.setCloudCredentials(undefined, null);
  }

  getBackupSettings(): Result<BackupSettings, CorruptFormatError> {
    const session = this.requireSession();
    return parseBackupSettings(
      session.reserved.get(CREDENTIALS_CONTAINER_ID)?.getData(),
      session.reserved.get(TOKEN_CONTAINER_ID)?.getData()
    );
  }

  /**
   * Upload the vault file, as stored on disk, to the backup store
   */
  async uploadBackup(): Promise<Result<BackupReceipt, BackupTransportError>> {
    const gateway = this.backupGateway();
    if (isErr(gateway)) {
      return gateway;
    }
    const remoteName = remoteNameFor(this.options);
    const sent = await tryCatch(() => gateway.value.upload(this.options.path, remoteName));
    if (isErr(sent)) {
      return err(new BackupTransportError(`Backup upload failed: ${sent.error.message}`));
    }
    if (!sent.value) {
      return err(new BackupTransportError("Backup upload was rejected by the backup store"));
    }
    return ok({ remoteName });
  }

  /**
   * Download the remote copy and, if it opens under the current password,
   * make it the vault: the current file moves to "<file>.old" and the session
   * reloads from the downloaded one. Any failure leaves the local vault as it was.
   */
  async downloadBackup(): Promise<Result<BackupReceipt, DownloadError>> {
    const session = this.requireSession();
    const gateway = this.backupGateway();
    if (isErr(gateway)) {
      return gateway;
    }
    const pulled = await Vault.pullBackup(session.password, this.options, gateway.value);
    if (isErr(pulled)) {
      return pulled;
    }

    session.key.destroy();
    session.password = "";
    this.session = pulled.value.session;
    this.degraded = false;
    return ok({ remoteName: pulled.value.remoteName });
  }

  /**
   * Remove the remote copy
   */
  async deleteBackup(): Promise<Result<BackupReceipt, BackupTransportError>> {
    const gateway = this.backupGateway();
    if (isErr(gateway)) {
      return gateway;
    }
    const remoteName = remoteNameFor(this.options);
    const removed = await tryCatch(() => gateway.value.delete(remoteName));
    if (isErr(removed)) {
      return err(new BackupTransportError(`Backup delete failed: ${removed.error.message}`));
    }
    if (!removed.value) {
      return err(new BackupTransportError("Backup delete was rejected by the backup store"));
    }
    return ok({ remoteName });
  }

  private backupGateway(): Result<BackupGateway, BackupTransportError> {
    return openGateway(this.options, this.getBackupSettings());
  }

  /**
   * Download the remote copy next to the vault file and open it under the
   * given password. Only once it opens is the current file moved to
   * "<file>.old" and the copy renamed into place. Returns the copy's session.
   */
  private static async pullBackup(
    password: string,
    options: VaultOptions,
    gateway: BackupGateway
  ): Promise<Result<{ session: Session; remoteName: string }, DownloadError>> {
    const remoteName = remoteNameFor(options);
    const candidatePath = `${options.path}.download`;

    const fetched = await tryCatch(() => gateway.download(remoteName, candidatePath));
    if (isErr(fetched) || !fetched.value) {
      await fs.rm(candidatePath, { force: true });
      const reason = isErr(fetched) ? fetched.error.message : "backup not found";
      return err(new BackupTransportError(`Backup download failed: ${reason}`));
    }

    const candidate = await Vault.open(password, { ...options, path: candidatePath });
    if (isErr(candidate)) {
      await fs.rm(candidatePath, { force: true });
      return candidate;
    }
    const session = candidate.value.requireSession();
    candidate.value.session = null;

    try {
      if (await fileExists(options.path)) {
        await fs.rename(options.path, `${options.path}.old`);
      }
      await fs.rename(candidatePath, options.path);
    } catch (error) {
      session.key.destroy();
      throw error;
    }
    return ok({ session, remoteName });
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  /**
   * Write the current session to disk. Only needed after recover(), to
   * replace a damaged file with the containers that survived.
   */
  async save(): Promise<void> {
    const session = this.requireSession();
    await this.write(session.key, session.nextId, session.records);
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new VaultLockedError();
    }
    return this.session;
  }

  private async write(
    key: KeyMaterial,
    nextId: number,
    records: Map<number, ContainerRecord>
  ): Promise<void> {
    const file = buildVaultFile(key, nextId, [...records.values()]);
    await atomicWriteFile(this.options.path, encodeVaultFile(file));
    this.degraded = false;
  }
}

function parseJsonDocument<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): Result<T, CorruptFormatError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return err(new CorruptFormatError(`invalid ${label}: not valid JSON`));
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new CorruptFormatError(
        `invalid ${label}: unexpected format`,
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      )
    );
  }
  return ok(parsed.data);
}

import fs from "fs/promises";
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import { atomicWriteFile } from "../utils/storage.js";
import { logDiagnostic } from "../utils/cli.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Remote blob store for off-site copies of the vault file. The vault only
 * ever hands it ciphertext and treats whatever it returns as untrusted.
 *
 * Methods resolve to false when the store answers with a failure and reject
 * when the request itself fails (network, timeout).
 */
export interface BackupGateway {
  upload(localPath: string, remoteName: string): Promise<boolean>;
  download(remoteName: string, localPath: string): Promise<boolean>;
  delete(remoteName: string): Promise<boolean>;
}

export const BackupCredentialsSchema = z.object({
  endpoint: z.string().url().describe("Base URL of the blob store"),
  bucket: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, "bucket must be lowercase alphanumerics and hyphens")
    .optional()
    .describe("Optional bucket / namespace"),
});

export const BackupTokenSchema = z.object({
  accessToken: z.string().min(1).describe("Bearer token for the blob store"),
  expiresAt: z.string().datetime().optional().describe("ISO 8601 expiry, informational"),
});

export type BackupCredentials = z.infer<typeof BackupCredentialsSchema>;
export type BackupToken = z.infer<typeof BackupTokenSchema>;

export interface HttpBackupGatewayOptions {
  timeoutMs?: number;
  /** Pre-configured axios instance (tests pass one with a stub adapter) */
  client?: AxiosInstance;
}

const DEFAULT_TIMEOUT_MS = 30_000;

// ============================================================================
// HTTP implementation
// ============================================================================

/**
 * BackupGateway over a plain REST blob API:
 *
 *   PUT    {endpoint}[/buckets/{bucket}]/objects/{name}   body: raw bytes
 *   GET    {endpoint}[/buckets/{bucket}]/objects/{name}   -> raw bytes, 404 if absent
 *   DELETE {endpoint}[/buckets/{bucket}]/objects/{name}
 *
 * Credentials and token are passed through as given; no OAuth flow happens here.
 */
export class HttpBackupGateway implements BackupGateway {
  private readonly client: AxiosInstance;

  constructor(
    private readonly credentials: BackupCredentials,
    private readonly token: BackupToken | null,
    options: HttpBackupGatewayOptions = {}
  ) {
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });
  }

  async upload(localPath: string, remoteName: string): Promise<boolean> {
    const body = await fs.readFile(localPath);
    const response = await this.client.put(this.objectUrl(remoteName), body, {
      headers: { ...this.authHeaders(), "Content-Type": "application/octet-stream" },
      validateStatus: () => true,
    });
    return this.succeeded("PUT", remoteName, response);
  }

  async download(remoteName: string, localPath: string): Promise<boolean> {
    const response = await this.client.get<ArrayBuffer>(this.objectUrl(remoteName), {
      headers: this.authHeaders(),
      responseType: "arraybuffer",
      validateStatus: () => true,
    });
    if (!this.succeeded("GET", remoteName, response)) {
      return false;
    }
    const bytes = Buffer.from(response.data);
    if (bytes.length === 0) {
      return false;
    }
    await atomicWriteFile(localPath, bytes);
    return true;
  }

  async delete(remoteName: string): Promise<boolean> {
    const response = await this.client.delete(this.objectUrl(remoteName), {
      headers: this.authHeaders(),
      validateStatus: () => true,
    });
    return this.succeeded("DELETE", remoteName, response);
  }

  private objectUrl(remoteName: string): string {
    const base = this.credentials.endpoint.replace(/\/+$/, "");
    const bucket = this.credentials.bucket
      ? `/buckets/${encodeURIComponent(this.credentials.bucket)}`
      : "";
    return `${base}${bucket}/objects/${encodeURIComponent(remoteName)}`;
  }

  private authHeaders(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token.accessToken}` } : {};
  }

  private succeeded(method: string, remoteName: string, response: AxiosResponse): boolean {
    const ok = response.status >= 200 && response.status < 300;
    if (process.env.COFFER_DEBUG) {
      logDiagnostic(`backup ${method} ${remoteName} -> ${response.status}`);
    }
    return ok;
  }
}

/**
 * Default factory used by the vault when no other gateway is configured
 */
export function createHttpBackupGateway(
  credentials: BackupCredentials,
  token: BackupToken | null,
  options: HttpBackupGatewayOptions = {}
): BackupGateway {
  return new HttpBackupGateway(credentials, token, options);
}

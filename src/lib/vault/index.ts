export { Vault, type OpenError, type DownloadError, type RecoveredVault, type ContainerChanges, type BackupSettings } from "./vault.js";
export { Container } from "./container.js";
export { KeyMaterial, checkScryptParams } from "./key-material.js";
export { decodeVaultFile, encodeVaultFile, buildVaultFile, computeVaultMac, verifyVaultMac } from "./codec.js";
export {
  VAULT_FILE_VERSION,
  CREDENTIALS_CONTAINER_ID,
  TOKEN_CONTAINER_ID,
  type KeyHeader,
  type ContainerRecord,
  type VaultFile,
  type ContainerInfo,
  type ContainerSummary,
  type ContainerStatus,
  type IntegrityReport,
  type VaultOptions,
  type BackupGatewayFactory,
  type BackupReceipt,
} from "./types.js";

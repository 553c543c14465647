/**
 * Public surface of the meshvault core.
 */

export * from './errors/CoreError.js';
export * from './errors/IpcError.js';
export * from './errors/result.js';
export { ErrorSanitizer } from './errors/sanitizer.js';

export { logger, getContextLogger } from './logging/logger.js';
export type { ContextLogger, ContextRole, LoggableContext } from './logging/logger.js';
export { loadCoreConfig, coreConfig } from './bootstrap/config/core-config.js';
export type { CoreConfig } from './bootstrap/config/core-config.js';

export { CapabilityRegistry } from './registry/CapabilityRegistry.js';
export type { Handle, RegistryOptions } from './registry/CapabilityRegistry.js';
export type { ContextObjects, ContextRegistry, ObjectKind } from './context/objects.js';
export { ContextScheduler } from './context/scheduler.js';
export { App } from './context/app.js';
export type { AppOptions } from './context/app.js';

export { CryptoKeyStore } from './crypto/keyManager.js';
export type { AppKeys, KeyManager } from './crypto/keyManager.js';
export { CryptoHandles } from './crypto/handles.js';

export * from './mutableData/permissions.js';
export * from './mutableData/entries.js';
export * from './mutableData/record.js';
export { MDataInfo, NAME_BYTES } from './mutableData/mdataInfo.js';
export type { EncInfo, MDataKind, MDataInfoJSON } from './mutableData/mdataInfo.js';
export { MDataCollections } from './mutableData/collections.js';
export { MDataOps } from './mutableData/operations.js';
export { MutableDataStore, METADATA_KEY, encodeMetadata, decodeMetadata } from './mutableData/store.js';
export type { UserMetadata } from './mutableData/store.js';

export { ImmutableContentStore } from './immutableData/store.js';
export type { ImmutableStoreOptions } from './immutableData/store.js';
export type { CipherOpt } from './immutableData/cipherOpt.js';
export type { ChunkSizes } from './immutableData/chunker.js';

export { MemoryNetwork } from './network/memoryNetwork.js';
export { NetworkClient, defaultRetryPolicy } from './network/client.js';
export { withRetry, calculateBackoffMs } from './network/retry.js';
export type { RetryPolicy } from './network/retry.js';
export type { DataNetwork, NetworkOperation, RecordAddress } from './network/types.js';

export * from './ipc/types.js';
export * from './ipc/appIpc.js';
export * from './ipc/authIpc.js';

export { AccessContainer } from './accessContainer/AccessContainer.js';

export { AuditLogger } from './audit/logger.js';
export { verifyAuditChain, verifyAuditLog } from './audit/integrity.js';
export type { AuditRecordV1, AuditEventType } from './audit/schema.js';

export { Authenticator, DEFAULT_CONTAINERS, appContainerName } from './authenticator/authenticator.js';
export type { AuthenticatorOptions, AuthDecodeOutcome, MDataAccessor } from './authenticator/authenticator.js';
export type { AppState, ContainerSpec } from './authenticator/account.js';

// ─── Types ──────────────────────────────────────────────────────
export type { KubernetesBackendConfig, SecretStoreType, StoreConfig } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  kubernetesBackendConfigSchema,
  secretStoreConfigSchema,
  secretStoreTypeSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadStoreConfig, parseStoreConfig, resolveEnvVars } from './loader.js';

// ─── TLS ────────────────────────────────────────────────────────
export { loadTlsFiles } from './tls.js';
export type { TlsFilePaths, TlsFiles } from './tls.js';

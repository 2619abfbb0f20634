// Errors
export { LanguageServerError, errorMessage, type LanguageServerErrorReason } from './errors.js';

// Config
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_DIR,
  loadConfig,
  saveConfig,
  ensureConfigDir,
  getConfigPath,
  readEnvOverrides,
  parseConfigEntry,
  CONFIG_KEYS,
  type QuotaScopeConfig,
  type FileConfig,
} from './config.js';

// Discovery
export {
  SystemProcessSource,
  type OsProcess,
  type PortLookup,
  type PortLookupFailure,
  type ProcessSource,
} from './process-source.js';
export {
  ProcessLocator,
  resolveProcessName,
  extractToken,
  extractAdvertisedPort,
  type Locator,
  type LocatedServer,
  type PortProbe,
  type ProcessLocatorOptions,
} from './process-locator.js';
export { LanguageServerProbe } from './port-probe.js';

// Transport
export { Http2Client, type Http2ClientOptions, type LsHttpClient, type LsHttpResponse } from './http2-client.js';
export { SerialQueue } from './serial-queue.js';
export { ConnectionCache, type ConnectionCacheOptions, type ConnectionLease } from './connection-cache.js';

// Quota
export { fetchUserStatus } from './quota-fetcher.js';
export { normalizeQuota, derivePoolName, groupIntoPools, comparePressure, millisUntil, roundTo1 } from './quota-normalizer.js';
export { QuotaService, NOT_FOUND_MESSAGE, type QuotaServiceEvents, type QuotaServiceOptions } from './quota-service.js';

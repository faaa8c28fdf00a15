export { hostingDe } from './providers/hosting-de.js';
export { handleUpdate } from './update.js';
export { createApp } from './server.js';
export { loadConfig, parseConfig } from './config.js';
export { parseAllowList, isDomainAllowed } from './allow-list.js';
export { normalizeDomain } from './domain.js';
export { createLogger, formatLogLine } from './logger.js';
export { DnsApiError, ConfigError } from './errors.js';
export {
  HOSTING_DE_API,
  MIN_TTL,
  RECORD_COMMENT,
  UPDATE_PATH,
} from './constants.js';
export type { HostingDeOptions } from './providers/hosting-de.js';
export type { UpdateDeps } from './update.js';
export type { AppConfig, Listen } from './config.js';
export type { AllowList } from './allow-list.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';
export type { DnsApiErrorKind, DnsApiErrorDetail } from './errors.js';
export type { DnsRecordClient } from './provider.js';
export type {
  RecordType,
  ResourceRecord,
  UpdateRequest,
  UpdateResult,
} from './types.js';

export {
  CLOUDFLARE_API_BASE_URL,
  CloudflareApiError,
  CloudflareClient,
  DNS_RECORD_TYPES,
  ZoneNotFoundError
} from "./cloudflare/client";
export type {
  CloudflareClientOptions,
  CloudflareDnsRecordType,
  CloudflareErrorItem,
  DnsRecordInput
} from "./cloudflare/client";
export { ConfigError, loadConfig, parseConfig } from "./config";
export type { AppConfig, RecordConfig, ZoneConfig } from "./config";
export { createLogger, logger } from "./logger";
export type { LogFields, LogLevel, Logger } from "./logger";
export { abortableSleep, createScheduler } from "./scheduler";
export { loadConfigOrExit } from "./startup";
export type { StartupOptions } from "./startup";
export type { Scheduler, SchedulerError, SchedulerOptions, SchedulerSnapshot, Sleep } from "./scheduler";
export { createReconciler, summarizeChangeKinds } from "./update";
export type { CycleFailure, CycleSummary, Reconciler, ReconcilerOptions } from "./update";
export { IdentifierCache } from "./update/cache";
export type { RecordIdOrigin, RecordKey, ResolvedRecordId } from "./update/cache";
export { IpFetchError, createHttpIpResolver, ipProviderUrl } from "./update/ip-resolver";
export type { HttpIpResolverOptions } from "./update/ip-resolver";
export type { DnsProvider, IpResolver } from "./update/ports";
export type { RecordChange, RecordChangeKind } from "./update/reconcile";
export { buildRecordInput, isDynamicRecordType, recordFqdn, resolveContent, ttlFor } from "./update/records";

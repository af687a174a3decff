import type { CloudflareDnsRecordType, DnsRecordInput } from "../cloudflare/client";
import type { RecordConfig } from "../config";

export const AUTO_TTL = 1;

export const DEFAULT_TTL = 300;

export const APEX_RECORD_NAME = "@";

const DYNAMIC_RECORD_TYPES: ReadonlySet<CloudflareDnsRecordType> = new Set(["A", "AAAA"]);

/** Address records follow the public IP; every other type is static. */
export const isDynamicRecordType = (type: CloudflareDnsRecordType): boolean => DYNAMIC_RECORD_TYPES.has(type);

export const recordFqdn = (recordName: string, zoneName: string): string =>
  recordName === APEX_RECORD_NAME ? zoneName : `${recordName}.${zoneName}`;

export const resolveContent = (record: RecordConfig, zoneName: string, ip: string): string => {
  if (isDynamicRecordType(record.type)) {
    return ip;
  }
  if (record.target !== undefined && record.target.length > 0) {
    return record.target;
  }
  return zoneName;
};

// Cloudflare ignores TTL on proxied records; 1 means "automatic".
export const ttlFor = (proxied: boolean): number => (proxied ? AUTO_TTL : DEFAULT_TTL);

export const buildRecordInput = (record: RecordConfig, zoneName: string, ip: string): DnsRecordInput => ({
  type: record.type,
  name: recordFqdn(record.name, zoneName),
  content: resolveContent(record, zoneName, ip),
  ttl: ttlFor(record.proxied),
  proxied: record.proxied
});

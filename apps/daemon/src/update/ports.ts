import type { CloudflareDnsRecordType, DnsRecordInput } from "../cloudflare/client";

/**
 * Remote record operations the reconciler depends on. `CloudflareClient` is the production
 * implementation; tests substitute in-memory fakes.
 */
export interface DnsProvider {
  resolveZoneId(zoneName: string): Promise<string>;
  /** Resolves to `null` when no record of that type and name exists. */
  findRecordId(zoneId: string, type: CloudflareDnsRecordType, name: string): Promise<string | null>;
  createRecord(zoneId: string, input: DnsRecordInput): Promise<string>;
  updateRecord(zoneId: string, recordId: string, input: DnsRecordInput): Promise<void>;
}

export interface IpResolver {
  fetchIp(): Promise<string>;
}

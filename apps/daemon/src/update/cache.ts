import type { CloudflareDnsRecordType, DnsRecordInput } from "../cloudflare/client";
import type { DnsProvider } from "./ports";

export type RecordKey = {
  readonly type: CloudflareDnsRecordType;
  readonly name: string;
};

export type RecordIdOrigin = "cached" | "found" | "created";

export type ResolvedRecordId = {
  readonly recordId: string;
  readonly origin: RecordIdOrigin;
};

const keyOf = ({ type, name }: RecordKey): string => `${type} ${name.toLowerCase()}`;

/**
 * Remote zone and record identifiers, memoized for the lifetime of the process.
 *
 * Zone identifiers are never invalidated. Record identifiers are dropped only through
 * {@link IdentifierCache.forgetRecord}, after which the next lookup goes back to the provider.
 */
export class IdentifierCache {
  private readonly provider: DnsProvider;

  private readonly zoneIds = new Map<string, string>();

  private readonly recordIds = new Map<string, Map<string, string>>();

  constructor(provider: DnsProvider) {
    this.provider = provider;
  }

  public zoneId(zoneName: string): string | undefined {
    return this.zoneIds.get(zoneName);
  }

  public async getOrResolveZoneId(zoneName: string): Promise<string> {
    const cached = this.zoneIds.get(zoneName);
    if (cached !== undefined) {
      return cached;
    }
    const zoneId = await this.provider.resolveZoneId(zoneName);
    this.zoneIds.set(zoneName, zoneId);
    return zoneId;
  }

  public recordId(zoneName: string, key: RecordKey): string | undefined {
    return this.recordIds.get(zoneName)?.get(keyOf(key));
  }

  public async getOrCreateRecordId(zoneName: string, zoneId: string, input: DnsRecordInput): Promise<ResolvedRecordId> {
    const cached = this.recordId(zoneName, input);
    if (cached !== undefined) {
      return { recordId: cached, origin: "cached" };
    }
    const found = await this.provider.findRecordId(zoneId, input.type, input.name);
    if (found !== null) {
      this.remember(zoneName, input, found);
      return { recordId: found, origin: "found" };
    }
    const created = await this.provider.createRecord(zoneId, input);
    this.remember(zoneName, input, created);
    return { recordId: created, origin: "created" };
  }

  public forgetRecord(zoneName: string, key: RecordKey): void {
    this.recordIds.get(zoneName)?.delete(keyOf(key));
  }

  private remember(zoneName: string, key: RecordKey, recordId: string): void {
    const bucket = this.recordIds.get(zoneName) ?? new Map<string, string>();
    bucket.set(keyOf(key), recordId);
    this.recordIds.set(zoneName, bucket);
  }
}

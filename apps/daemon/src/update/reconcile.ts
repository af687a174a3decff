import type { CloudflareDnsRecordType } from "../cloudflare/client";
import type { RecordConfig, ZoneConfig } from "../config";
import { describeError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import type { IdentifierCache, ResolvedRecordId } from "./cache";
import type { DnsProvider } from "./ports";
import { buildRecordInput, isDynamicRecordType } from "./records";

export type RecordChangeKind = "create" | "adopt" | "update" | "skip" | "fail";

export type RecordChange = {
  readonly kind: RecordChangeKind;
  readonly recordType: CloudflareDnsRecordType;
  readonly hostname: string;
  readonly zoneName: string;
  readonly reason?: string;
};

export type RecordContext = {
  readonly provider: DnsProvider;
  readonly cache: IdentifierCache;
  readonly logger: Logger;
  readonly zone: ZoneConfig;
  readonly zoneId: string;
  readonly record: RecordConfig;
  readonly ip: string;
  readonly ipChanged: boolean;
};

/**
 * Decides and performs the remote work for a single record in one cycle.
 *
 * Address records are only touched in a cycle where the public IP changed. Other records are
 * created or adopted once and then left alone. A failed update drops the cached identifier so the
 * next cycle that reaches the record looks it up again.
 */
export const reconcileRecord = async (context: RecordContext): Promise<RecordChange> => {
  const { provider, cache, logger, zone, zoneId, record, ip, ipChanged } = context;
  const dynamic = isDynamicRecordType(record.type);
  const input = buildRecordInput(record, zone.name, ip);
  const change = (kind: RecordChangeKind, reason?: string): RecordChange => ({
    kind,
    recordType: record.type,
    hostname: input.name,
    zoneName: zone.name,
    reason
  });

  if (dynamic && !ipChanged) {
    logger.debug("⏭️ Record skipped, IP unchanged", { zone: zone.name, type: record.type, name: input.name });
    return change("skip", "ip-unchanged");
  }
  if (!dynamic && cache.recordId(zone.name, input) !== undefined) {
    logger.debug("⏭️ Record skipped, already reconciled", { zone: zone.name, type: record.type, name: input.name });
    return change("skip", "already-reconciled");
  }

  let resolved: ResolvedRecordId;
  try {
    resolved = await cache.getOrCreateRecordId(zone.name, zoneId, input);
  } catch (error) {
    logger.error("💥 Failed to get or create record", {
      zone: zone.name,
      type: record.type,
      name: input.name,
      ...describeError(error)
    });
    return change("fail", `lookup: ${errorMessage(error)}`);
  }

  if (resolved.origin === "created") {
    logger.info("🆕 Record created", {
      zone: zone.name,
      type: record.type,
      name: input.name,
      content: input.content,
      proxied: input.proxied
    });
    return change("create");
  }

  if (!dynamic) {
    logger.info("🔗 Existing record adopted", { zone: zone.name, type: record.type, name: input.name });
    return change("adopt");
  }

  try {
    await provider.updateRecord(zoneId, resolved.recordId, input);
  } catch (error) {
    cache.forgetRecord(zone.name, input);
    logger.error("💥 Failed to update record", {
      zone: zone.name,
      type: record.type,
      name: input.name,
      ...describeError(error)
    });
    return change("fail", `update: ${errorMessage(error)}`);
  }

  logger.info("✅ Record updated", {
    zone: zone.name,
    type: record.type,
    name: input.name,
    content: input.content,
    proxied: input.proxied
  });
  return change("update");
};

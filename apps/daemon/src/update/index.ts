import type { ZoneConfig } from "../config";
import { describeError, errorMessage } from "../errors";
import { logger as defaultLogger, type Logger } from "../logger";
import { IdentifierCache } from "./cache";
import type { DnsProvider, IpResolver } from "./ports";
import { type RecordChange, reconcileRecord } from "./reconcile";

export type CycleFailure = {
  readonly stage: "ip" | "zone";
  readonly zoneName?: string;
  readonly message: string;
};

export type CycleSummary = {
  readonly timestamp: string;
  readonly durationMs: number;
  readonly ip: string | null;
  readonly ipChanged: boolean;
  readonly zoneCount: number;
  readonly recordCount: number;
  readonly changes: readonly RecordChange[];
  readonly failures: readonly CycleFailure[];
};

export type ReconcilerOptions = {
  readonly provider: DnsProvider;
  readonly ipResolver: IpResolver;
  readonly zones: readonly ZoneConfig[];
  readonly logger?: Logger;
};

export type Reconciler = {
  readonly runCycle: () => Promise<CycleSummary>;
  readonly lastKnownIp: () => string | null;
  readonly cache: IdentifierCache;
};

export const summarizeChangeKinds = (entries: readonly RecordChange[]): Record<RecordChange["kind"], number> => {
  const counts: Record<RecordChange["kind"], number> = {
    create: 0,
    adopt: 0,
    update: 0,
    skip: 0,
    fail: 0
  };
  for (const entry of entries) {
    counts[entry.kind] += 1;
  }
  return counts;
};

export const createReconciler = (options: ReconcilerOptions): Reconciler => {
  const { provider, ipResolver, zones } = options;
  const logger = options.logger ?? defaultLogger;
  const cache = new IdentifierCache(provider);
  let lastKnownIp: string | null = null;

  const runCycle = async (): Promise<CycleSummary> => {
    const startedAt = Date.now();
    const changes: RecordChange[] = [];
    const failures: CycleFailure[] = [];
    const finish = (ip: string | null, ipChanged: boolean): CycleSummary => ({
      timestamp: new Date(startedAt).toISOString(),
      durationMs: Date.now() - startedAt,
      ip,
      ipChanged,
      zoneCount: zones.length,
      recordCount: zones.reduce((count, zone) => count + zone.records.length, 0),
      changes,
      failures
    });

    let ip: string;
    try {
      ip = await ipResolver.fetchIp();
    } catch (error) {
      logger.error("💥 Failed to get public IP", describeError(error));
      failures.push({ stage: "ip", message: errorMessage(error) });
      return finish(null, false);
    }

    const ipChanged = ip !== lastKnownIp;
    if (ipChanged) {
      logger.info("🌐 Public IP changed", { previous: lastKnownIp, ip });
    } else {
      logger.info("💤 Public IP unchanged", { ip });
    }
    lastKnownIp = ip;

    for (const zone of zones) {
      let zoneId: string;
      try {
        zoneId = await cache.getOrResolveZoneId(zone.name);
      } catch (error) {
        logger.error("💥 Failed to get zone ID", { zone: zone.name, ...describeError(error) });
        failures.push({ stage: "zone", zoneName: zone.name, message: errorMessage(error) });
        continue;
      }
      for (const record of zone.records) {
        const change = await reconcileRecord({ provider, cache, logger, zone, zoneId, record, ip, ipChanged });
        changes.push(change);
      }
    }

    const summary = finish(ip, ipChanged);
    logger.debug("🏁 Cycle finished", {
      durationMs: summary.durationMs,
      failures: failures.length,
      ...summarizeChangeKinds(changes)
    });
    return summary;
  };

  return {
    runCycle,
    lastKnownIp: () => lastKnownIp,
    cache
  };
};

import { CloudflareClient } from "./cloudflare/client";
import { DEFAULT_CONFIG_PATH } from "./config";
import { logger } from "./logger";
import { createScheduler } from "./scheduler";
import { loadConfigOrExit } from "./startup";
import { createReconciler } from "./update";
import { createHttpIpResolver } from "./update/ip-resolver";

const configPath = process.argv[2] ?? process.env.IPSYNC_CONFIG ?? DEFAULT_CONFIG_PATH;

const config = loadConfigOrExit(configPath);

const timeoutMs = config.requestTimeoutSeconds * 1000;
const client = new CloudflareClient(config.apiToken, { timeoutMs });
const reconciler = createReconciler({
  provider: client,
  ipResolver: createHttpIpResolver(config.ipProvider, { timeoutMs }),
  zones: config.zones
});
const scheduler = createScheduler(reconciler, { intervalSeconds: config.pollIntervalSeconds });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info("👋 Shutdown requested", { signal });
    scheduler.stop();
  });
}

logger.info("🛰️ DDNS worker running", {
  ipProvider: config.ipProvider,
  pollIntervalSeconds: config.pollIntervalSeconds,
  zones: config.zones.length,
  records: config.zones.reduce((count, zone) => count + zone.records.length, 0)
});

await scheduler.start();

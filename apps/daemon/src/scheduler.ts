import { setTimeout as delay } from "node:timers/promises";
import type { CloudflareErrorItem } from "./cloudflare/client";
import { describeError } from "./errors";
import { formatDuration } from "./format";
import { logger as defaultLogger, type Logger } from "./logger";
import type { CycleSummary, Reconciler } from "./update";

export type SchedulerError = {
  readonly timestamp: string;
  readonly message: string;
  readonly stack?: string;
  readonly status?: number;
  readonly apiErrors?: readonly CloudflareErrorItem[];
  readonly responseBody?: string;
};

export type SchedulerSnapshot = {
  readonly running: boolean;
  readonly cycles: number;
  readonly lastSuccess?: CycleSummary;
  readonly lastError?: SchedulerError;
};

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type SchedulerOptions = {
  readonly intervalSeconds: number;
  readonly sleep?: Sleep;
  readonly logger?: Logger;
};

export type Scheduler = {
  /** Runs cycles until {@link Scheduler.stop} is called. */
  readonly start: () => Promise<void>;
  readonly stop: () => void;
  readonly snapshot: () => SchedulerSnapshot;
};

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

export const createScheduler = (reconciler: Reconciler, options: SchedulerOptions): Scheduler => {
  const logger = options.logger ?? defaultLogger;
  const sleep = options.sleep ?? abortableSleep;
  const intervalMs = options.intervalSeconds * 1000;
  const controller = new AbortController();
  let loop: Promise<void> | null = null;
  let running = false;
  let cycles = 0;
  let lastSuccess: CycleSummary | undefined;
  let lastError: SchedulerError | undefined;

  const execute = async (): Promise<void> => {
    running = true;
    try {
      lastSuccess = await reconciler.runCycle();
      lastError = undefined;
    } catch (error) {
      const described = describeError(error);
      const failure: SchedulerError = {
        timestamp: new Date().toISOString(),
        message: described.error,
        stack: error instanceof Error ? error.stack : undefined,
        status: described.status,
        apiErrors: described.apiErrors,
        responseBody: described.responseBody
      };
      lastError = failure;
      logger.error("💥 Update cycle failed", { ...described, stack: failure.stack });
    } finally {
      running = false;
      cycles += 1;
    }
  };

  const run = async (): Promise<void> => {
    logger.info("🕒 Scheduler started", { intervalSeconds: options.intervalSeconds });
    while (!controller.signal.aborted) {
      await execute();
      if (controller.signal.aborted) {
        break;
      }
      logger.info(`⏲️ Checking again in ${formatDuration(options.intervalSeconds)}`);
      await sleep(intervalMs, controller.signal);
    }
    logger.info("🛑 Scheduler stopped", { cycles });
  };

  const start = (): Promise<void> => {
    if (loop === null) {
      loop = run();
    }
    return loop;
  };

  const stop = (): void => {
    controller.abort();
  };

  const snapshot = (): SchedulerSnapshot => ({
    running,
    cycles,
    lastSuccess,
    lastError
  });

  return {
    start,
    stop,
    snapshot
  };
};

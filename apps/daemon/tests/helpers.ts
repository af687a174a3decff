import { type Mock, vi } from "vitest";
import type { Logger } from "../src/logger";
import type { DnsProvider, IpResolver } from "../src/update/ports";

export type FakeProvider = {
  readonly [K in keyof DnsProvider]: Mock<DnsProvider[K]>;
};

export const createFakeProvider = (): FakeProvider => ({
  resolveZoneId: vi.fn<DnsProvider["resolveZoneId"]>().mockResolvedValue("zone-1"),
  findRecordId: vi.fn<DnsProvider["findRecordId"]>().mockResolvedValue(null),
  createRecord: vi.fn<DnsProvider["createRecord"]>().mockResolvedValue("rec-1"),
  updateRecord: vi.fn<DnsProvider["updateRecord"]>().mockResolvedValue(undefined)
});

/** Hands out the given addresses in order; an `Error` entry is thrown instead. */
export const createQueuedResolver = (answers: readonly (string | Error)[]): IpResolver => {
  const queue = [...answers];
  return {
    fetchIp: async () => {
      const next = queue.shift();
      if (next === undefined) {
        throw new Error("no more addresses queued");
      }
      if (next instanceof Error) {
        throw next;
      }
      return next;
    }
  };
};

export type RecordedLine = {
  readonly level: keyof Logger;
  readonly message: string;
};

export const createRecordingLogger = (): Logger & { readonly lines: RecordedLine[] } => {
  const lines: RecordedLine[] = [];
  return {
    lines,
    debug: (message) => lines.push({ level: "debug", message }),
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message })
  };
};

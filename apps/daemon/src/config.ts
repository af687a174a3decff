import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnvFile } from "dotenv";
import { z } from "zod";
import { DNS_RECORD_TYPES, type CloudflareDnsRecordType } from "./cloudflare/client";
import { ipProviderUrl } from "./update/ip-resolver";

const ensureEnvLoaded = (): void => {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const candidateRoots = [
    process.cwd(),
    resolve(process.cwd(), ".."),
    resolve(process.cwd(), "..", ".."),
    moduleDir,
    resolve(moduleDir, ".."),
    resolve(moduleDir, "..", "..")
  ];
  for (const base of candidateRoots) {
    const candidate = resolve(base, ".env");
    if (existsSync(candidate)) {
      loadEnvFile({ path: candidate });
      return;
    }
  }
  loadEnvFile();
};

ensureEnvLoaded();

export type RecordConfig = {
  readonly name: string;
  readonly type: CloudflareDnsRecordType;
  readonly proxied: boolean;
  readonly target?: string;
};

export type ZoneConfig = {
  readonly name: string;
  readonly records: readonly RecordConfig[];
};

export type AppConfig = {
  readonly apiToken: string;
  readonly ipProvider: string;
  readonly pollIntervalSeconds: number;
  readonly requestTimeoutSeconds: number;
  readonly zones: readonly ZoneConfig[];
};

export const DEFAULT_POLL_INTERVAL_SECONDS = 300;

export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 10;

export const DEFAULT_CONFIG_PATH = "config.json";

export class ConfigError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

const recordTypeSchema = z.preprocess(
  (value) => {
    if (typeof value !== "string") {
      return value;
    }
    const normalized = value.trim().toUpperCase();
    return normalized.length === 0 ? undefined : normalized;
  },
  z.enum(DNS_RECORD_TYPES).optional()
);

const recordSchema = z.object({
  name: z.string({ required_error: "record name is required" }).trim().min(1, "record name is required"),
  type: recordTypeSchema,
  proxied: z.boolean().optional(),
  target: z.string().trim().optional()
});

const zoneSchema = z.object({
  name: z.string({ required_error: "zone name is required" }).trim().min(1, "zone name is required"),
  records: z.array(recordSchema).optional()
});

const fileSchema = z.object({
  poll_interval: z.number().int().optional(),
  cloudflare_api_token: z.string().trim().optional(),
  ip_provider: z.string({ required_error: "ip_provider is required" }).trim().min(1, "ip_provider is required"),
  request_timeout: z.number().positive().optional(),
  zones: z
    .array(zoneSchema, { required_error: "At least one zone must be defined in config" })
    .min(1, "At least one zone must be defined in config")
});

const envSchema = z.object({
  CLOUDFLARE_API_TOKEN: z.string().trim().optional()
});

type Environment = Record<string, string | undefined>;

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

export const parseConfig = (raw: unknown, env: Environment = process.env): AppConfig => {
  const file = fileSchema.safeParse(raw);
  if (!file.success) {
    throw new ConfigError(`Invalid config: ${describeIssues(file.error)}`, { cause: file.error });
  }
  const parsedEnv = envSchema.parse(env);

  const envToken = parsedEnv.CLOUDFLARE_API_TOKEN ?? "";
  const apiToken = envToken.length > 0 ? envToken : file.data.cloudflare_api_token ?? "";
  if (apiToken.length === 0) {
    throw new ConfigError("cloudflare_api_token is required in config");
  }

  const pollInterval = file.data.poll_interval ?? 0;
  const zones = file.data.zones.map<ZoneConfig>((zone) => ({
    name: zone.name,
    records: (zone.records ?? []).map<RecordConfig>((record) => ({
      name: record.name,
      type: record.type ?? "A",
      proxied: record.proxied ?? false,
      target: record.target
    }))
  }));

  return Object.freeze({
    apiToken,
    ipProvider: ipProviderUrl(file.data.ip_provider),
    pollIntervalSeconds: pollInterval > 0 ? pollInterval : DEFAULT_POLL_INTERVAL_SECONDS,
    requestTimeoutSeconds: file.data.request_timeout ?? DEFAULT_REQUEST_TIMEOUT_SECONDS,
    zones
  });
};

export const loadConfig = (path: string = DEFAULT_CONFIG_PATH, env: Environment = process.env): AppConfig => {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read config ${path}: ${reason}`, { cause: error });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse config ${path}: ${reason}`, { cause: error });
  }
  return parseConfig(raw, env);
};

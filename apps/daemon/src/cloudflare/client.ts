import type { DnsProvider } from "../update/ports";

export type CloudflareErrorItem = {
  readonly code: number;
  readonly message: string;
};

type CloudflareResponse<T> = {
  readonly success: boolean;
  readonly result: T;
  readonly errors: readonly CloudflareErrorItem[];
  readonly messages: readonly unknown[];
};

type CloudflareIdentified = {
  readonly id: string;
};

export const DNS_RECORD_TYPES = [
  "A",
  "AAAA",
  "CAA",
  "CERT",
  "CNAME",
  "DNSKEY",
  "DS",
  "HTTPS",
  "LOC",
  "MX",
  "NAPTR",
  "NS",
  "PTR",
  "SMIMEA",
  "SRV",
  "SSHFP",
  "SVCB",
  "TLSA",
  "TXT",
  "URI"
] as const;

export type CloudflareDnsRecordType = (typeof DNS_RECORD_TYPES)[number];

export type DnsRecordInput = {
  readonly type: CloudflareDnsRecordType;
  readonly name: string;
  readonly content: string;
  readonly ttl: number;
  readonly proxied: boolean;
};

export class CloudflareApiError extends Error {
  public readonly status: number;

  public readonly errors: readonly CloudflareErrorItem[];

  public readonly body?: string;

  constructor(message: string, status: number, errors: readonly CloudflareErrorItem[], body?: string) {
    super(message);
    this.name = "CloudflareApiError";
    this.status = status;
    this.errors = errors;
    this.body = body;
  }
}

export class ZoneNotFoundError extends Error {
  public readonly zoneName: string;

  constructor(zoneName: string) {
    super(`Zone "${zoneName}" not found`);
    this.name = "ZoneNotFoundError";
    this.zoneName = zoneName;
  }
}

export type CloudflareClientOptions = {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
};

type RequestOptions = {
  readonly method?: "GET" | "POST" | "PUT";
  readonly body?: unknown;
  readonly searchParams?: Record<string, string>;
};

export const CLOUDFLARE_API_BASE_URL = "https://api.cloudflare.com/client/v4";

export class CloudflareClient implements DnsProvider {
  private readonly baseUrl: string;

  private readonly token: string;

  private readonly timeoutMs: number;

  constructor(token: string, options: CloudflareClientOptions = {}) {
    this.token = token;
    this.baseUrl = options.baseUrl ?? CLOUDFLARE_API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  public async resolveZoneId(zoneName: string): Promise<string> {
    const response = await this.request<readonly CloudflareIdentified[]>("/zones", {
      searchParams: { name: zoneName }
    });
    const zone = response.result[0];
    if (zone === undefined) {
      throw new ZoneNotFoundError(zoneName);
    }
    return zone.id;
  }

  public async findRecordId(zoneId: string, type: CloudflareDnsRecordType, name: string): Promise<string | null> {
    const response = await this.request<readonly CloudflareIdentified[]>(`/zones/${zoneId}/dns_records`, {
      searchParams: { type, name }
    });
    return response.result[0]?.id ?? null;
  }

  public async createRecord(zoneId: string, input: DnsRecordInput): Promise<string> {
    const response = await this.request<CloudflareIdentified>(`/zones/${zoneId}/dns_records`, {
      method: "POST",
      body: input
    });
    return response.result.id;
  }

  public async updateRecord(zoneId: string, recordId: string, input: DnsRecordInput): Promise<void> {
    await this.request<CloudflareIdentified>(`/zones/${zoneId}/dns_records/${recordId}`, {
      method: "PUT",
      body: input
    });
  }

  private async request<T>(path: string, options: RequestOptions = {}): Promise<CloudflareResponse<T>> {
    const url = new URL(`${this.baseUrl}${path}`);
    if (options.searchParams !== undefined) {
      const params = new URLSearchParams(options.searchParams);
      params.forEach((value, key) => {
        url.searchParams.append(key, value);
      });
    }

    const init: RequestInit = {
      method: options.method ?? "GET",
      headers: {
        Authorization: `Bearer ${this.token}`,
        "Content-Type": "application/json"
      },
      signal: AbortSignal.timeout(this.timeoutMs)
    };

    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    const response = await fetch(url, init);
    const rawBody = await response.text();
    let parsed: CloudflareResponse<T> | null = null;
    if (rawBody.length > 0) {
      try {
        parsed = JSON.parse(rawBody) as CloudflareResponse<T>;
      } catch {
        throw new CloudflareApiError("Cloudflare API returned non-JSON response", response.status, [], rawBody);
      }
    }

    if (parsed === null) {
      if (!response.ok) {
        throw new CloudflareApiError(
          `Cloudflare API request failed with status ${response.status}`,
          response.status,
          [],
          rawBody
        );
      }
      throw new CloudflareApiError("Cloudflare API returned an empty response", response.status, [], rawBody);
    }

    if (!response.ok || !parsed.success) {
      throw new CloudflareApiError(
        `Cloudflare API request failed with status ${response.status}`,
        response.status,
        parsed.errors ?? [],
        rawBody
      );
    }
    return parsed;
  }
}

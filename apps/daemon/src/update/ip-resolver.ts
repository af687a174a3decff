import type { IpResolver } from "./ports";

export class IpFetchError extends Error {
  public readonly endpoint: string;

  public readonly status?: number;

  constructor(message: string, endpoint: string, status?: number, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "IpFetchError";
    this.endpoint = endpoint;
    this.status = status;
  }
}

export type HttpIpResolverOptions = {
  readonly timeoutMs?: number;
  readonly maxBytes?: number;
};

// An address is at most 45 characters; anything past this is not an address.
const DEFAULT_MAX_BYTES = 64;

export const ipProviderUrl = (provider: string): string => {
  const trimmed = provider.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `https://${trimmed}`;
};

const readBounded = async (response: Response, maxBytes: number): Promise<string> => {
  if (response.body === null) {
    return "";
  }
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  try {
    while (size < maxBytes) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      chunks.push(value);
      size += value.byteLength;
    }
  } finally {
    await reader.cancel();
  }
  return Buffer.concat(chunks).subarray(0, maxBytes).toString("utf8");
};

export const createHttpIpResolver = (endpoint: string, options: HttpIpResolverOptions = {}): IpResolver => {
  const url = ipProviderUrl(endpoint);
  const timeoutMs = options.timeoutMs ?? 10_000;
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;

  const fetchIp = async (): Promise<string> => {
    let response: Response;
    try {
      response = await fetch(url, { method: "GET", signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new IpFetchError(`Failed to fetch IP from ${url}: ${reason}`, url, undefined, { cause: error });
    }
    if (!response.ok) {
      await response.body?.cancel();
      throw new IpFetchError(`Failed to fetch IP from ${url}: status ${response.status}`, url, response.status);
    }
    const text = (await readBounded(response, maxBytes)).trim();
    if (text.length === 0) {
      throw new IpFetchError(`IP provider ${url} returned an empty response`, url, response.status);
    }
    return text;
  };

  return { fetchIp };
};

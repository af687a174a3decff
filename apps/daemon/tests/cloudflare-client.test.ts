import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import { CloudflareApiError, CloudflareClient, ZoneNotFoundError } from "../src/cloudflare/client";

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal("fetch", mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

const cfResponse = <T>(result: T, status = 200): Response =>
  new Response(JSON.stringify({ success: true, errors: [], messages: [], result }), { status });

const requestedUrl = (call: number): string => String(mockFetch.mock.calls[call]?.[0]);

const requestedInit = (call: number): RequestInit => mockFetch.mock.calls[call]?.[1] ?? {};

const recordBody = {
  type: "A",
  name: "example.com",
  content: "1.2.3.4",
  ttl: 1,
  proxied: true
} as const;

describe("CloudflareClient", () => {
  const client = new CloudflareClient("test-token", { baseUrl: "https://cf.test/client/v4" });

  it("resolves a zone identifier by exact name", async () => {
    mockFetch.mockResolvedValueOnce(cfResponse([{ id: "zone-1", name: "example.com" }]));

    await expect(client.resolveZoneId("example.com")).resolves.toBe("zone-1");

    expect(requestedUrl(0)).toBe("https://cf.test/client/v4/zones?name=example.com");
    const init = requestedInit(0);
    expect(init.method).toBe("GET");
    expect(init.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json"
    });
    expect(init.body).toBeUndefined();
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("throws ZoneNotFoundError when no zone matches", async () => {
    mockFetch.mockResolvedValueOnce(cfResponse([]));

    await expect(client.resolveZoneId("missing.test")).rejects.toBeInstanceOf(ZoneNotFoundError);
  });

  it("looks up a record by type and fully-qualified name", async () => {
    mockFetch.mockResolvedValueOnce(cfResponse([{ id: "rec-1" }, { id: "rec-2" }]));

    await expect(client.findRecordId("zone-1", "A", "home.example.com")).resolves.toBe("rec-1");

    expect(requestedUrl(0)).toBe("https://cf.test/client/v4/zones/zone-1/dns_records?type=A&name=home.example.com");
  });

  it("returns null when no record matches", async () => {
    mockFetch.mockResolvedValueOnce(cfResponse([]));

    await expect(client.findRecordId("zone-1", "CNAME", "www.example.com")).resolves.toBeNull();
  });

  it("creates a record and returns its identifier", async () => {
    mockFetch.mockResolvedValueOnce(cfResponse({ id: "rec-new" }));

    await expect(client.createRecord("zone-1", recordBody)).resolves.toBe("rec-new");

    expect(requestedUrl(0)).toBe("https://cf.test/client/v4/zones/zone-1/dns_records");
    const init = requestedInit(0);
    expect(init.method).toBe("POST");
    expect(init.body).toBe(
      JSON.stringify({ type: "A", name: "example.com", content: "1.2.3.4", ttl: 1, proxied: true })
    );
  });

  it("updates a record by identifier", async () => {
    mockFetch.mockResolvedValueOnce(cfResponse({ id: "rec-1" }));

    await client.updateRecord("zone-1", "rec-1", { ...recordBody, content: "5.6.7.8" });

    expect(requestedUrl(0)).toBe("https://cf.test/client/v4/zones/zone-1/dns_records/rec-1");
    const init = requestedInit(0);
    expect(init.method).toBe("PUT");
    expect(init.body).toBe(
      JSON.stringify({ type: "A", name: "example.com", content: "5.6.7.8", ttl: 1, proxied: true })
    );
  });

  it("rejects non-2xx responses with the API errors attached", async () => {
    const body = JSON.stringify({
      success: false,
      errors: [{ code: 81057, message: "Record already exists." }],
      messages: [],
      result: null
    });
    mockFetch.mockResolvedValueOnce(new Response(body, { status: 400 }));

    const error: unknown = await client.createRecord("zone-1", recordBody).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CloudflareApiError);
    if (!(error instanceof CloudflareApiError)) {
      return;
    }
    expect(error.message).toBe("Cloudflare API request failed with status 400");
    expect(error.status).toBe(400);
    expect(error.errors).toEqual([{ code: 81057, message: "Record already exists." }]);
    expect(error.body).toBe(body);
  });

  it("rejects a 200 response whose envelope reports failure", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(JSON.stringify({ success: false, errors: [], messages: [], result: null }), { status: 200 })
    );

    await expect(client.updateRecord("zone-1", "rec-1", recordBody)).rejects.toThrow(
      "Cloudflare API request failed with status 200"
    );
  });

  it("rejects non-JSON bodies", async () => {
    mockFetch.mockResolvedValueOnce(new Response("<html>bad gateway</html>", { status: 502 }));

    await expect(client.resolveZoneId("example.com")).rejects.toThrow("Cloudflare API returned non-JSON response");
  });

  it("rejects empty bodies", async () => {
    mockFetch.mockResolvedValueOnce(new Response("", { status: 200 }));

    await expect(client.resolveZoneId("example.com")).rejects.toThrow("Cloudflare API returned an empty response");
  });

  it("propagates transport errors", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(client.findRecordId("zone-1", "A", "example.com")).rejects.toThrow("fetch failed");
  });
});

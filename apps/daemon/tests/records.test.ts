import { describe, expect, it } from "vitest";
import {
  buildRecordInput,
  isDynamicRecordType,
  recordFqdn,
  resolveContent,
  ttlFor
} from "../src/update/records";

describe("recordFqdn", () => {
  it("maps the apex marker to the bare zone name", () => {
    expect(recordFqdn("@", "example.com")).toBe("example.com");
  });

  it("prefixes other names to the zone", () => {
    expect(recordFqdn("www", "example.com")).toBe("www.example.com");
    expect(recordFqdn("a.b", "example.com")).toBe("a.b.example.com");
  });
});

describe("isDynamicRecordType", () => {
  it("treats only address records as dynamic", () => {
    expect(isDynamicRecordType("A")).toBe(true);
    expect(isDynamicRecordType("AAAA")).toBe(true);
    expect(isDynamicRecordType("CNAME")).toBe(false);
    expect(isDynamicRecordType("TXT")).toBe(false);
  });
});

describe("resolveContent", () => {
  it("uses the public IP for address records even when a target is set", () => {
    expect(resolveContent({ name: "@", type: "A", proxied: false, target: "ignored.test" }, "example.com", "1.2.3.4")).toBe(
      "1.2.3.4"
    );
    expect(resolveContent({ name: "v6", type: "AAAA", proxied: false }, "example.com", "2001:db8::1")).toBe("2001:db8::1");
  });

  it("uses the target for static records", () => {
    expect(resolveContent({ name: "www", type: "CNAME", proxied: true, target: "origin.test" }, "example.com", "1.2.3.4")).toBe(
      "origin.test"
    );
  });

  it("falls back to the zone name when the target is missing or empty", () => {
    expect(resolveContent({ name: "www", type: "CNAME", proxied: true }, "example.com", "1.2.3.4")).toBe("example.com");
    expect(resolveContent({ name: "www", type: "CNAME", proxied: true, target: "" }, "example.com", "1.2.3.4")).toBe(
      "example.com"
    );
  });
});

describe("ttlFor", () => {
  it("uses automatic TTL for proxied records and 300 seconds otherwise", () => {
    expect(ttlFor(true)).toBe(1);
    expect(ttlFor(false)).toBe(300);
  });
});

describe("buildRecordInput", () => {
  it("assembles the request body", () => {
    expect(buildRecordInput({ name: "home", type: "A", proxied: false }, "example.com", "5.6.7.8")).toEqual({
      type: "A",
      name: "home.example.com",
      content: "5.6.7.8",
      ttl: 300,
      proxied: false
    });
  });
});

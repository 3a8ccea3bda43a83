import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../core/errors";
import { DEFAULT_TRUSTED_HOSTS, TrustPolicy, hostOf, parseTrustedHosts } from "./trustPolicy";

const closed = { allowLicensed: false, acceptScanOnly: false };
const open = { allowLicensed: true, acceptScanOnly: true };

describe("TrustPolicy", () => {
  const policy = new TrustPolicy([
    { hostname: "public.example.org", requires: [] },
    { hostname: "scans.example.org", requires: ["scan_only"] },
    { hostname: "journal.example.com", requires: ["licensed"] },
    { hostname: "both.example.com", requires: ["licensed", "scan_only"] },
  ]);

  it("allows a public-domain host without any assumption", () => {
    expect(policy.isTrusted("https://public.example.org/paper.pdf", closed)).toEqual({
      allowed: true,
      reason: "trusted",
      host: "public.example.org",
      entry: { hostname: "public.example.org", requires: [] },
    });
  });

  it("matches hostnames exactly and case-insensitively", () => {
    expect(policy.isTrusted("https://PUBLIC.Example.org/a.pdf", closed).allowed).toBe(true);
    expect(policy.isTrusted("https://www.public.example.org/a.pdf", closed)).toEqual({
      allowed: false,
      reason: "untrusted-host",
      host: "www.public.example.org",
    });
    expect(policy.isTrusted("https://example.org/a.pdf", closed).allowed).toBe(false);
  });

  it("rejects malformed URLs without throwing", () => {
    expect(policy.isTrusted("not a url", closed)).toEqual({ allowed: false, reason: "unparseable-url", host: "" });
  });

  it("rejects schemes other than http and https", () => {
    expect(policy.isTrusted("ftp://public.example.org/a.pdf", closed)).toEqual({
      allowed: false,
      reason: "unsupported-scheme",
      host: "public.example.org",
    });
  });

  it("requires the run to accept licensing before fetching a licensed host", () => {
    expect(policy.isTrusted("https://journal.example.com/a.pdf", closed).reason).toBe("licensed-not-accepted");
    expect(policy.isTrusted("https://journal.example.com/a.pdf", { ...closed, allowLicensed: true }).allowed).toBe(true);
  });

  it("requires the run to accept scan-only content for scan-only hosts", () => {
    expect(policy.isTrusted("https://scans.example.org/a.tif", closed).reason).toBe("scan-only-not-accepted");
    expect(policy.isTrusted("https://scans.example.org/a.tif", { ...closed, acceptScanOnly: true }).allowed).toBe(true);
  });

  it("requires every assumption a host lists", () => {
    expect(policy.isTrusted("https://both.example.com/a.pdf", { ...closed, allowLicensed: true }).reason).toBe(
      "scan-only-not-accepted",
    );
    expect(policy.isTrusted("https://both.example.com/a.pdf", open).allowed).toBe(true);
  });

  it("treats extra hosts as public domain", () => {
    const extended = new TrustPolicy([], ["Mirror.Example.net."]);
    expect(extended.isTrusted("http://mirror.example.net/x.pdf", closed).allowed).toBe(true);
    expect(extended.size).toBe(1);
  });
});

describe("parseTrustedHosts", () => {
  it("normalizes hostnames and de-duplicates assumptions", () => {
    expect(parseTrustedHosts([{ hostname: " Archive.Example.ORG ", requires: ["scan_only", "scan_only"] }])).toEqual([
      { hostname: "archive.example.org", requires: ["scan_only"] },
    ]);
  });

  it("rejects unknown assumptions", () => {
    expect(() => parseTrustedHosts([{ hostname: "a.example.org", requires: ["paywalled"] }])).toThrow(ConfigurationError);
  });

  it("rejects a non-array value", () => {
    expect(() => parseTrustedHosts({ hostname: "a.example.org" })).toThrow("trustedHosts must be an array");
  });

  it("ships a default list with public, scan-only and licensed hosts", () => {
    const policy = new TrustPolicy(DEFAULT_TRUSTED_HOSTS);
    expect(policy.isTrusted("https://retro.seals.ch/x.pdf", closed).allowed).toBe(true);
    expect(policy.isTrusted("https://archive.org/download/x.pdf", closed).reason).toBe("scan-only-not-accepted");
    expect(policy.isTrusted("https://www.jstor.org/stable/pdf/1.pdf", closed).reason).toBe("licensed-not-accepted");
  });
});

describe("hostOf", () => {
  it("returns the lower-cased hostname or an empty string", () => {
    expect(hostOf("https://Doi.Org/10.1000/x")).toBe("doi.org");
    expect(hostOf("::")).toBe("");
  });
});

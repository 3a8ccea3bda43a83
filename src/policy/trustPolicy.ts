import { ConfigurationError } from "../core/errors";
import { Assumption, TrustedHost } from "../types";
import defaultTrustedHosts from "./trustedHosts.json";

export interface RunAssumptions {
  allowLicensed: boolean;
  acceptScanOnly: boolean;
}

export type TrustRejectionReason =
  | "unparseable-url"
  | "unsupported-scheme"
  | "untrusted-host"
  | "licensed-not-accepted"
  | "scan-only-not-accepted";

export type TrustDecision =
  | { allowed: true; reason: "trusted"; host: string; entry: TrustedHost }
  | { allowed: false; reason: TrustRejectionReason; host: string };

const ASSUMPTIONS: readonly Assumption[] = ["licensed", "scan_only"];

function isAssumption(value: unknown): value is Assumption {
  return typeof value === "string" && ASSUMPTIONS.some((assumption) => assumption === value);
}

export function normalizeHostname(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/\.$/, "");
}

/** Validates an allow-list read from JSON (built-in list or a config file). */
export function parseTrustedHosts(value: unknown): TrustedHost[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError("trustedHosts must be an array");
  }

  return value.map((item: unknown, index) => {
    if (!item || typeof item !== "object") {
      throw new ConfigurationError(`trustedHosts[${index}] must be an object`);
    }
    const hostname: unknown = Reflect.get(item, "hostname");
    const requires: unknown = Reflect.get(item, "requires") ?? [];
    if (typeof hostname !== "string" || hostname.trim() === "") {
      throw new ConfigurationError(`trustedHosts[${index}].hostname must be a non-empty string`);
    }
    if (!Array.isArray(requires) || !requires.every(isAssumption)) {
      throw new ConfigurationError(`trustedHosts[${index}].requires must list only ${ASSUMPTIONS.join(", ")}`);
    }
    return { hostname: normalizeHostname(hostname), requires: [...new Set(requires)] };
  });
}

export const DEFAULT_TRUSTED_HOSTS: readonly TrustedHost[] = parseTrustedHosts(defaultTrustedHosts);

/**
 * Exact-hostname allow-list. `example.org` does not admit `www.example.org`
 * or any other subdomain.
 */
export class TrustPolicy {
  private readonly hosts = new Map<string, TrustedHost>();

  constructor(hosts: readonly TrustedHost[], extraPublicHosts: readonly string[] = []) {
    for (const host of hosts) {
      this.hosts.set(normalizeHostname(host.hostname), host);
    }
    for (const hostname of extraPublicHosts) {
      const normalized = normalizeHostname(hostname);
      if (normalized) {
        this.hosts.set(normalized, { hostname: normalized, requires: [] });
      }
    }
  }

  get size(): number {
    return this.hosts.size;
  }

  lookup(hostname: string): TrustedHost | undefined {
    return this.hosts.get(normalizeHostname(hostname));
  }

  isTrusted(url: string, run: RunAssumptions): TrustDecision {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return { allowed: false, reason: "unparseable-url", host: "" };
    }

    const host = normalizeHostname(parsed.hostname);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { allowed: false, reason: "unsupported-scheme", host };
    }

    const entry = this.hosts.get(host);
    if (!entry) {
      return { allowed: false, reason: "untrusted-host", host };
    }
    if (entry.requires.includes("licensed") && !run.allowLicensed) {
      return { allowed: false, reason: "licensed-not-accepted", host };
    }
    if (entry.requires.includes("scan_only") && !run.acceptScanOnly) {
      return { allowed: false, reason: "scan-only-not-accepted", host };
    }
    return { allowed: true, reason: "trusted", host, entry };
  }
}

export function hostOf(url: string): string {
  try {
    return normalizeHostname(new URL(url).hostname);
  } catch {
    return "";
  }
}

import { BackoffConfig } from "../config";

/**
 * Delay before retry number `retry` (0-based): `min(cap, base * 2^retry)`
 * plus uniform jitter, never exceeding the cap.
 */
export function computeBackoffDelay(retry: number, config: BackoffConfig, random: () => number = Math.random): number {
  const exponential = Math.min(config.maxDelayMs, config.baseDelayMs * 2 ** Math.max(0, retry));
  const jitter = Math.floor(random() * config.jitterMs);
  return Math.min(config.maxDelayMs, exponential + jitter);
}

import { cancellationOf } from "../core/errors";
import { sleep } from "../core/sleep";

interface Waiter {
  resolve: () => void;
}

interface HostSlot {
  busy: boolean;
  waiters: Waiter[];
  lastStartedAt?: number;
}

/**
 * One request in flight per host. Waiters are served in arrival order and the
 * slot is handed over directly on release, so a late arrival cannot overtake
 * a queued one. Optionally spaces consecutive request starts to one host.
 */
export class HostGate {
  private readonly slots = new Map<string, HostSlot>();
  private readonly intervalMs: number;
  private readonly now: () => number;

  constructor(intervalMs = 0, now: () => number = Date.now) {
    this.intervalMs = intervalMs;
    this.now = now;
  }

  isBusy(host: string): boolean {
    return this.slots.get(host)?.busy ?? false;
  }

  waiting(host: string): number {
    return this.slots.get(host)?.waiters.length ?? 0;
  }

  async withHost<T>(host: string, signal: AbortSignal, task: () => Promise<T>): Promise<T> {
    await this.acquire(host, signal);
    try {
      await this.respectInterval(host, signal);
      return await task();
    } finally {
      this.release(host);
    }
  }

  private slotFor(host: string): HostSlot {
    let slot = this.slots.get(host);
    if (!slot) {
      slot = { busy: false, waiters: [] };
      this.slots.set(host, slot);
    }
    return slot;
  }

  private acquire(host: string, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.reject(cancellationOf(signal));
    }
    const slot = this.slotFor(host);
    if (!slot.busy) {
      slot.busy = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve: () => {
          signal.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      const onAbort = (): void => {
        const index = slot.waiters.indexOf(waiter);
        if (index >= 0) {
          slot.waiters.splice(index, 1);
        }
        reject(cancellationOf(signal));
      };
      slot.waiters.push(waiter);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  private release(host: string): void {
    const slot = this.slots.get(host);
    if (!slot) {
      return;
    }
    const next = slot.waiters.shift();
    if (next) {
      next.resolve();
      return;
    }
    slot.busy = false;
  }

  private async respectInterval(host: string, signal: AbortSignal): Promise<void> {
    const slot = this.slotFor(host);
    if (this.intervalMs > 0 && slot.lastStartedAt !== undefined) {
      const wait = slot.lastStartedAt + this.intervalMs - this.now();
      if (wait > 0) {
        await sleep(wait, signal);
      }
    }
    slot.lastStartedAt = this.now();
  }
}

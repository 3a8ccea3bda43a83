import { describe, expect, it } from "vitest";
import { CancelledError } from "../core/errors";
import { HostGate } from "./hostGate";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("HostGate", () => {
  it("runs one task per host at a time and serves waiters in arrival order", async () => {
    const gate = new HostGate();
    const signal = new AbortController().signal;
    const order: string[] = [];
    const first = deferred();

    const a = gate.withHost("a.example.org", signal, async () => {
      order.push("a1:start");
      await first.promise;
      order.push("a1:end");
    });
    const b = gate.withHost("a.example.org", signal, async () => {
      order.push("a2");
    });
    const c = gate.withHost("a.example.org", signal, async () => {
      order.push("a3");
    });
    const other = gate.withHost("b.example.org", signal, async () => {
      order.push("b1");
    });

    await other;
    expect(gate.isBusy("a.example.org")).toBe(true);
    expect(gate.waiting("a.example.org")).toBe(2);
    first.resolve();
    await Promise.all([a, b, c]);

    expect(order.filter((event) => event.startsWith("a"))).toEqual(["a1:start", "a1:end", "a2", "a3"]);
    expect(order.indexOf("b1")).toBeLessThan(order.indexOf("a1:end"));
    expect(gate.isBusy("a.example.org")).toBe(false);
  });

  it("releases the slot when the task throws", async () => {
    const gate = new HostGate();
    const signal = new AbortController().signal;

    await expect(
      gate.withHost("a.example.org", signal, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(gate.isBusy("a.example.org")).toBe(false);
    await expect(gate.withHost("a.example.org", signal, async () => "next")).resolves.toBe("next");
  });

  it("stops waiting with a CancelledError when the signal aborts", async () => {
    const gate = new HostGate();
    const controller = new AbortController();
    const hold = deferred();
    const holder = gate.withHost("a.example.org", controller.signal, () => hold.promise);

    const waiter = gate.withHost("a.example.org", controller.signal, async () => "never");
    controller.abort(new CancelledError("operator interrupt"));

    await expect(waiter).rejects.toThrow("operator interrupt");
    expect(gate.waiting("a.example.org")).toBe(0);
    hold.resolve();
    await holder;
    expect(gate.isBusy("a.example.org")).toBe(false);
  });

  it("spaces consecutive starts on one host by the configured interval", async () => {
    const gate = new HostGate(40);
    const signal = new AbortController().signal;
    const starts: number[] = [];

    await gate.withHost("a.example.org", signal, async () => {
      starts.push(Date.now());
    });
    await gate.withHost("a.example.org", signal, async () => {
      starts.push(Date.now());
    });

    expect(starts[1] - starts[0]).toBeGreaterThanOrEqual(35);
  });
});

import { describe, expect, it } from "vitest";

import { SerialQueue } from "@/lib/utils/serial";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("SerialQueue", () => {
  it("starts a task only after the previous one settles", async () => {
    const queue = new SerialQueue();
    const gate = deferred();
    const events: string[] = [];

    const first = queue.run(async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = queue.run(async () => {
      events.push("second:start");
    });

    await Promise.resolve();
    expect(queue.size).toBe(2);
    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second:start"]);
    expect(queue.size).toBe(0);
  });

  it("keeps running after a task rejects", async () => {
    const queue = new SerialQueue();

    const failing = queue.run(() => Promise.reject(new Error("boom")));
    const next = queue.run(() => Promise.resolve("next"));

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("next");
  });
});

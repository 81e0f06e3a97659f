import { afterEach, describe, expect, test, vi } from "vitest";

import { SerialQueue } from "../scheduler";

describe("SerialQueue", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("does not run tasks synchronously", async () => {
    const queue = new SerialQueue();
    const ran: string[] = [];
    queue.post(() => ran.push("a"));
    expect(ran).toEqual([]);
    expect(queue.size).toBe(1);
    await queue.drained();
    expect(ran).toEqual(["a"]);
    expect(queue.size).toBe(0);
  });

  test("runs tasks in posting order, including ones posted while draining", async () => {
    const queue = new SerialQueue();
    const ran: string[] = [];
    queue.post(() => {
      ran.push("a");
      queue.post(() => ran.push("c"));
    });
    queue.post(() => ran.push("b"));
    await queue.drained();
    expect(ran).toEqual(["a", "b", "c"]);
  });

  test("keeps going after a task throws", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const queue = new SerialQueue();
    const ran: string[] = [];
    queue.post(() => {
      throw new Error("boom");
    });
    queue.post(() => ran.push("after"));
    await queue.drained();
    expect(ran).toEqual(["after"]);
    expect(errors).toHaveBeenCalledWith("warning: [queue] task failed: boom");
  });

  test("drained resolves immediately when idle", async () => {
    const queue = new SerialQueue();
    await expect(queue.drained()).resolves.toBeUndefined();
  });
});

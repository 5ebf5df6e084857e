import { describe, expect, it, vi } from "vitest";
import { WriteBehindSaver } from "./write-behind.js";

describe("WriteBehindSaver", () => {
  it("coalesces values scheduled while a save is in flight", async () => {
    const saved: number[] = [];
    const saver = new WriteBehindSaver<number>("test", async (value) => {
      saved.push(value);
    });

    saver.schedule(1);
    saver.schedule(2);
    saver.schedule(3);
    await saver.flush();

    expect(saved).toEqual([1, 3]);
    expect(saver.completedWrites).toBe(2);
    expect(saver.isIdle).toBe(true);
  });

  it("keeps draining after a failed save and reports the failure once", async () => {
    const save = vi
      .fn<(value: string) => Promise<void>>()
      .mockRejectedValueOnce(new Error("disk full"))
      .mockResolvedValue(undefined);
    const saver = new WriteBehindSaver<string>("test", save);

    saver.schedule("a");
    await expect(saver.flush()).rejects.toThrow("disk full");

    saver.schedule("b");
    await expect(saver.flush()).resolves.toBeUndefined();
    expect(save).toHaveBeenCalledTimes(2);
    expect(save).toHaveBeenLastCalledWith("b");
  });

  it("flush resolves immediately when nothing was scheduled", async () => {
    const saver = new WriteBehindSaver<number>("test", async () => {});
    await expect(saver.flush()).resolves.toBeUndefined();
    expect(saver.completedWrites).toBe(0);
  });
});

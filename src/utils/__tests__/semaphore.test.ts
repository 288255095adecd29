import { describe, it, expect } from "vitest";
import { Semaphore } from "../semaphore.js";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("Semaphore", () => {
  it("never runs more than `permits` tasks at once", async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      [1, 2, 3, 4, 5].map(() =>
        semaphore.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await delay(10);
          active--;
        }),
      ),
    );

    expect(peak).toBe(2);
  });

  it("admits waiters in FIFO order", async () => {
    const semaphore = new Semaphore(1);
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        semaphore.run(async () => {
          order.push(n);
          await delay(1);
        }),
      ),
    );

    expect(order).toEqual([1, 2, 3]);
  });

  it("releases the permit when the task throws", async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.run(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");

    await expect(semaphore.run(async () => "next")).resolves.toBe("next");
  });

  it("needs at least one permit", () => {
    expect(() => new Semaphore(0)).toThrow("Semaphore needs at least one permit, got 0");
  });
});

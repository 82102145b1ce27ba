import { runBounded } from "../../../src/orchestrator/pool.js";

const tick = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("runBounded", () => {
  it("never exceeds the limit and visits every item", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];
    const notStarted = await runBounded([1, 2, 3, 4, 5], 2, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await tick(2);
      seen.push(item);
      active--;
    });
    expect(peak).toBe(2);
    expect(seen.sort()).toEqual([1, 2, 3, 4, 5]);
    expect(notStarted).toEqual([]);
  });

  it("runs sequentially with a limit of one", async () => {
    const order: string[] = [];
    await runBounded(["a", "b"], 1, async (item) => {
      order.push(`start ${item}`);
      await tick(1);
      order.push(`end ${item}`);
    });
    expect(order).toEqual(["start a", "end a", "start b", "end b"]);
  });

  it("stops starting items after abort and reports the rest", async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const notStarted = await runBounded(
      [0, 1, 2, 3],
      1,
      async (item) => {
        started.push(item);
        if (item === 1) controller.abort();
      },
      controller.signal,
    );
    expect(started).toEqual([0, 1]);
    expect(notStarted).toEqual([2, 3]);
  });

  it("handles an empty list", async () => {
    await expect(runBounded([], 4, async () => undefined)).resolves.toEqual([]);
  });
});

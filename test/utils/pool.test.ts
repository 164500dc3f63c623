import { describe, expect, test } from "vitest";

import { mapPool } from "@/utils/pool";

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe("mapPool", () => {
  test("結果順序與輸入相同", async () => {
    const results = await mapPool([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });
    expect(results).toEqual(["0:30", "1:10", "2:20"]);
  });

  test("同時執行數不超過 concurrency", async () => {
    let running = 0;
    let peak = 0;
    await mapPool([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    });
    expect(peak).toBe(2);
  });

  test("concurrency 為 1 時逐一執行", async () => {
    const order: string[] = [];
    await mapPool(["a", "b", "c"], 1, async (item) => {
      order.push(`start ${item}`);
      await delay(1);
      order.push(`end ${item}`);
    });
    expect(order).toEqual([
      "start a",
      "end a",
      "start b",
      "end b",
      "start c",
      "end c",
    ]);
  });

  test("空清單回傳空陣列", async () => {
    expect(await mapPool([], 4, async (x: number) => x)).toEqual([]);
  });
});

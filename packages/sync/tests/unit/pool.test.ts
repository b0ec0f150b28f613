/**
 * Unit tests for the bounded-concurrency map
 */

import { describe, it, expect } from "vitest";
import { mapWithConcurrency } from "../../src/lib/pool.js";

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("mapWithConcurrency", () => {
    it("should return results in input order", async () => {
        const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
            await delay(ms);
            return `${index}:${ms}`;
        });

        expect(results).toEqual(["0:30", "1:10", "2:20"]);
    });

    it("should never exceed the limit", async () => {
        let active = 0;
        let peak = 0;

        await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 2, async () => {
            active++;
            peak = Math.max(peak, active);
            await delay(5);
            active--;
        });

        expect(peak).toBe(2);
    });

    it("should run one at a time with a limit of one", async () => {
        const order: string[] = [];

        await mapWithConcurrency(["a", "b", "c"], 1, async (item) => {
            order.push(`start ${item}`);
            await delay(1);
            order.push(`end ${item}`);
        });

        expect(order).toEqual(["start a", "end a", "start b", "end b", "start c", "end c"]);
    });

    it("should handle an empty list", async () => {
        expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
    });
});

import { describe, expect, test } from "vitest";
import { DEFAULT_SEED, SeededRandom } from "../src/random";

function draw(random: SeededRandom, count: number, bound: number): number[] {
  return Array.from({ length: count }, () => random.nextInt(bound));
}

describe("SeededRandom", () => {
  test("repeats the stream for the same seed", () => {
    expect(draw(new SeededRandom(7), 50, 1000)).toEqual(draw(new SeededRandom(7), 50, 1000));
  });

  test("differs across seeds", () => {
    expect(draw(new SeededRandom(1), 50, 1_000_000)).not.toEqual(
      draw(new SeededRandom(2), 50, 1_000_000)
    );
  });

  test("defaults to the shared seed", () => {
    expect(new SeededRandom().seed).toBe(DEFAULT_SEED);
  });

  test("stays within bounds", () => {
    const random = new SeededRandom(3);
    for (let i = 0; i < 1000; i += 1) {
      const value = random.nextInt(10);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(10);
    }
    expect(random.nextInt(1)).toBe(0);
  });

  test("rejects a non-positive bound", () => {
    const random = new SeededRandom();

    expect(() => random.nextInt(0)).toThrow(RangeError);
    expect(() => random.nextInt(2.5)).toThrow(RangeError);
  });
});

import fc from "fast-check";
import { describe, expect, test } from "vitest";
import { OperationResult, compareDurations, speedRatioOf } from "../src/result";

describe("OperationResult", () => {
  test("derives the same verdict every time it is built from the same inputs", () => {
    const first = new OperationResult("x", 100, 500, 700);
    const second = new OperationResult("x", 100, 500, 700);

    expect(first.faster).toBe("A");
    expect(first.speedRatio).toBe(1.4);
    expect(second.faster).toBe(first.faster);
    expect(second.speedRatio).toBe(first.speedRatio);
  });

  test("keeps the measured fields", () => {
    const result = new OperationResult("prepend", 100, 1200, 300);

    expect(result.name).toBe("prepend");
    expect(result.operationCount).toBe(100);
    expect(result.durationA).toBe(1200);
    expect(result.durationB).toBe(300);
    expect(result.faster).toBe("B");
    expect(result.speedRatio).toBe(4);
  });

  test("treats equal durations as a tie", () => {
    const result = new OperationResult("x", 1, 300, 300);

    expect(result.faster).toBe("tie");
    expect(result.speedRatio).toBe(1);
  });

  test("reports a zero ratio when a duration is zero", () => {
    expect(new OperationResult("x", 1, 0, 500).speedRatio).toBe(0);
    expect(new OperationResult("x", 1, 500, 0).speedRatio).toBe(0);
    expect(new OperationResult("x", 1, 0, 0).faster).toBe("tie");
  });

  test("is frozen", () => {
    expect(Object.isFrozen(new OperationResult("x", 1, 2, 3))).toBe(true);
  });

  test("applies an absolute tolerance", () => {
    const tolerance = { kind: "absolute", thresholdNs: 1000 } as const;

    expect(new OperationResult("x", 1, 500, 700, tolerance).faster).toBe("tie");
    expect(new OperationResult("x", 1, 500, 1500, tolerance).faster).toBe("A");
    expect(new OperationResult("x", 1, 2600, 1500, tolerance).faster).toBe("B");
  });

  test("applies a relative tolerance", () => {
    const tolerance = { kind: "relative", ratio: 0.1 } as const;

    expect(compareDurations(1000, 1050, tolerance)).toBe("tie");
    expect(compareDurations(1000, 1200, tolerance)).toBe("A");
    expect(compareDurations(5000, 1000, tolerance)).toBe("B");
  });
});

describe("OperationResult - Property-Based Tests", () => {
  const duration = fc.integer({ min: 0, max: 1_000_000_000 });

  test("ratio is at least 1 for positive durations and 0 otherwise", () => {
    fc.assert(
      fc.property(duration, duration, (a, b) => {
        const ratio = speedRatioOf(a, b);
        if (a > 0 && b > 0) return ratio >= 1;
        return ratio === 0;
      })
    );
  });

  test("names the strictly faster variant unless within the threshold", () => {
    fc.assert(
      fc.property(duration, duration, fc.integer({ min: 1, max: 10_000 }), (a, b, thresholdNs) => {
        const result = new OperationResult("x", 1, a, b, { kind: "absolute", thresholdNs });
        if (Math.abs(a - b) < thresholdNs) return result.faster === "tie";
        return result.faster === (a < b ? "A" : "B");
      })
    );
  });
});

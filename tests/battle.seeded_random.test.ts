import { describe, it, expect } from "vitest";
import { SeededRandomSource } from "../src/battle/adapters/random/seededRandomSource";

describe("SeededRandomSource", () => {
  it("produces the same sequence for the same seed", () => {
    const r = new SeededRandomSource(12345);
    expect(r.next()).toBeCloseTo(0.97973, 4);
    expect(r.next()).toBeCloseTo(0.38874, 4);
    expect(r.next()).toBeCloseTo(0.66635, 4);
    expect(r.cursor).toBe(3);
  });

  it("resumes from a cursor", () => {
    const full = new SeededRandomSource(1);
    const draws = [full.next(), full.next(), full.next(), full.next()];

    const resumed = new SeededRandomSource(1, 2);
    expect(resumed.next()).toBe(draws[2]);
    expect(resumed.next()).toBe(draws[3]);
    expect(resumed.cursor).toBe(4);
  });

  it("stays within [0, 1)", () => {
    const r = new SeededRandomSource(99);
    for (let i = 0; i < 200; i++) {
      const v = r.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

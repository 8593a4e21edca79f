import { describe, expect, it } from "vitest";
import { createRandom, randomInt } from "../src/random.js";

describe("createRandom", () => {
  it("repeats its sequence for the same seed", () => {
    const a = createRandom(42);
    const b = createRandom(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it("differs between seeds", () => {
    expect(createRandom(1)()).not.toBe(createRandom(2)());
  });

  it("stays within [0, 1)", () => {
    const random = createRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe("randomInt", () => {
  it("maps onto [0, bound)", () => {
    expect(randomInt(() => 0, 256)).toBe(0);
    expect(randomInt(() => 0.999999, 256)).toBe(255);
  });
});

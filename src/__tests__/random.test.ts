import { describe, it, expect } from "vitest";
import { randomInt, seededRng, shuffle } from "../services/random";
import { firstRng } from "./helpers";

describe("seededRng", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = seededRng(42);
    const b = seededRng(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it("stays within [0, 1)", () => {
    const rng = seededRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("differs between seeds", () => {
    expect(seededRng(1)()).not.toBe(seededRng(2)());
  });
});

describe("randomInt", () => {
  it("maps the generator onto [0, max)", () => {
    expect(randomInt(() => 0, 3)).toBe(0);
    expect(randomInt(() => 0.5, 4)).toBe(2);
    expect(randomInt(() => 0.9999, 3)).toBe(2);
  });
});

describe("shuffle", () => {
  it("keeps the order when the generator always returns 0", () => {
    expect(shuffle([1, 2, 3, 4], firstRng)).toEqual([1, 2, 3, 4]);
    expect(shuffle([1, 2, 3, 4], firstRng, 2)).toEqual([1, 2]);
  });

  it("swaps from the tail when the generator is near 1", () => {
    expect(shuffle([1, 2, 3, 4], () => 0.99)).toEqual([4, 1, 2, 3]);
  });

  it("returns a permutation and leaves the input alone", () => {
    const input = ["a", "b", "c", "d", "e", "f"];
    const out = shuffle(input, seededRng(3));
    expect([...out].sort()).toEqual(input);
    expect(input).toEqual(["a", "b", "c", "d", "e", "f"]);
  });

  it("caps take at the input length", () => {
    expect(shuffle([1, 2], firstRng, 5)).toEqual([1, 2]);
    expect(shuffle([], firstRng, 3)).toEqual([]);
  });
});

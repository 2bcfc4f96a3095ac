import { describe, expect, it } from "vitest";
import { cosineSimilarity } from "../../src/modules/rag/similarity.js";

const vectors: number[][] = [
  [1, 0, 0],
  [0.5, 0.5, 0],
  [3, -1, 2],
  [-1, -1, -1],
  [0.2, 0.9, 0.4]
];

describe("modules/rag/similarity", () => {
  it("is symmetric and stays within [0, 1]", () => {
    for (const a of vectors) {
      for (const b of vectors) {
        const forward = cosineSimilarity(a, b);
        expect(forward).toBe(cosineSimilarity(b, a));
        expect(forward).toBeGreaterThanOrEqual(0);
        expect(forward).toBeLessThanOrEqual(1);
      }
    }
  });

  it("scores identical directions at 1 and orthogonal vectors at 0", () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("clamps opposite directions to 0", () => {
    expect(cosineSimilarity([1, 1], [-1, -1])).toBe(0);
  });

  it("returns 0 for zero vectors, empty vectors and dimension mismatches", () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
  });

  it("computes the usual cosine for positive vectors", () => {
    expect(cosineSimilarity([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2, 10);
  });
});

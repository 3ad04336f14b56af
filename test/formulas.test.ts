// test/formulas.test.ts
import { describe, expect, it } from "vitest";
import {
  harmonicMean,
  populationStd,
  populationVariance,
  sampleStd,
  sampleVariance,
  zScore,
} from "../src/formulas.js";

describe("formulas", () => {
  it("sample variance and std are undefined below two samples", () => {
    expect(sampleVariance(0, 1)).toBeNaN();
    expect(sampleStd(0, 0)).toBeNaN();
    expect(sampleVariance(8, 3)).toBe(4);
    expect(sampleStd(8, 3)).toBe(2);
  });

  it("population variance is NaN at one sample too", () => {
    expect(populationVariance(0, 1)).toBeNaN();
    expect(populationStd(0, 1)).toBeNaN();
    expect(populationVariance(8, 2)).toBe(4);
    expect(populationStd(8, 2)).toBe(2);
  });

  it("z-score needs a positive spread", () => {
    expect(zScore(0, 3, 1, 1)).toBeNaN();
    expect(zScore(8, 0, 1, 1)).toBeNaN();
    // std = sqrt(8 / 2) = 2
    expect(zScore(8, 3, 5, 1)).toBe(2);
  });

  it("harmonic mean is NaN for a NaN or zero reciprocal sum", () => {
    expect(harmonicMean(NaN, 2)).toBeNaN();
    expect(harmonicMean(0, 2)).toBeNaN();
    expect(harmonicMean(1.5, 3)).toBe(2);
  });
});

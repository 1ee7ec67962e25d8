import { describe, expect, it } from "vitest";

import { formatOneDecimal, mapToScore, roundHalfEven } from "../src/scoring/numeric.js";

describe("mapToScore", () => {
  it("rescales linearly inside the input range", () => {
    expect(mapToScore(5, 0, 10, 0, 100)).toBe(50);
    expect(mapToScore(-75, -80, -70, 15, 25)).toBe(20);
  });

  it("clamps values outside the input range", () => {
    expect(mapToScore(20, 0, 10, 0, 100)).toBe(100);
    expect(mapToScore(-5, 0, 10, 0, 100)).toBe(0);
  });

  it("supports descending output ranges", () => {
    expect(mapToScore(13.5, 12, 15, 28, 22)).toBe(25);
  });

  it("returns the lower output bound for a degenerate input range", () => {
    expect(mapToScore(7, 3, 3, 10, 20)).toBe(10);
  });
});

describe("roundHalfEven", () => {
  it("rounds exact halves to the even neighbour", () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(92.5)).toBe(92);
  });

  it("rounds everything else to the nearest integer", () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(45)).toBe(45);
  });
});

describe("formatOneDecimal", () => {
  it("pads whole numbers", () => {
    expect(formatOneDecimal(10)).toBe("10.0");
    expect(formatOneDecimal(2)).toBe("2.0");
  });

  it("breaks exact ties to the even digit", () => {
    expect(formatOneDecimal(4.25)).toBe("4.2");
    expect(formatOneDecimal(2.75)).toBe("2.8");
  });

  it("rounds values that only look like ties by their binary value", () => {
    expect(formatOneDecimal(2.35)).toBe("2.4");
  });
});

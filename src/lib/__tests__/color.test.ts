import { describe, expect, test } from "vitest";

import { rgbToHex, rgbToHsv } from "../color.js";

describe("rgbToHsv", () => {
  test("primaries", () => {
    expect(rgbToHsv(1, 0, 0)).toEqual({ h: 0, s: 1, v: 1 });
    const green = rgbToHsv(0, 1, 0);
    expect(green.h).toBeCloseTo(1 / 3);
    const blue = rgbToHsv(0, 0, 1);
    expect(blue.h).toBeCloseTo(2 / 3);
  });

  test("greys have no hue or saturation", () => {
    expect(rgbToHsv(0.5, 0.5, 0.5)).toEqual({ h: 0, s: 0, v: 0.5 });
    expect(rgbToHsv(0, 0, 0)).toEqual({ h: 0, s: 0, v: 0 });
  });

  test("magenta wraps into [0, 1)", () => {
    const { h, s, v } = rgbToHsv(1, 0, 1);
    expect(h).toBeCloseTo(5 / 6);
    expect(s).toBe(1);
    expect(v).toBe(1);
  });

  test("hue near red on the blue side stays below 1", () => {
    const { h } = rgbToHsv(1, 0, 0.1);
    expect(h).toBeGreaterThan(0.9);
    expect(h).toBeLessThan(1);
  });
});

describe("rgbToHex", () => {
  test("formats lowercase two-digit channels", () => {
    expect(rgbToHex([255, 0, 10])).toBe("#ff000a");
  });

  test("truncates fractions and clamps", () => {
    expect(rgbToHex([127.9, -3, 300])).toBe("#7f00ff");
  });
});

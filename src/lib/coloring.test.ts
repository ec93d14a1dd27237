// ABOUTME: Tests for color scheme functions
// ABOUTME: Validates HSL conversion and the stop-mod / first-drop schemes

import { describe, expect, it } from "vitest";
import { firstDropColor, hslToRgb, stopModColor, toCssRgb } from "./coloring";

describe("Color Scheme Tests", () => {
  describe("hslToRgb", () => {
    it("should convert primary hues", () => {
      expect(hslToRgb(0, 1, 0.5)).toEqual([255, 0, 0]);
      expect(hslToRgb(120, 1, 0.5)).toEqual([0, 255, 0]);
      expect(hslToRgb(240, 1, 0.5)).toEqual([0, 0, 255]);
    });

    it("should wrap hues outside 0-360", () => {
      expect(hslToRgb(360, 1, 0.5)).toEqual(hslToRgb(0, 1, 0.5));
      expect(hslToRgb(-120, 1, 0.5)).toEqual(hslToRgb(240, 1, 0.5));
    });

    it("should produce greys without saturation", () => {
      expect(hslToRgb(200, 0, 0.5)).toEqual([128, 128, 128]);
    });
  });

  describe("stopModColor", () => {
    it("should return black for unclassified orbits", () => {
      expect(stopModColor(null, 3)).toEqual([0, 0, 0]);
    });

    it("should spread slots around the hue circle", () => {
      expect(stopModColor(1, 3)).toEqual([242, 13, 13]);
      expect(stopModColor(2, 3)).toEqual([13, 242, 13]);
      expect(stopModColor(3, 3)).toEqual([13, 13, 242]);
    });
  });

  describe("firstDropColor", () => {
    it("should return black when the orbit never dropped", () => {
      expect(firstDropColor(null, 100)).toEqual([0, 0, 0]);
    });

    it("should loop the spectrum", () => {
      // 6 cycles over 60 lengths: every 10 lengths is a full turn
      expect(firstDropColor(10, 60)).toEqual(firstDropColor(20, 60));
      expect(firstDropColor(5, 60)).not.toEqual(firstDropColor(10, 60));
    });
  });

  describe("toCssRgb", () => {
    it("should format an rgb() string", () => {
      expect(toCssRgb([13, 242, 13])).toBe("rgb(13, 242, 13)");
    });
  });
});

export type RGB = [number, number, number];

/**
 * HSL to RGB conversion utility function.
 *
 * @param h - Hue (0-360 degrees)
 * @param s - Saturation (0-1)
 * @param l - Lightness (0-1)
 * @returns RGB tuple with values 0-255: [red, green, blue]
 */
export function hslToRgb(h: number, s: number, l: number): RGB {
  const hue = ((h % 360) + 360) % 360;
  const a = s * Math.min(l, 1 - l);

  // Channel n peaks where its phase k is 0 and bottoms out over k in [4, 8]
  const channel = (n: number): number => {
    const k = (n + hue / 30) % 12;
    return Math.round((l - a * Math.max(-1, Math.min(k - 3, 9 - k, 1))) * 255);
  };

  return [channel(0), channel(8), channel(4)];
}

/**
 * Spread wheel slots evenly around the hue circle.
 *
 * - Unclassified orbits (stopMod null): Black
 * - Slot k of n: hue (k-1)/n · 360
 *
 * @param stopMod - Wheel slot, 1-indexed
 * @param slots - Number of slots to spread over (usually the largest stopMod plotted)
 */
export function stopModColor(stopMod: number | null, slots: number): RGB {
  if (stopMod === null) return [0, 0, 0];

  const hue = ((stopMod - 1) / Math.max(slots, 1)) * 360;
  return hslToRgb(hue, 0.9, 0.5);
}

/**
 * Looping hue scheme over first drop lengths.
 * Cycles the spectrum 6 times between 0 and maxLength; no first drop is black.
 */
export function firstDropColor(firstDropLength: number | null, maxLength: number): RGB {
  if (firstDropLength === null) return [0, 0, 0];

  const normalized = firstDropLength / Math.max(maxLength, 1);
  const hue = (normalized * 6 * 360) % 360;
  return hslToRgb(hue, 0.9, 0.5);
}

export function toCssRgb([r, g, b]: RGB): string {
  return `rgb(${r}, ${g}, ${b})`;
}

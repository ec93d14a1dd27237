// ABOUTME: Projects orbit records into 3D scatter points for plotting collaborators
// ABOUTME: Nothing is rendered here; callers hand the point set to their plotting library

import { PointConfigError } from "@/orbits/errors";
import type { OrbitRecord } from "@/orbits/types";
import { stopModColor, toCssRgb } from "./coloring";

export type Point3 = [x: number, y: number, z: number];

/** Maps one record to plot coordinates. */
export type PointBuilder = (record: OrbitRecord) => Point3;

export type PointOptions = {
  /** One label per record; defaults to "n=<start>" */
  labels?: readonly string[];
  /** One CSS color per record; defaults to DEFAULT_POINT_COLOR */
  colors?: readonly string[];
};

export type PointSet = {
  points: Point3[];
  labels: string[];
  colors: string[];
};

export const DEFAULT_POINT_COLOR = "blue";

/** (start, first drop length, stop mod); missing values plot at 0 */
export const firstDropPoint: PointBuilder = (record) => [record.start, record.firstDropLength ?? 0, record.stopMod ?? 0];

/** (first drop length, stop mod, stop index); the classification address */
export const stopAddressPoint: PointBuilder = (record) => [
  record.firstDropLength ?? 0,
  record.stopMod ?? 0,
  record.stopIndex ?? 0,
];

function checkLength(kind: string, values: readonly string[] | undefined, expected: number): void {
  if (values !== undefined && values.length !== expected) {
    throw new PointConfigError(`Expected ${expected} ${kind}, got ${values.length}`);
  }
}

/**
 * Build a point set for a 3D scatter plot.
 *
 * @throws PointConfigError if labels or colors do not have one entry per record
 */
export function buildPoints(
  records: readonly OrbitRecord[],
  builder: PointBuilder,
  options: PointOptions = {},
): PointSet {
  checkLength("labels", options.labels, records.length);
  checkLength("colors", options.colors, records.length);

  return {
    points: records.map(builder),
    labels: options.labels ? [...options.labels] : records.map((r) => `n=${r.start}`),
    colors: options.colors ? [...options.colors] : records.map(() => DEFAULT_POINT_COLOR),
  };
}

/**
 * One CSS color per record, spreading stop mods across the hue circle.
 */
export function stopModColors(records: readonly OrbitRecord[]): string[] {
  const slots = records.reduce((max, r) => Math.max(max, r.stopMod ?? 0), 0);
  return records.map((r) => toCssRgb(stopModColor(r.stopMod, slots)));
}

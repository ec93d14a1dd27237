import type { Decimal } from "decimal.js";
import type { OrbitRecord } from "@/orbits/types";

/**
 * Flat row for a record store keyed by the start value.
 * Orbit lists are JSON arrays of decimal strings so values past 2^53 survive.
 */
export type OrbitRow = {
  n: number;
  firstDrop: number | null;
  firstOrbit: string | null;
  totalOrbit: string;
  stopMod: number | null;
  stopIndex: number | null;
  totalOpCounts: string;
};

function encodeOrbit(values: readonly Decimal[]): string {
  return JSON.stringify(values.map((v) => v.toFixed()));
}

export function toOrbitRow(record: OrbitRecord): OrbitRow {
  return {
    n: record.start,
    firstDrop: record.firstDropLength,
    firstOrbit: record.firstOrbit === null ? null : encodeOrbit(record.firstOrbit),
    totalOrbit: encodeOrbit(record.totalOrbit),
    stopMod: record.stopMod,
    stopIndex: record.stopIndex,
    totalOpCounts: JSON.stringify(record.totalOpCounts),
  };
}

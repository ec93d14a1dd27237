// ABOUTME: End-to-end checks of the classification scheme over real batches
// ABOUTME: Ties sequence generation, state, simulator and batch driver together

import pino from "pino";
import { describe, expect, it } from "vitest";
import { buildPoints, countMatchingIndexes, createRule, generateBatch, orbitToStd, stopAddressPoint } from "@/index";
import { allowableDroppingTimes } from "../sequences/dropping-times";

const logger = pino({ level: "silent" });

describe("classification scheme", () => {
  const records = generateBatch(1000, createRule("m3a1"), { logger });

  it("should classify every start below 1000", () => {
    expect(records).toHaveLength(999);
    expect(records.every((r) => r.stopMod !== null && r.stopIndex !== null)).toBe(true);
  });

  it("should only see first drop lengths from A122437", () => {
    const allowed = new Set([1, ...allowableDroppingTimes(200, "m3a1")]);
    expect(records.every((r) => r.firstDropLength !== null && allowed.has(r.firstDropLength))).toBe(true);
  });

  it("should give distinct (length, slot, ordinal) addresses", () => {
    // 1 is a fixed shortcut sharing (1, 1, 1) with 2
    const addresses = records.slice(1).map((r) => stopAddressPoint(r).join(":"));
    expect(new Set(addresses).size).toBe(addresses.length);
  });

  it("should keep each first orbit a prefix of its total orbit", () => {
    for (const r of records.slice(1, 200)) {
      const first = orbitToStd(r.firstOrbit ?? []);
      const prefix = orbitToStd(r.totalOrbit.slice(0, first.length));
      expect(countMatchingIndexes(first, prefix)).toBe(first.length);
    }
  });

  it("should project the batch into a point set", () => {
    const set = buildPoints(records, stopAddressPoint);
    expect(set.points).toHaveLength(999);
    expect(set.labels[26]).toBe("n=27");
    expect(set.points[26][0]).toBe(96);
  });

  it("should halve even starts in one step", () => {
    const evens = records.filter((r) => r.start % 2 === 0);
    expect(evens.every((r) => r.firstDropLength === 1 && r.stopMod === 1)).toBe(true);
    // stop index of 2k is k: every even start lands on slot 1 of length 1
    expect(evens.map((r) => r.stopIndex).slice(0, 5)).toEqual([1, 2, 3, 4, 5]);
  });
});

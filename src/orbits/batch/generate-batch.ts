import type { Logger } from "pino";
import { z } from "zod";
import { createLogger } from "@/lib/logger";
import { buildClassificationState } from "../classification/build-classification-state";
import type { ClassificationState } from "../classification/classification-state";
import { ClassificationLookupError } from "../errors";
import type { Rule } from "../rules/base";
import { simulateOrbit } from "../simulate-orbit";
import type { OrbitRecord } from "../types";
import type { BatchMonitor } from "./batch-monitor";

export type BatchOptions = {
  logger?: Logger;
  monitor?: BatchMonitor;
  /** Terms per auxiliary sequence for the default state builder */
  termCount?: number;
  /** Builds the batch's private classification state; called once per batch */
  buildState?: (rule: Rule) => ClassificationState;
};

const totalSchema = z.number().int();

/**
 * Simulate every start value in [rule.minStart, total).
 *
 * Builds one classification state up front and threads it through every
 * simulation in ascending start order. A classification lookup failure ends
 * the batch: it is logged and the records computed before the failing start
 * are returned. Any other error propagates.
 *
 * @param total - Exclusive upper bound of the start range
 * @param rule - Rule to simulate
 * @returns One record per start value, ascending
 */
export function generateBatch(total: number, rule: Rule, options: BatchOptions = {}): OrbitRecord[] {
  totalSchema.parse(total);

  const log = options.logger ? options.logger.child({ rule: rule.name }) : createLogger({ rule: rule.name });
  const buildState =
    options.buildState ?? ((r: Rule) => buildClassificationState(r.name, { termCount: options.termCount }));
  const state = buildState(rule);

  const requested = Math.max(0, total - rule.minStart);
  const monitor = options.monitor;
  const batchId = monitor?.startBatch(rule.name, requested);
  log.debug({ total, minStart: rule.minStart, requested }, "batch started");

  const results: OrbitRecord[] = [];
  let aborted = false;

  for (let n = rule.minStart; n < total; n++) {
    const started = performance.now();
    let record: OrbitRecord;
    try {
      record = simulateOrbit(n, rule, state);
    } catch (error) {
      if (!(error instanceof ClassificationLookupError)) {
        throw error;
      }
      log.error(
        { start: n, firstDropLength: error.firstDropLength, completed: results.length },
        "classification lookup failed; ending batch early",
      );
      aborted = true;
      break;
    }

    results.push(record);
    if (monitor && batchId !== undefined) {
      monitor.recordOrbit(batchId, performance.now() - started, record);
    }
  }

  if (monitor && batchId !== undefined) {
    const metrics = monitor.endBatch(batchId, { aborted });
    log.debug({ metrics }, "batch finished");
  } else {
    log.debug({ completed: results.length, aborted }, "batch finished");
  }

  return results;
}

export { generateBatch } from "./orbits/batch/generate-batch";
export type { BatchOptions } from "./orbits/batch/generate-batch";
export { BatchMonitor } from "./orbits/batch/batch-monitor";
export type { BatchMetrics } from "./orbits/batch/batch-monitor";
export { simulateOrbit } from "./orbits/simulate-orbit";
export { buildClassificationState } from "./orbits/classification/build-classification-state";
export type { BuildStateOptions } from "./orbits/classification/build-classification-state";
export { ClassificationState, LEGACY_INDEX_SEED_KEY, indexKey } from "./orbits/classification/classification-state";
export { admissibleTerms, DEFAULT_SEQUENCE_LIMIT } from "./orbits/sequences/admissible";
export { allowableDroppingTimes } from "./orbits/sequences/dropping-times";
export {
  AffineRule,
  FULLY_SUPPORTED_RULES,
  HALVE_OP_ID,
  ProbabilisticRule,
  RULE_NAMES,
  createM3A1Rule,
  createM3A3Rule,
  createM3A5Rule,
  createRule,
  isClassificationEligible,
} from "./orbits/rules";
export type { AffineRuleOptions, RandomSource, Rule, RuleName, RuleOptions } from "./orbits/rules";
export { HPInt, createHP, hpFactoryForBits, hpToStd, orbitToStd } from "./orbits/hp-int";
export {
  ClassificationLookupError,
  PointConfigError,
  RuleInvariantError,
  SequenceCapacityError,
} from "./orbits/errors";
export type { Classification, OpCounts, OpId, OrbitRecord, OrbitStatus, Step } from "./orbits/types";
export { loadConfig } from "./lib/config";
export type { Config } from "./lib/config";
export { createLogger, logger } from "./lib/logger";
export { DEFAULT_POINT_COLOR, buildPoints, firstDropPoint, stopAddressPoint, stopModColors } from "./lib/points";
export type { Point3, PointBuilder, PointOptions, PointSet } from "./lib/points";
export { firstDropColor, hslToRgb, stopModColor, toCssRgb } from "./lib/coloring";
export type { RGB } from "./lib/coloring";
export { toOrbitRow } from "./lib/orbit-row";
export type { OrbitRow } from "./lib/orbit-row";
export { countCommonElements, countMatchingIndexes } from "./lib/list-compare";

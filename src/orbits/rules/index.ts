import { z } from "zod";
import { config } from "@/lib/config";
import { createM3A1Rule, createM3A3Rule, createM3A5Rule } from "./affine-rule";
import type { RandomSource, Rule } from "./base";
import { ProbabilisticRule } from "./probabilistic-rule";

export { AffineRule, HALVE_OP_ID, createM3A1Rule, createM3A3Rule, createM3A5Rule } from "./affine-rule";
export type { AffineRuleOptions } from "./affine-rule";
export type { RandomSource, Rule } from "./base";
export { ProbabilisticRule } from "./probabilistic-rule";

export const RULE_NAMES = ["m3a1", "m3a3", "m3a5", "probabilistic"] as const;

export type RuleName = (typeof RULE_NAMES)[number];

/**
 * Rules whose auxiliary sequences are defined, and so take part in first-drop classification.
 */
export const FULLY_SUPPORTED_RULES: readonly string[] = ["m3a1"];

export function isClassificationEligible(rule: Pick<Rule, "name">): boolean {
  return FULLY_SUPPORTED_RULES.includes(rule.name);
}

const ruleOptionsSchema = z.object({
  maxIterations: z.number().int().min(1).optional(),
  p: z.number().min(0).max(1).default(0.5),
});

export type RuleOptions = z.input<typeof ruleOptionsSchema> & {
  random?: RandomSource;
};

/**
 * Build a built-in rule by name.
 *
 * @param options.maxIterations - Orbit length cap; m3a5 falls back to the configured cap
 * @param options.p - Probability of 3v+1 for the probabilistic rule (default 0.5)
 * @param options.random - Random source for the probabilistic rule
 */
export function createRule(name: RuleName, options: RuleOptions = {}): Rule {
  const { maxIterations, p } = ruleOptionsSchema.parse(options);

  switch (name) {
    case "m3a1":
      return createM3A1Rule(maxIterations);
    case "m3a3":
      return createM3A3Rule(maxIterations);
    case "m3a5":
      return createM3A5Rule(maxIterations ?? config.m3a5MaxIterations);
    case "probabilistic":
      return new ProbabilisticRule(p, options.random, maxIterations);
    default: {
      const unknown: never = name;
      throw new Error(`Unknown rule: ${String(unknown)}`);
    }
  }
}

/**
 * A first-drop length has no entry in the classification lookup.
 * Fatal for the orbit being simulated; the batch driver contains it.
 */
export class ClassificationLookupError extends Error {
  readonly firstDropLength: number;
  readonly start: number | null;

  constructor(firstDropLength: number, start: number | null = null, options?: ErrorOptions) {
    const where = start === null ? "" : ` (start ${start})`;
    super(`First drop ${firstDropLength} not in lookup${where}`, options);
    this.name = "ClassificationLookupError";
    this.firstDropLength = firstDropLength;
    this.start = start;
  }
}

/**
 * The admissible-term generator ran out of working-array space.
 */
export class SequenceCapacityError extends Error {
  readonly requestedTerms: number;
  readonly limit: number;

  constructor(requestedTerms: number, limit: number, produced: number) {
    super(`Requested ${requestedTerms} admissible terms but limit ${limit} only holds ${produced}`);
    this.name = "SequenceCapacityError";
    this.requestedTerms = requestedTerms;
    this.limit = limit;
  }
}

/**
 * A non-halting value satisfied neither isDecrease nor isIncrease.
 */
export class RuleInvariantError extends Error {
  readonly ruleName: string;
  readonly value: string;

  constructor(ruleName: string, value: string) {
    super(`Rule ${ruleName} has no transform for ${value}`);
    this.name = "RuleInvariantError";
    this.ruleName = ruleName;
    this.value = value;
  }
}

/**
 * Label or color lists passed to the point helpers do not match the records.
 */
export class PointConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PointConfigError";
  }
}

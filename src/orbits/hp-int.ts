import { Decimal } from "decimal.js";

/**
 * Decimal constructor for exact integer arithmetic on orbit values.
 *
 * 400 significant digits covers orbit peaks far beyond what a batch of
 * safe-integer starts visits. Admissible terms grow with the sequence limit
 * and get their own constructor from {@link hpFactoryForBits}.
 */
export const HPInt = Decimal.clone({
  precision: 400,
  rounding: Decimal.ROUND_DOWN,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

/**
 * Create a high-precision integer from a number, string or Decimal.
 * Accepts strings for values beyond Number.MAX_SAFE_INTEGER.
 */
export function createHP(value: Decimal.Value): Decimal {
  return new HPInt(value);
}

/**
 * Constructor factory exact for every integer below 2^bits, never narrower
 * than HPInt.
 */
export function hpFactoryForBits(bits: number): (value: Decimal.Value) => Decimal {
  const precision = Math.max(HPInt.precision, Math.ceil(bits * Math.log10(2)) + 2);
  const Ctor = HPInt.clone({ precision });
  return (value) => new Ctor(value);
}

export function isEvenHP(v: Decimal): boolean {
  return v.mod(2).isZero();
}

/**
 * Integer halving, rounding toward zero.
 * Returns: floor(v / 2) for non-negative v
 */
export function halveHP(v: Decimal): Decimal {
  return v.dividedToIntegerBy(2);
}

/**
 * Affine step shared by the 3x+a family.
 * Returns: multiplier * v + addend
 */
export function affineHP(v: Decimal, multiplier: number, addend: number): Decimal {
  return v.times(multiplier).plus(addend);
}

/**
 * Convert to a JavaScript number.
 * Used when projecting orbit values into plot coordinates; precision is lost above 2^53.
 */
export function hpToStd(v: Decimal): number {
  return v.toNumber();
}

/**
 * Convert a list of orbit values to plain numbers.
 */
export function orbitToStd(values: readonly Decimal[]): number[] {
  return values.map(hpToStd);
}

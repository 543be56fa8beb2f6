/**
 * Exact decimal arithmetic for fact values.
 *
 * A value is `coefficient / 10^scale` with a non-negative scale, so reported
 * amounts such as `-2104701000` or `0.1` compare and subtract without binary
 * floating-point error. Only the final variance ratio becomes a `number`.
 */

export interface ExactDecimal {
  readonly coefficient: bigint;
  readonly scale: number;
}

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const MAX_EXPONENT = 400;
const RATIO_PRECISION = 18;

/** Parse `[+-]digits[.digits][e±n]`. Anything else, including grouping commas, is non-numeric. */
export function parseExactDecimal(raw: string | null | undefined): ExactDecimal | null {
  if (raw === null || raw === undefined) return null;
  const match = DECIMAL_PATTERN.exec(raw.trim());
  if (!match) return null;

  const [, sign, integerDigits = '', fractionDigits = '', exponentText] = match;
  if (!integerDigits && !fractionDigits) return null;

  const exponent = exponentText ? Number(exponentText) : 0;
  if (Math.abs(exponent) > MAX_EXPONENT) return null;

  let coefficient = BigInt(`${integerDigits}${fractionDigits}` || '0');
  let scale = fractionDigits.length - exponent;
  if (scale < 0) {
    coefficient *= 10n ** BigInt(-scale);
    scale = 0;
  }
  if (sign === '-') coefficient = -coefficient;

  return normalize({ coefficient, scale });
}

/** Drop trailing zeros from the coefficient so equal values share one form. */
export function normalize(value: ExactDecimal): ExactDecimal {
  let { coefficient, scale } = value;
  if (coefficient === 0n) return { coefficient: 0n, scale: 0 };
  while (scale > 0 && coefficient % 10n === 0n) {
    coefficient /= 10n;
    scale--;
  }
  return { coefficient, scale };
}

function align(a: ExactDecimal, b: ExactDecimal): [bigint, bigint, number] {
  const scale = Math.max(a.scale, b.scale);
  return [
    a.coefficient * 10n ** BigInt(scale - a.scale),
    b.coefficient * 10n ** BigInt(scale - b.scale),
    scale,
  ];
}

export function compareDecimals(a: ExactDecimal, b: ExactDecimal): number {
  const [x, y] = align(a, b);
  return x < y ? -1 : x > y ? 1 : 0;
}

export function subtractDecimals(a: ExactDecimal, b: ExactDecimal): ExactDecimal {
  const [x, y, scale] = align(a, b);
  return normalize({ coefficient: x - y, scale });
}

export function absDecimal(value: ExactDecimal): ExactDecimal {
  return value.coefficient < 0n ? { coefficient: -value.coefficient, scale: value.scale } : value;
}

export function isZero(value: ExactDecimal): boolean {
  return value.coefficient === 0n;
}

/** `numerator / denominator` as a number, 0 when the denominator is 0. */
export function ratioOf(numerator: ExactDecimal, denominator: ExactDecimal): number {
  const [n, d] = align(numerator, denominator);
  if (d === 0n) return 0;
  const scaled = (n * 10n ** BigInt(RATIO_PRECISION)) / d;
  return Number(scaled) / 10 ** RATIO_PRECISION;
}

export function formatDecimal(value: ExactDecimal): string {
  const { coefficient, scale } = normalize(value);
  const negative = coefficient < 0n;
  const digits = (negative ? -coefficient : coefficient).toString();
  if (scale === 0) return `${negative ? '-' : ''}${digits}`;

  const padded = digits.padStart(scale + 1, '0');
  const integerPart = padded.slice(0, padded.length - scale);
  const fractionPart = padded.slice(padded.length - scale);
  return `${negative ? '-' : ''}${integerPart}.${fractionPart}`;
}

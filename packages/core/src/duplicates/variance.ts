import {
  absDecimal,
  compareDecimals,
  formatDecimal,
  parseExactDecimal,
  ratioOf,
  subtractDecimals,
  type ExactDecimal,
} from './decimal.js';
import type { NumericCoverage, Severity, SeverityThresholds, VarianceResult } from './types.js';

export const DEFAULT_THRESHOLDS: SeverityThresholds = {
  critical: 0.05,
  major: 0.01,
};

export function computeVariance(values: readonly (string | null)[]): VarianceResult {
  const numbers: ExactDecimal[] = [];
  for (const value of values) {
    const parsed = parseExactDecimal(value);
    if (parsed) numbers.push(parsed);
  }

  const numeric: NumericCoverage =
    numbers.length === 0 ? 'none' : numbers.length === values.length ? 'all' : 'partial';
  if (numbers.length === 0) {
    return { ratio: 0, amount: '0', numeric, numericCount: 0 };
  }

  let min = numbers[0];
  let max = numbers[0];
  for (const value of numbers.slice(1)) {
    if (compareDecimals(value, min) < 0) min = value;
    if (compareDecimals(value, max) > 0) max = value;
  }

  const amount = subtractDecimals(max, min);
  const absMin = absDecimal(min);
  const absMax = absDecimal(max);
  const denominator = compareDecimals(absMin, absMax) > 0 ? absMin : absMax;

  return {
    ratio: numbers.length < 2 ? 0 : ratioOf(amount, denominator),
    amount: formatDecimal(amount),
    numeric,
    numericCount: numbers.length,
    min: formatDecimal(min),
    max: formatDecimal(max),
  };
}

/** True when every raw value is the same text, nulls included. */
export function allTextuallyIdentical(values: readonly (string | null)[]): boolean {
  const first = values.length > 0 ? textOf(values[0]) : null;
  return values.every(value => textOf(value) === first);
}

/** Distinct raw values in first-seen order, compared the way REDUNDANT is. */
export function uniqueTextValues(values: readonly (string | null)[]): (string | null)[] {
  return [...new Set(values.map(textOf))];
}

/**
 * Identical text is REDUNDANT whatever it parses to. Otherwise the numeric
 * ratio picks the band, and differing text with no numeric spread is MINOR.
 */
export function classifySeverity(
  values: readonly (string | null)[],
  ratio: number,
  thresholds: SeverityThresholds = DEFAULT_THRESHOLDS,
): Severity {
  if (allTextuallyIdentical(values)) return 'REDUNDANT';
  if (ratio >= thresholds.critical) return 'CRITICAL';
  if (ratio >= thresholds.major) return 'MAJOR';
  return 'MINOR';
}

function textOf(value: string | null): string | null {
  return value === null ? null : value.trim();
}

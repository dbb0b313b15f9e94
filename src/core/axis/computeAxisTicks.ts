/**
 * Axis tick enumeration and formatting.
 *
 * Expands a `TickSpec` into concrete tick values and formats them with a
 * precision derived from the tick step.
 *
 * @module computeAxisTicks
 */

import type { TickSpec } from '../../utils/scales';

/**
 * Default maximum fraction digits for tick formatting.
 */
const DEFAULT_MAX_TICK_FRACTION_DIGITS = 8;

/**
 * Upper bound on enumerated ticks (e.g. for a step that underflows relative to the span).
 */
export const MAX_TICK_COUNT = 10_000;

/**
 * Enumerates `start, start + step, …` while the value is `<= stop`.
 *
 * Values are computed as `start + i * step`, not by repeated addition.
 *
 * @param spec - Tick progression from `computeTickRange()` / `LinearScale.ticks()`
 * @returns Tick values, or an empty array when the spec is not usable
 */
export function enumerateTicks(spec: TickSpec): number[] {
  const { start, stop, step } = spec;
  if (!Number.isFinite(start) || !Number.isFinite(stop)) return [];
  if (!Number.isFinite(step) || step <= 0) return [];

  const ticks: number[] = [];
  for (let i = 0; i < MAX_TICK_COUNT; i++) {
    const v = start + i * step;
    if (v > stop) break;
    ticks.push(v);
  }
  return ticks;
}

/**
 * Computes the maximum number of decimal places needed to display a tick step cleanly.
 *
 * Prefers "clean" decimal representations (e.g., 2.5, 0.25, 0.125) without relying on
 * magnitude alone. Accepts floating-point noise and caps the search to keep formatting
 * reasonable.
 *
 * @param tickStep - The step size between ticks
 * @param cap - Maximum number of decimal places to consider (default: 8)
 * @returns Number of decimal places (0 to cap)
 */
export function computeMaxFractionDigitsFromStep(tickStep: number, cap: number = DEFAULT_MAX_TICK_FRACTION_DIGITS): number {
  const stepAbs = Math.abs(tickStep);
  if (!Number.isFinite(stepAbs) || stepAbs === 0) return 0;

  for (let d = 0; d <= cap; d++) {
    const scaled = stepAbs * 10 ** d;
    const rounded = Math.round(scaled);
    const err = Math.abs(scaled - rounded);
    const tol = 1e-9 * Math.max(1, Math.abs(scaled));
    if (err <= tol) return d;
  }

  // Repeating decimals (e.g. 1/3): fall back to a magnitude-based digit count.
  return Math.max(0, Math.min(cap, 1 - Math.floor(Math.log10(stepAbs)) + 1));
}

/**
 * Creates an Intl.NumberFormat for tick value formatting.
 *
 * @param tickStep - The step size between ticks
 * @param locale - BCP 47 locale; the runtime default when omitted
 */
export function createTickFormatter(tickStep: number, locale?: string): Intl.NumberFormat {
  const maximumFractionDigits = computeMaxFractionDigitsFromStep(tickStep);
  return new Intl.NumberFormat(locale, { maximumFractionDigits });
}

/**
 * Formats a numeric tick value using the provided number formatter.
 *
 * - Non-finite values return null
 * - Values near zero (< 1e-12) are normalized to 0 to avoid "-0" display
 */
export function formatTickValue(nf: Intl.NumberFormat, v: number): string | null {
  if (!Number.isFinite(v)) return null;
  const normalized = Math.abs(v) < 1e-12 ? 0 : v;
  const formatted = nf.format(normalized);
  return formatted === 'NaN' ? null : formatted;
}

/**
 * LinearScale - numeric domain/range mapping and "nice" tick selection.
 *
 * Provides both a functional API (preferred) and a class-based API that wraps it.
 * Scales are immutable: build a new one whenever the domain or range changes.
 */

import { InvalidArgumentError } from '../errors';

/**
 * An ordered pair of bounds. Only the first and last elements are read,
 * so longer arrays are accepted.
 */
export type ScaleBounds = readonly [number, number] | ReadonlyArray<number>;

/**
 * How a normalized parameter `t` is mapped back onto the output range.
 *
 * - `'linear'`: `r0 + (r1 - r0) * t`.
 * - `'legacy'`: `(r0 + (r1 - r0)) * t`, i.e. `r1 * t`. The `r0` offset is dropped,
 *   matching charts drawn with that formula.
 */
export type InterpolationMode = 'linear' | 'legacy';

export type ScaleFunction = (value: number) => number;

/**
 * Arithmetic progression of tick values. Enumerate with
 * `for (v = start; v <= stop; v += step)`; `stop` is padded by half a step
 * so the last exact tick is included.
 */
export type TickSpec = Readonly<{ start: number; stop: number; step: number }>;

export interface LinearScaleOptions {
  readonly interpolation?: InterpolationMode;
}

export interface LinearScaleState {
  readonly domain: readonly [number, number];
  readonly range: readonly [number, number];
  readonly interpolation: InterpolationMode;
}

const DEFAULT_BOUNDS: readonly [number, number] = [0, 1];

const toPair = (bounds: ScaleBounds): readonly [number, number] => {
  if (bounds.length === 0) return DEFAULT_BOUNDS;
  const first = bounds[0] ?? Number.NaN;
  const last = bounds[bounds.length - 1] ?? Number.NaN;
  return [first, last];
};

/**
 * Returns `c ↦ (c - a) / (b - a)`. A zero-width input collapses every value to 0.
 */
export function uninterpolate(a: number, b: number): ScaleFunction {
  const diff = b - a;
  if (diff === 0) return () => 0;
  return (c) => (c - a) / diff;
}

export function interpolate(a: number, b: number, mode: InterpolationMode = 'linear'): ScaleFunction {
  const diff = b - a;
  if (mode === 'legacy') return (t) => (a + diff) * t;
  return (t) => a + diff * t;
}

function bilinear(
  input: readonly [number, number],
  output: readonly [number, number],
  mode: InterpolationMode
): ScaleFunction {
  const u = uninterpolate(input[0], input[1]);
  const i = interpolate(output[0], output[1], mode);
  return (value) => i(u(value));
}

/**
 * Creates an immutable linear scale state.
 *
 * No validation is performed; degenerate and non-finite bounds are handled
 * (or propagated) by the derived functions.
 *
 * @param domain - Input (data-space) bounds, default [0, 1]
 * @param range - Output (coordinate-space) bounds, default [0, 1]
 */
export function createLinearScale(
  domain: ScaleBounds = DEFAULT_BOUNDS,
  range: ScaleBounds = DEFAULT_BOUNDS,
  options: LinearScaleOptions = {}
): LinearScaleState {
  return {
    domain: toPair(domain),
    range: toPair(range),
    interpolation: options.interpolation ?? 'linear',
  };
}

/**
 * Returns the forward mapping (domain value → range value).
 *
 * Notes:
 * - No clamping (extrapolates outside the domain).
 * - If the domain span is 0, every input maps to the first range bound.
 */
export function createScaleFunction(state: LinearScaleState): ScaleFunction {
  return bilinear(state.domain, state.range, state.interpolation);
}

/**
 * Returns the inverse mapping (range value → domain value).
 *
 * If the range span is 0, every input maps to the first domain bound.
 */
export function createInvertFunction(state: LinearScaleState): ScaleFunction {
  return bilinear(state.range, state.domain, state.interpolation);
}

/**
 * Picks a tick step from {1, 2, 5, 10} × 10^k that yields roughly `count`
 * divisions of the domain extent, and rounds the extent to that step.
 *
 * A zero-width domain yields the single-tick spec `{ start: v, stop: v, step: 1 }`.
 *
 * @throws {InvalidArgumentError} If `count` is not finite or is less than 1
 */
export function computeTickRange(domain: ScaleBounds, count: number): TickSpec {
  if (!Number.isFinite(count) || count < 1) {
    throw new InvalidArgumentError(
      'count',
      `must be a finite number >= 1. Received: ${String(count)}`,
      'Request at least one tick division.'
    );
  }
  const m = Math.floor(count);

  const [d0, d1] = toPair(domain);
  const lo = d0 < d1 ? d0 : d1;
  const hi = d0 < d1 ? d1 : d0;
  const span = hi - lo;

  if (span === 0) {
    return { start: lo, stop: lo, step: 1 };
  }

  let step = 10 ** Math.floor(Math.log10(span / m));
  const err = (m / span) * step;

  // Filter ticks to get closer to the desired count.
  if (err <= 0.15) {
    step *= 10;
  } else if (err <= 0.35) {
    step *= 5;
  } else if (err <= 0.75) {
    step *= 2;
  }

  const start = Math.ceil(lo / step) * step;
  const stop = Math.floor(hi / step) * step + step * 0.5;

  return { start, stop, step };
}

/**
 * LinearScale class wrapper.
 *
 * Holds a `LinearScaleState` and exposes the functional API as methods.
 *
 * @example
 * ```typescript
 * const x = new LinearScale([0, 11], [0, 300]);
 * const toPixel = x.scale();
 * toPixel(5.5); // 150
 * ```
 */
export class LinearScale {
  private readonly _state: LinearScaleState;

  constructor(domain?: ScaleBounds, range?: ScaleBounds, options?: LinearScaleOptions) {
    this._state = createLinearScale(domain, range, options);
  }

  get domain(): readonly [number, number] {
    return this._state.domain;
  }

  get range(): readonly [number, number] {
    return this._state.range;
  }

  get interpolation(): InterpolationMode {
    return this._state.interpolation;
  }

  scale(): ScaleFunction {
    return createScaleFunction(this._state);
  }

  invert(): ScaleFunction {
    return createInvertFunction(this._state);
  }

  /**
   * @throws {InvalidArgumentError} If `count` is not finite or is less than 1
   */
  ticks(count: number): TickSpec {
    return computeTickRange(this._state.domain, count);
  }
}

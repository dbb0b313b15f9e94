/**
 * Tests for LinearScale: forward/inverse mapping, degenerate domains and nice ticks.
 */

import { describe, it, expect } from 'vitest';
import {
  LinearScale,
  computeTickRange,
  createInvertFunction,
  createLinearScale,
  createScaleFunction,
  interpolate,
  uninterpolate,
} from '../scales';
import { enumerateTicks } from '../../core/axis/computeAxisTicks';
import { InvalidArgumentError } from '../../errors';

describe('createLinearScale', () => {
  it('defaults to an identity mapping', () => {
    const state = createLinearScale();

    expect(state.domain).toEqual([0, 1]);
    expect(state.range).toEqual([0, 1]);
    expect(state.interpolation).toBe('linear');
    expect(createScaleFunction(state)(0.25)).toBe(0.25);
  });

  it('reads only the first and last bound of longer arrays', () => {
    const state = createLinearScale([0, 5, 10], [0, 50, 100]);

    expect(state.domain).toEqual([0, 10]);
    expect(state.range).toEqual([0, 100]);
  });
});

describe('uninterpolate / interpolate', () => {
  it('normalizes a value into [0, 1] over the input bounds', () => {
    const u = uninterpolate(10, 20);
    expect(u(10)).toBe(0);
    expect(u(15)).toBe(0.5);
    expect(u(20)).toBe(1);
  });

  it('collapses a zero-width input to 0', () => {
    const u = uninterpolate(5, 5);
    expect(u(5)).toBe(0);
    expect(u(-100)).toBe(0);
  });

  it('applies the range offset in linear mode', () => {
    expect(interpolate(100, 200)(0.5)).toBe(150);
  });

  it('drops the range offset in legacy mode', () => {
    expect(interpolate(100, 200, 'legacy')(0.5)).toBe(100);
    expect(interpolate(100, 200, 'legacy')(0)).toBe(0);
  });
});

describe('scale()', () => {
  it('maps the column domain onto a pixel width', () => {
    const scale = new LinearScale([0, 11], [0, 300]).scale();

    expect(scale(0)).toBe(0);
    expect(scale(11)).toBe(300);
    expect(scale(5.5)).toBeCloseTo(150, 10);
  });

  it('maps domain endpoints exactly onto range endpoints', () => {
    const scale = new LinearScale([10, 20], [100, 500]).scale();

    expect(scale(10)).toBe(100);
    expect(scale(20)).toBe(500);
    expect(scale(15)).toBe(300);
  });

  it('supports decreasing ranges', () => {
    const scale = new LinearScale([0, 10], [300, 0]).scale();

    expect(scale(0)).toBe(300);
    expect(scale(10)).toBe(0);
    expect(scale(2.5)).toBe(225);
  });

  it('supports reversed domains', () => {
    const scale = new LinearScale([10, 0], [0, 100]).scale();

    expect(scale(10)).toBe(0);
    expect(scale(0)).toBe(100);
    expect(scale(2.5)).toBe(75);
  });

  it('extrapolates outside the domain', () => {
    const scale = new LinearScale([0, 10], [0, 100]).scale();

    expect(scale(20)).toBe(200);
    expect(scale(-5)).toBe(-50);
  });

  it('is non-decreasing for increasing domain and range', () => {
    const scale = new LinearScale([100, 407], [0, 300]).scale();

    let previous = scale(100);
    for (let x = 100; x <= 407; x += 7) {
      const current = scale(x);
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });

  it('maps every input of a zero-width domain to the first range bound', () => {
    expect(new LinearScale([5, 5], [0, 100]).scale()(5)).toBe(0);
    expect(new LinearScale([5, 5], [20, 100]).scale()(42)).toBe(20);
  });

  it('propagates non-finite input', () => {
    expect(new LinearScale([0, 10], [0, 100]).scale()(Number.NaN)).toBeNaN();
    expect(new LinearScale([0, Number.NaN], [0, 100]).scale()(1)).toBeNaN();
  });

  it('reproduces the offset-dropping mapping in legacy mode', () => {
    const scale = new LinearScale([0, 10], [100, 200], { interpolation: 'legacy' }).scale();

    expect(scale(0)).toBe(0);
    expect(scale(5)).toBe(100);
    expect(scale(10)).toBe(200);
  });
});

describe('invert()', () => {
  it('maps pixels back to domain values', () => {
    const invert = new LinearScale([0, 11], [0, 300]).invert();

    expect(invert(0)).toBe(0);
    expect(invert(150)).toBe(5.5);
    expect(invert(300)).toBe(11);
  });

  it('maps every input of a zero-width range to the first domain bound', () => {
    const invert = createInvertFunction(createLinearScale([3, 10], [50, 50]));

    expect(invert(50)).toBe(3);
    expect(invert(0)).toBe(3);
  });

  it('round-trips values inside the domain', () => {
    const s = new LinearScale([100, 407], [0, 300]);
    const scale = s.scale();
    const invert = s.invert();

    for (const x of [100, 153.7, 250, 406.99, 407]) {
      expect(invert(scale(x))).toBeCloseTo(x, 6);
    }
  });

  it('round-trips with reversed domain and range', () => {
    const s = new LinearScale([50, -50], [480, 20]);
    const scale = s.scale();
    const invert = s.invert();

    for (const x of [-50, -12.5, 0, 33.3, 50]) {
      expect(invert(scale(x))).toBeCloseTo(x, 6);
    }
  });
});

describe('ticks()', () => {
  const isNiceStep = (step: number): boolean => {
    const magnitude = 10 ** Math.floor(Math.log10(step));
    const normalized = Math.round(step / magnitude);
    return [1, 2, 5, 10].includes(normalized);
  };

  it('picks a step of 20 for [0, 100] with 5 divisions', () => {
    const ticks = new LinearScale([0, 100], [0, 1]).ticks(5);

    expect(ticks).toEqual({ start: 0, stop: 110, step: 20 });
    expect(isNiceStep(ticks.step)).toBe(true);

    const values = enumerateTicks(ticks);
    expect(values).toEqual([0, 20, 40, 60, 80, 100]);
    expect(values.length).toBeGreaterThanOrEqual(5);
    expect(values.length).toBeLessThanOrEqual(10);
  });

  it('snaps [100, 407] with 5 divisions to a step of 50', () => {
    const ticks = new LinearScale([100, 407], [0, 5]).ticks(5);

    expect(ticks).toEqual({ start: 100, stop: 425, step: 50 });
    expect(ticks.start).toBeGreaterThanOrEqual(100);
    expect(ticks.stop).toBeLessThanOrEqual(407 + ticks.step * 0.5);
    expect(enumerateTicks(ticks)).toEqual([100, 150, 200, 250, 300, 350, 400]);
  });

  it('ignores domain order', () => {
    expect(computeTickRange([407, 100], 5)).toEqual(computeTickRange([100, 407], 5));
  });

  it('keeps a unit step when the raw step already matches the count', () => {
    const ticks = new LinearScale([0, 11], [0, 300]).ticks(10);

    expect(ticks).toEqual({ start: 0, stop: 11.5, step: 1 });
    expect(enumerateTicks(ticks)).toHaveLength(12);
  });

  it('multiplies the step by 10 when the raw step is far too fine', () => {
    const ticks = computeTickRange([0, 95], 1);

    expect(ticks).toEqual({ start: 0, stop: 50, step: 100 });
  });

  it('rounds negative extents outward to the step', () => {
    const ticks = computeTickRange([-50, 50], 4);

    expect(ticks).toEqual({ start: -40, stop: 50, step: 20 });
    expect(enumerateTicks(ticks)).toEqual([-40, -20, 0, 20, 40]);
  });

  it('handles sub-unit spans', () => {
    const ticks = computeTickRange([0, 1], 5);

    expect(ticks.start).toBe(0);
    expect(ticks.step).toBeCloseTo(0.2, 12);
    expect(enumerateTicks(ticks)).toHaveLength(6);
  });

  it('returns a single-tick spec for a zero-width domain', () => {
    const ticks = new LinearScale([5, 5], [0, 100]).ticks(5);

    expect(ticks).toEqual({ start: 5, stop: 5, step: 1 });
    expect(enumerateTicks(ticks)).toEqual([5]);
  });

  it('floors fractional counts', () => {
    expect(computeTickRange([100, 407], 5.9)).toEqual(computeTickRange([100, 407], 5));
  });

  it('rejects counts below 1', () => {
    const scale = new LinearScale([0, 100], [0, 1]);

    expect(() => scale.ticks(0)).toThrow(InvalidArgumentError);
    expect(() => scale.ticks(-3)).toThrow(InvalidArgumentError);
    expect(() => scale.ticks(Number.NaN)).toThrow(InvalidArgumentError);
    expect(() => scale.ticks(Number.POSITIVE_INFINITY)).toThrow(/must be a finite number >= 1/);
  });
});

describe('LinearScale class', () => {
  it('exposes its bounds and interpolation mode', () => {
    const scale = new LinearScale([1, 2], [3, 4], { interpolation: 'legacy' });

    expect(scale.domain).toEqual([1, 2]);
    expect(scale.range).toEqual([3, 4]);
    expect(scale.interpolation).toBe('legacy');
  });

  it('defaults to domain [0, 1] and range [0, 1]', () => {
    const scale = new LinearScale();

    expect(scale.domain).toEqual([0, 1]);
    expect(scale.range).toEqual([0, 1]);
    expect(scale.invert()(0.75)).toBe(0.75);
  });
});

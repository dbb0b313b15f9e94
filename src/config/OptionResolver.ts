import type { LineChartOptions } from './types';
import type { InterpolationMode } from '../utils/scales';
import { defaultOptions } from './defaults';
import { InvalidArgumentError } from '../errors';

export type ResolvedXAxisConfig = Readonly<{
  gridCount: number;
  labels: ReadonlyArray<string>;
}>;

export type ResolvedYAxisConfig = Readonly<{
  gridCount: number;
  shortenLargeNumbers: boolean;
  locale: string | undefined;
}>;

export type ResolvedLineChartOptions = Readonly<{
  xAxis: ResolvedXAxisConfig;
  yAxis: ResolvedYAxisConfig;
  innerMargin: number;
  interpolation: InterpolationMode;
}>;

const resolveGridCount = (label: string, value: number | undefined, fallback: number): number => {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value < 1) {
    throw new InvalidArgumentError(label, `must be a finite number >= 1. Received: ${String(value)}`);
  }
  return Math.floor(value);
};

/**
 * Merges user options over `defaultOptions`, validating numeric settings.
 *
 * @throws {InvalidArgumentError} If a grid count is below 1 or the inner margin is negative
 */
export function resolveOptions(userOptions: LineChartOptions = {}): ResolvedLineChartOptions {
  const innerMargin = userOptions.innerMargin ?? defaultOptions.innerMargin;
  if (!Number.isFinite(innerMargin) || innerMargin < 0) {
    throw new InvalidArgumentError(
      'innerMargin',
      `must be a finite, non-negative number. Received: ${String(innerMargin)}`
    );
  }

  return {
    xAxis: {
      gridCount: resolveGridCount('xAxis.gridCount', userOptions.xAxis?.gridCount, defaultOptions.xAxis.gridCount),
      labels: userOptions.xAxis?.labels ?? defaultOptions.xAxis.labels,
    },
    yAxis: {
      gridCount: resolveGridCount('yAxis.gridCount', userOptions.yAxis?.gridCount, defaultOptions.yAxis.gridCount),
      shortenLargeNumbers: userOptions.yAxis?.shortenLargeNumbers ?? defaultOptions.yAxis.shortenLargeNumbers,
      locale: userOptions.yAxis?.locale ?? defaultOptions.yAxis.locale,
    },
    innerMargin,
    interpolation: userOptions.interpolation ?? defaultOptions.interpolation,
  };
}

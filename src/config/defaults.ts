import type { ResolvedLineChartOptions } from './OptionResolver';

export const DEFAULT_GRID_COUNT = 10;

export const defaultOptions: ResolvedLineChartOptions = {
  xAxis: { gridCount: DEFAULT_GRID_COUNT, labels: [] },
  yAxis: { gridCount: DEFAULT_GRID_COUNT, shortenLargeNumbers: false, locale: undefined },
  innerMargin: 0,
  interpolation: 'linear',
};

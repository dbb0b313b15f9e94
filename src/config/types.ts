/**
 * Line chart configuration types.
 */

import type { InterpolationMode } from '../utils/scales';

export interface AxisConfig {
  /** Approximate number of grid divisions passed to `ticks()` (default: 10). */
  readonly gridCount?: number;
}

export interface XAxisConfig extends AxisConfig {
  /**
   * Custom column labels. Columns without an entry fall back to their index.
   */
  readonly labels?: ReadonlyArray<string>;
}

export interface YAxisConfig extends AxisConfig {
  /** Replace big numbers on the value axis with K / M suffixed labels. */
  readonly shortenLargeNumbers?: boolean;
  /** BCP 47 locale used for tick labels; the runtime default when omitted. */
  readonly locale?: string;
}

export interface LineChartOptions {
  readonly xAxis?: XAxisConfig;
  readonly yAxis?: YAxisConfig;
  /**
   * Inset, in pixels, between the plot edges and the first/last mapped
   * positions on both axes (default: 0).
   */
  readonly innerMargin?: number;
  /** Interpolation used by both axis scales (default: 'linear'). */
  readonly interpolation?: InterpolationMode;
}

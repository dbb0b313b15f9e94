/**
 * linechart-scale - linear scales, nice ticks and a headless line chart model
 */

export const version = '1.0.0';

// Linear scale - Functional API (preferred)
export type {
  ScaleBounds,
  ScaleFunction,
  InterpolationMode,
  TickSpec,
  LinearScaleOptions,
  LinearScaleState,
} from './utils/scales';
export {
  createLinearScale,
  createScaleFunction,
  createInvertFunction,
  computeTickRange,
  interpolate,
  uninterpolate,
} from './utils/scales';

// Class-based API
export { LinearScale } from './utils/scales';

// Axis ticks and labels
export {
  enumerateTicks,
  computeMaxFractionDigitsFromStep,
  createTickFormatter,
  formatTickValue,
  MAX_TICK_COUNT,
} from './core/axis/computeAxisTicks';
export type { FormatAxisValueOptions } from './core/axis/formatAxisValue';
export { formatAxisValue } from './core/axis/formatAxisValue';

// Data
export type { DataStore, SeriesData, ValueExtent } from './data/createDataStore';
export { createDataStore } from './data/createDataStore';

// Interaction
export { findColumnAtX } from './interaction/findColumnAtX';

// Headless chart
export type {
  LineChartInstance,
  AxisState,
  ChartAxes,
  PointPosition,
  AxisLabel,
  LineChartSelectPayload,
  LineChartEventName,
  LineChartEventCallback,
} from './LineChart';
export { createLineChart, LineChart } from './LineChart';

// Configuration
export type { LineChartOptions, AxisConfig, XAxisConfig, YAxisConfig } from './config/types';
export type {
  ResolvedLineChartOptions,
  ResolvedXAxisConfig,
  ResolvedYAxisConfig,
} from './config/OptionResolver';
export { resolveOptions } from './config/OptionResolver';
export { defaultOptions, DEFAULT_GRID_COUNT } from './config/defaults';

// Errors
export { LineChartError, InvalidArgumentError } from './errors';

import type { LineChartOptions } from './config/types';
import { resolveOptions } from './config/OptionResolver';
import type { ResolvedLineChartOptions } from './config/OptionResolver';
import { createDataStore } from './data/createDataStore';
import type { SeriesData } from './data/createDataStore';
import { enumerateTicks } from './core/axis/computeAxisTicks';
import { formatAxisValue } from './core/axis/formatAxisValue';
import { findColumnAtX } from './interaction/findColumnAtX';
import { LinearScale } from './utils/scales';
import type { ScaleFunction, TickSpec } from './utils/scales';
import { InvalidArgumentError } from './errors';

/**
 * Everything a renderer needs for one axis. Rebuilt whenever data or plot size changes.
 */
export type AxisState = Readonly<{
  scale: LinearScale;
  /** Domain value → plot-local pixel. */
  forward: ScaleFunction;
  /** Plot-local pixel → domain value. */
  inverse: ScaleFunction;
  ticks: TickSpec;
  tickValues: ReadonlyArray<number>;
}>;

export type ChartAxes = Readonly<{ x: AxisState; y: AxisState }>;

export type PointPosition = Readonly<{ x: number; y: number }>;

export type AxisLabel = Readonly<{ value: number; text: string }>;

export type LineChartSelectPayload = Readonly<{
  columnIndex: number;
  /** Plot-local x of the selected column. */
  x: number;
  /** One value per series, each read at the column clamped into that series. */
  yValues: ReadonlyArray<number>;
}>;

export type LineChartEventName = 'select' | 'deselect';

type LineChartEventPayloadMap = {
  select: LineChartSelectPayload;
  deselect: Readonly<{ columnIndex: number }>;
};

export type LineChartEventCallback<E extends LineChartEventName> = (payload: LineChartEventPayloadMap[E]) => void;

type ListenerRegistry = { [E in LineChartEventName]: Set<LineChartEventCallback<E>> };

export interface LineChartInstance {
  readonly options: ResolvedLineChartOptions;
  readonly disposed: boolean;
  readonly seriesCount: number;
  readonly columnCount: number;
  /** Null until at least one line and a plot size are set. */
  readonly axes: ChartAxes | null;
  readonly selectedIndex: number | null;
  addLine(data: SeriesData): number;
  clear(): void;
  setPlotSize(width: number, height: number): void;
  /**
   * Plot-local positions for a series, with y measured from the top edge.
   */
  getPointPositions(seriesIndex: number): PointPosition[];
  getXLabels(): string[];
  getYLabels(): AxisLabel[];
  /**
   * Selects the column nearest to a plot-local pixel x. Returns the column, or
   * null when there is nothing to select.
   */
  selectAtX(pixelX: number): number | null;
  selectDataPoint(columnIndex: number, options?: Readonly<{ notify?: boolean }>): void;
  deselectDataPoint(): void;
  on<E extends LineChartEventName>(event: E, callback: LineChartEventCallback<E>): void;
  off<E extends LineChartEventName>(event: E, callback: LineChartEventCallback<E>): void;
  dispose(): void;
}

const buildAxis = (scale: LinearScale, gridCount: number): AxisState => {
  const ticks = scale.ticks(gridCount);
  return {
    scale,
    forward: scale.scale(),
    inverse: scale.invert(),
    ticks,
    tickValues: enumerateTicks(ticks),
  };
};

/**
 * Creates a headless line chart: series data, per-axis scales and data-point
 * selection, with drawing left to the caller.
 */
export function createLineChart(options: LineChartOptions = {}): LineChartInstance {
  const resolved = resolveOptions(options);
  const store = createDataStore();

  let disposed = false;
  let plotSize: Readonly<{ width: number; height: number }> | null = null;
  let axes: ChartAxes | null = null;
  let selectedIndex: number | null = null;

  const listeners: ListenerRegistry = {
    select: new Set<LineChartEventCallback<'select'>>(),
    deselect: new Set<LineChartEventCallback<'deselect'>>(),
  };

  const assertNotDisposed = (): void => {
    if (disposed) throw new Error('LineChart is disposed.');
  };

  const emit = <E extends LineChartEventName>(event: E, payload: LineChartEventPayloadMap[E]): void => {
    const registry: Set<LineChartEventCallback<E>> = listeners[event];
    for (const callback of Array.from(registry)) {
      try {
        callback(payload);
      } catch (error) {
        console.error(`LineChart '${event}' listener threw:`, error);
      }
    }
  };

  const rebuildAxes = (): void => {
    const columnCount = store.columnCount;
    if (!plotSize || columnCount === 0) {
      axes = null;
      return;
    }

    const { width, height } = plotSize;
    const m = resolved.innerMargin;
    const extent = store.computeValueExtent();
    const scaleOptions = { interpolation: resolved.interpolation };

    const xScale = new LinearScale([0, columnCount - 1], [m, width - m], scaleOptions);
    const yScale = new LinearScale([extent.min, extent.max], [m, height - m], scaleOptions);

    axes = {
      x: buildAxis(xScale, resolved.xAxis.gridCount),
      y: buildAxis(yScale, resolved.yAxis.gridCount),
    };
  };

  const addLine = (data: SeriesData): number => {
    assertNotDisposed();
    const index = store.addLine(data);
    rebuildAxes();
    return index;
  };

  const clear = (): void => {
    assertNotDisposed();
    store.clear();
    selectedIndex = null;
    rebuildAxes();
  };

  const setPlotSize = (width: number, height: number): void => {
    assertNotDisposed();
    if (!Number.isFinite(width) || width < 0) {
      throw new InvalidArgumentError('width', `must be a finite, non-negative number. Received: ${String(width)}`);
    }
    if (!Number.isFinite(height) || height < 0) {
      throw new InvalidArgumentError('height', `must be a finite, non-negative number. Received: ${String(height)}`);
    }
    plotSize = { width, height };
    rebuildAxes();
  };

  const getPointPositions = (seriesIndex: number): PointPosition[] => {
    assertNotDisposed();
    const data = store.getSeries(seriesIndex);
    if (!axes || !plotSize) return [];

    const { x, y } = axes;
    const height = plotSize.height;
    return data.map((v, i) => ({ x: x.forward(i), y: height - y.forward(v) }));
  };

  const getXLabels = (): string[] => {
    assertNotDisposed();
    const custom = resolved.xAxis.labels;
    const labels: string[] = [];
    for (let i = 0; i < store.columnCount; i++) {
      labels.push(custom[i] ?? String(i));
    }
    return labels;
  };

  const getYLabels = (): AxisLabel[] => {
    assertNotDisposed();
    if (!axes) return [];
    const { step } = axes.y.ticks;
    return axes.y.tickValues.map((value) => ({
      value,
      text: formatAxisValue(value, {
        step,
        shortenLargeNumbers: resolved.yAxis.shortenLargeNumbers,
        locale: resolved.yAxis.locale,
      }),
    }));
  };

  const selectDataPoint = (columnIndex: number, selectOptions?: Readonly<{ notify?: boolean }>): void => {
    assertNotDisposed();
    if (!Number.isInteger(columnIndex)) {
      throw new InvalidArgumentError('columnIndex', `must be an integer. Received: ${String(columnIndex)}`);
    }

    selectedIndex = columnIndex;
    if (selectOptions?.notify === false) return;

    const x = axes ? axes.x.forward(columnIndex) : Number.NaN;
    emit('select', { columnIndex, x, yValues: store.getYValuesAt(columnIndex) });
  };

  const selectAtX = (pixelX: number): number | null => {
    assertNotDisposed();
    if (!axes) return null;

    const column = findColumnAtX(pixelX, axes.x.inverse, store.columnCount);
    if (column === null) return null;

    selectDataPoint(column);
    return column;
  };

  const deselectDataPoint = (): void => {
    assertNotDisposed();
    if (selectedIndex === null) return;
    const columnIndex = selectedIndex;
    selectedIndex = null;
    emit('deselect', { columnIndex });
  };

  const on = <E extends LineChartEventName>(event: E, callback: LineChartEventCallback<E>): void => {
    if (disposed) return;
    const registry: Set<LineChartEventCallback<E>> = listeners[event];
    registry.add(callback);
  };

  const off = <E extends LineChartEventName>(event: E, callback: LineChartEventCallback<E>): void => {
    const registry: Set<LineChartEventCallback<E>> = listeners[event];
    registry.delete(callback);
  };

  const dispose = (): void => {
    if (disposed) return;
    disposed = true;

    listeners.select.clear();
    listeners.deselect.clear();
    store.dispose();
    axes = null;
    plotSize = null;
    selectedIndex = null;
  };

  return {
    options: resolved,
    get disposed() {
      return disposed;
    },
    get seriesCount() {
      return store.seriesCount;
    },
    get columnCount() {
      return store.columnCount;
    },
    get axes() {
      return axes;
    },
    get selectedIndex() {
      return selectedIndex;
    },
    addLine,
    clear,
    setPlotSize,
    getPointPositions,
    getXLabels,
    getYLabels,
    selectAtX,
    selectDataPoint,
    deselectDataPoint,
    on,
    off,
    dispose,
  };
}

export const LineChart = {
  create: createLineChart,
};

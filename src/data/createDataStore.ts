import { InvalidArgumentError } from '../errors';

/**
 * A single line: y values indexed by column.
 */
export type SeriesData = ReadonlyArray<number>;

export type ValueExtent = Readonly<{ min: number; max: number }>;

export interface DataStore {
  /**
   * Appends a series and returns its index. The data is copied.
   *
   * Throws if the series is empty or contains a non-finite value.
   */
  addLine(data: SeriesData): number;
  /**
   * Removes every series.
   */
  clear(): void;
  getSeries(index: number): SeriesData;
  readonly seriesCount: number;
  /**
   * Number of columns on the x axis, taken from the first series (0 when empty).
   */
  readonly columnCount: number;
  /**
   * Returns one y value per series for the given column. The column is clamped
   * into each series' own index range, so short series repeat their last value.
   */
  getYValuesAt(columnIndex: number): number[];
  /**
   * Value-axis extent across all series. Always includes 0 and reaches at least 1.
   */
  computeValueExtent(): ValueExtent;
  dispose(): void;
}

const clampIndex = (index: number, length: number): number => {
  if (index < 0) return 0;
  if (index > length - 1) return length - 1;
  return index;
};

export function createDataStore(): DataStore {
  const series: SeriesData[] = [];
  let disposed = false;

  const assertNotDisposed = (): void => {
    if (disposed) {
      throw new Error('DataStore is disposed.');
    }
  };

  const addLine = (data: SeriesData): number => {
    assertNotDisposed();

    if (data.length === 0) {
      throw new InvalidArgumentError('data', 'must contain at least one value.');
    }
    for (let i = 0; i < data.length; i++) {
      const v = data[i];
      if (v === undefined || !Number.isFinite(v)) {
        throw new InvalidArgumentError('data', `must contain finite numbers. Received: ${String(v)} at index ${i}`);
      }
    }

    series.push(Object.freeze(data.slice()));
    return series.length - 1;
  };

  const clear = (): void => {
    assertNotDisposed();
    series.length = 0;
  };

  const getSeries = (index: number): SeriesData => {
    assertNotDisposed();
    const entry = series[index];
    if (!entry) {
      throw new Error(`Series ${index} has no data. Call addLine(data) first.`);
    }
    return entry;
  };

  const getYValuesAt = (columnIndex: number): number[] => {
    assertNotDisposed();
    const result: number[] = [];
    for (const data of series) {
      const v = data[clampIndex(Math.round(columnIndex), data.length)];
      if (v !== undefined) result.push(v);
    }
    return result;
  };

  const computeValueExtent = (): ValueExtent => {
    assertNotDisposed();
    let min = 0;
    let max = 1;
    for (const data of series) {
      for (const v of data) {
        if (v < min) min = v;
        if (v > max) max = v;
      }
    }
    return { min, max };
  };

  const dispose = (): void => {
    if (disposed) return;
    disposed = true;
    series.length = 0;
  };

  return {
    addLine,
    clear,
    getSeries,
    get seriesCount() {
      return series.length;
    },
    get columnCount() {
      return series[0]?.length ?? 0;
    },
    getYValuesAt,
    computeValueExtent,
    dispose,
  };
}

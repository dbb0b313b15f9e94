import { describe, it, expect } from 'vitest';
import { createDataStore } from '../createDataStore';
import { InvalidArgumentError } from '../../errors';

describe('createDataStore', () => {
  it('assigns sequential series indices', () => {
    const store = createDataStore();

    expect(store.addLine([1, 2, 3])).toBe(0);
    expect(store.addLine([4, 5])).toBe(1);
    expect(store.seriesCount).toBe(2);
  });

  it('takes the column count from the first series', () => {
    const store = createDataStore();
    expect(store.columnCount).toBe(0);

    store.addLine([1, 2, 3]);
    store.addLine([4, 5, 6, 7, 8]);

    expect(store.columnCount).toBe(3);
  });

  it('copies series data on insert', () => {
    const store = createDataStore();
    const data = [1, 2, 3];
    store.addLine(data);
    data[0] = 99;

    expect(store.getSeries(0)).toEqual([1, 2, 3]);
  });

  it('rejects empty and non-finite series', () => {
    const store = createDataStore();

    expect(() => store.addLine([])).toThrow(InvalidArgumentError);
    expect(() => store.addLine([1, Number.NaN])).toThrow('Received: NaN at index 1');
    expect(store.seriesCount).toBe(0);
  });

  it('throws for unknown series', () => {
    const store = createDataStore();

    expect(() => store.getSeries(3)).toThrow('Series 3 has no data. Call addLine(data) first.');
  });

  describe('getYValuesAt', () => {
    it('reads one value per series, clamping the column into each series', () => {
      const store = createDataStore();
      store.addLine([1, 2, 3]);
      store.addLine([10, 20]);

      expect(store.getYValuesAt(1)).toEqual([2, 20]);
      expect(store.getYValuesAt(2)).toEqual([3, 20]);
      expect(store.getYValuesAt(-1)).toEqual([1, 10]);
      expect(store.getYValuesAt(5)).toEqual([3, 20]);
    });

    it('returns an empty array without series', () => {
      expect(createDataStore().getYValuesAt(0)).toEqual([]);
    });
  });

  describe('computeValueExtent', () => {
    it('defaults to [0, 1] without data', () => {
      expect(createDataStore().computeValueExtent()).toEqual({ min: 0, max: 1 });
    });

    it('always includes the zero baseline', () => {
      const store = createDataStore();
      store.addLine([100, 407, 250]);

      expect(store.computeValueExtent()).toEqual({ min: 0, max: 407 });
    });

    it('reaches at least 1 and extends below zero', () => {
      const store = createDataStore();
      store.addLine([-5, 0.5]);

      expect(store.computeValueExtent()).toEqual({ min: -5, max: 1 });
    });

    it('aggregates across series', () => {
      const store = createDataStore();
      store.addLine([3, 8]);
      store.addLine([-2, 12]);

      expect(store.computeValueExtent()).toEqual({ min: -2, max: 12 });
    });
  });

  it('clear removes every series', () => {
    const store = createDataStore();
    store.addLine([1, 2]);
    store.clear();

    expect(store.seriesCount).toBe(0);
    expect(store.columnCount).toBe(0);
  });

  it('throws after dispose', () => {
    const store = createDataStore();
    store.dispose();

    expect(() => store.addLine([1])).toThrow('DataStore is disposed.');
  });
});

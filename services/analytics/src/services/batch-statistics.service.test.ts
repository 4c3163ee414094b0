import { describe, it, expect, vi } from 'vitest';

vi.mock('@stockpulse/config', () => ({
  config: {},
  createLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { BatchStatisticsService } from './batch-statistics.service.js';
import { TimeSeriesExtractor } from './time-series.js';
import { resolveEngineOptions } from '../lib/options.js';
import { MemoryAnalyticsStore } from '../test/memory-store.js';

const NOW = new Date('2025-03-31T12:00:00.000Z');

function setup() {
  const store = new MemoryAnalyticsStore();
  const options = resolveEngineOptions({ now: () => NOW });
  const service = new BatchStatisticsService(store, new TimeSeriesExtractor(store, options), options);
  return { store, service };
}

describe('BatchStatisticsService', () => {
  describe('recalculateAllStatistics', () => {
    it('marks items without records as NO_DATA and writes once', async () => {
      const { store, service } = setup();
      for (let i = 0; i < 100; i++) {
        const id = `item-${String(i).padStart(3, '0')}`;
        store.addItem({ id, name: `Item ${i}`, currentQuantity: '50' });
        if (i >= 30) store.addSeries(id, '2025-03-25', [i % 7, 3, 4]);
      }
      const readSpy = vi.spyOn(store, 'getConsumptionRecords');

      const summary = await service.recalculateAllStatistics();

      expect(summary).toMatchObject({
        totalItems: 100,
        updated: 70,
        noData: 30,
        failed: 0,
        errors: [],
        windowDays: 30,
        startDate: '2025-03-01',
        endDate: '2025-03-31',
        timestamp: NOW,
      });
      expect(summary.updated + summary.noData + summary.failed).toBe(100);
      expect(readSpy).toHaveBeenCalledTimes(1);
      expect(store.batchWrites).toBe(1);

      const snapshots = [...store.snapshots.values()];
      expect(snapshots).toHaveLength(100);
      expect(snapshots.filter((s) => s.volatilityClassification === 'NO_DATA')).toHaveLength(30);
      expect(store.snapshots.get('item-000')?.consumptionPattern).toBe('NO_DATA');
    });

    it('classifies with the 5-tier table', async () => {
      const { store, service } = setup();
      store
        .addItem({ id: 'x', name: 'Gloves', currentQuantity: '100' })
        .addSeries('x', '2025-03-03', [10, 12, 11, 13, 12]);

      await service.recalculateAllStatistics();

      expect(store.snapshots.get('x')).toMatchObject({
        meanDailyConsumption: '11.6000',
        volatilityClassification: 'VERY_LOW',
        coverageDays: 9,
      });
    });

    it('records a failing item and finishes the batch', async () => {
      const { store, service } = setup();
      store
        .addItem({ id: 'bad', name: 'Corrupt', currentQuantity: 'n/a' })
        .addItem({ id: 'good', name: 'Fine', currentQuantity: '10' })
        .addSeries('bad', '2025-03-25', [1, 2, 3])
        .addSeries('good', '2025-03-25', [1, 2, 3]);

      const summary = await service.recalculateAllStatistics();

      expect(summary.updated).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.errors).toEqual([{ itemId: 'bad', message: 'Invalid decimal value: "n/a"' }]);
      expect(store.snapshots.has('good')).toBe(true);
      expect(store.snapshots.has('bad')).toBe(false);
    });
  });

  describe('recalculateStatisticsForItems', () => {
    it('restricts the read to the requested items and reports unknown ids', async () => {
      const { store, service } = setup();
      store
        .addItem({ id: 'a', name: 'A' })
        .addItem({ id: 'b', name: 'B' })
        .addSeries('a', '2025-03-25', [1, 2, 3])
        .addSeries('b', '2025-03-25', [4, 5, 6]);
      const readSpy = vi.spyOn(store, 'getConsumptionRecords');

      const summary = await service.recalculateStatisticsForItems(['a', 'ghost', 'a'], 60);

      expect(readSpy).toHaveBeenCalledWith('2025-01-30', '2025-03-31', ['a', 'ghost']);
      expect(summary.totalItems).toBe(2);
      expect(summary.updated).toBe(1);
      expect(summary.errors).toEqual([{ itemId: 'ghost', message: 'Item not found: ghost' }]);
      expect([...store.snapshots.keys()]).toEqual(['a']);
    });
  });

  describe('recalculateStatisticsForCategory', () => {
    it('recalculates the items of one category', async () => {
      const { store, service } = setup();
      store
        .addCategory('c1', 'Office')
        .addItem({ id: 'a', name: 'A', categoryId: 'c1' })
        .addItem({ id: 'b', name: 'B' })
        .addSeries('a', '2025-03-25', [1, 2, 3]);

      const summary = await service.recalculateStatisticsForCategory('c1');

      expect(summary.totalItems).toBe(1);
      expect([...store.snapshots.keys()]).toEqual(['a']);
    });

    it('rejects an unknown category', async () => {
      const { service } = setup();

      await expect(service.recalculateStatisticsForCategory('none')).rejects.toThrow(
        'Category not found: none',
      );
    });
  });
});

import { describe, it, expect, vi } from 'vitest';

const { logMock } = vi.hoisted(() => ({
  logMock: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

vi.mock('@stockpulse/config', () => ({
  config: {},
  createLogger: () => logMock,
}));

import { ConsumptionAnalyticsEngine } from './engine.js';
import { MemoryAnalyticsStore } from './test/memory-store.js';

const NOW = new Date('2025-03-31T12:00:00.000Z');

function seed() {
  return new MemoryAnalyticsStore()
    .addItem({ id: 'x', name: 'Printer paper', currentQuantity: '100' })
    .addItem({ id: 'y', name: 'Toner', currentQuantity: '5', reorderLevel: '10' })
    .addItem({ id: 'z', name: 'Staples' })
    .addSeries('x', '2025-03-20', [10, 20, 30, 40, 50])
    .addSeries('y', '2025-03-20', [50, 40, 30, 20, 10])
    .addSeries('z', '2025-03-20', [1, 3, 2, 5, 4]);
}

describe('ConsumptionAnalyticsEngine', () => {
  it('applies option overrides over the defaults', () => {
    const engine = new ConsumptionAnalyticsEngine(new MemoryAnalyticsStore(), { minDataPoints: 3 });

    expect(engine.options).toMatchObject({
      minDataPoints: 3,
      significanceThreshold: 0.3,
      correlationWindowDays: 90,
      statisticsWindowDays: 30,
    });
  });

  it('combines statistics, correlations and recommendations for one item', async () => {
    const engine = new ConsumptionAnalyticsEngine(seed(), { now: () => NOW });

    const analytics = await engine.getComprehensiveItemAnalytics('x');

    expect(analytics.itemId).toBe('x');
    expect(analytics.analysisDate).toBe('2025-03-31');
    expect(analytics.statistics).toMatchObject({ mean: '30.0000', trend: 'INCREASING' });
    expect(analytics.correlations.totalCorrelations).toBe(2);
    expect(analytics.recommendations.map((r) => [r.itemId, r.coefficient, r.needsReorder])).toEqual([
      ['y', '-1.0000', true],
      ['z', '0.8000', false],
    ]);
  });

  it('reports no data for a category without records in the window', async () => {
    const store = new MemoryAnalyticsStore()
      .addCategory('c', 'Cleaning')
      .addItem({ id: 'mop', name: 'Mop heads', categoryId: 'c' })
      .addRecord('mop', '2024-12-01', '4');
    const engine = new ConsumptionAnalyticsEngine(store, { now: () => NOW });

    expect(await engine.computeCategoryStatistics('c')).toEqual({ error: 'no data' });
  });

  it('publishes a refresh after an item statistics update', async () => {
    const publisher = { publish: vi.fn().mockResolvedValue(undefined) };
    const store = seed();
    const engine = new ConsumptionAnalyticsEngine(store, { now: () => NOW }, publisher);

    const snapshot = await engine.updateItemStatistics('x');

    expect(snapshot.meanDailyConsumption).toBe('30.0000');
    expect(store.snapshots.get('x')).toEqual(snapshot);
    expect(publisher.publish).toHaveBeenCalledWith('x', 'statistics_updated');
  });

  describe('onConsumptionRecorded', () => {
    it('hands the refresh to the publisher', () => {
      const publisher = { publish: vi.fn().mockResolvedValue(undefined) };
      const engine = new ConsumptionAnalyticsEngine(seed(), { now: () => NOW }, publisher);

      engine.onConsumptionRecorded('y');

      expect(publisher.publish).toHaveBeenCalledWith('y', 'consumption_recorded');
    });

    it('logs a publish failure without throwing', async () => {
      const publisher = { publish: vi.fn().mockRejectedValue(new Error('redis unavailable')) };
      const engine = new ConsumptionAnalyticsEngine(seed(), { now: () => NOW }, publisher);

      expect(() => engine.onConsumptionRecorded('y')).not.toThrow();

      await vi.waitFor(() => {
        expect(logMock.error).toHaveBeenCalledWith(
          { itemId: 'y', error: 'redis unavailable' },
          'Failed to publish correlation refresh',
        );
      });
    });

    it('stores one edge when both items of a pair are recorded together', async () => {
      const store = new MemoryAnalyticsStore()
        .addItem({ id: 'x', name: 'Pens' })
        .addItem({ id: 'y', name: 'Refills' })
        .addSeries('x', '2025-03-20', [10, 20, 30, 40, 50])
        .addSeries('y', '2025-03-20', [10, 20, 30, 40, 50]);
      const saveSpy = vi.spyOn(store, 'saveCorrelationEdge');
      const engine = new ConsumptionAnalyticsEngine(store, { now: () => NOW });

      engine.onConsumptionRecorded('x');
      engine.onConsumptionRecorded('y');

      await vi.waitFor(() => {
        expect(saveSpy).toHaveBeenCalledTimes(2);
      });
      expect([...store.edges.values()].map((edge) => `${edge.item1Id}-${edge.item2Id}`)).toEqual([
        'x-y',
      ]);
    });

    it('refreshes in-process when no publisher is configured', async () => {
      const store = seed();
      const engine = new ConsumptionAnalyticsEngine(store, { now: () => NOW });

      engine.onConsumptionRecorded('z');

      await vi.waitFor(() => {
        expect(store.edges.size).toBe(2);
      });
    });
  });
});

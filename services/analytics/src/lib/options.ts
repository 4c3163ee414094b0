import type { Config } from '@stockpulse/config';

// ─── Engine Options ───────────────────────────────────────────────────
// Every tunable the engine reads. Passed in explicitly so nothing inside
// the engine touches ambient configuration or the wall clock.
export interface AnalyticsEngineOptions {
  /** Minimum raw observations per item (and union dates per pair) for a correlation */
  minDataPoints: number;
  /** |r| at or above which an edge counts as significant */
  significanceThreshold: number;
  correlationWindowDays: number;
  statisticsWindowDays: number;
  now: () => Date;
}

export const DEFAULT_ENGINE_OPTIONS: AnalyticsEngineOptions = {
  minDataPoints: 5,
  significanceThreshold: 0.3,
  correlationWindowDays: 90,
  statisticsWindowDays: 30,
  now: () => new Date(),
};

export function resolveEngineOptions(
  overrides: Partial<AnalyticsEngineOptions> = {},
): AnalyticsEngineOptions {
  return { ...DEFAULT_ENGINE_OPTIONS, ...overrides };
}

export function engineOptionsFromConfig(cfg: Config): AnalyticsEngineOptions {
  return resolveEngineOptions({
    minDataPoints: cfg.ANALYTICS_MIN_DATA_POINTS,
    significanceThreshold: cfg.ANALYTICS_SIGNIFICANCE_THRESHOLD,
    correlationWindowDays: cfg.ANALYTICS_CORRELATION_WINDOW_DAYS,
    statisticsWindowDays: cfg.ANALYTICS_STATISTICS_WINDOW_DAYS,
  });
}

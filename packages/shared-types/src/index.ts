// ─── Shared Types for StockPulse ───────────────────────────────────────
// Types used across multiple packages. Import from @stockpulse/shared-types.

// ─── Classification Types ─────────────────────────────────────────────
export type VolatilityClass =
  | 'VERY_LOW'
  | 'LOW'
  | 'MEDIUM'
  | 'HIGH'
  | 'VERY_HIGH'
  | 'NO_DATA'
  | 'UNKNOWN';

/** Which threshold table classified a CV value. */
export type VolatilityScheme = 'five_tier' | 'three_tier';

export type TrendDirection = 'INCREASING' | 'DECREASING' | 'STABLE' | 'INSUFFICIENT_DATA';

export type ConsumptionPattern = 'REGULAR' | 'IRREGULAR' | 'SPORADIC' | 'NO_DATA';

export type CorrelationType =
  | 'STRONG_POSITIVE'
  | 'MODERATE_POSITIVE'
  | 'WEAK_POSITIVE'
  | 'NO_CORRELATION'
  | 'WEAK_NEGATIVE'
  | 'MODERATE_NEGATIVE'
  | 'STRONG_NEGATIVE';

export const WEEKDAY_NAMES = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];

// ─── Item Statistics Snapshot ─────────────────────────────────────────
// Derived fields written back onto the item record.
// Decimal quantities are canonical strings with 4 fractional digits,
// matching the numeric(…, 4) columns they are stored in.
export interface ItemStatisticsSnapshot {
  meanDailyConsumption: string;
  standardDeviation: string;
  coefficientOfVariation: string;
  volatilityClassification: VolatilityClass;
  trend: TrendDirection;
  consumptionPattern: ConsumptionPattern;
  forecastNextPeriod: string;
  coverageDays: number;
  /** ISO date (YYYY-MM-DD), or null when coverage is zero */
  expectedStockoutDate: string | null;
  lastUpdated: Date;
}

// ─── Correlation Edge ─────────────────────────────────────────────────
export interface CorrelationEdge {
  /** Undefined until the edge has been persisted */
  id?: string;
  item1Id: string;
  item2Id: string;
  /** Decimal string in [-1, 1], 4 fractional digits */
  coefficient: string;
  correlationType: CorrelationType;
  dataPoints: number;
  /** Percent, e.g. "95.00" */
  confidenceLevel: string;
  categoryId: string | null;
  isActive: boolean;
  lastCalculated: Date;
}

// ─── Bulk Operation Errors ────────────────────────────────────────────
export interface ItemFailure {
  itemId: string;
  message: string;
}

export interface PairFailure {
  item1Id: string;
  item2Id: string;
  message: string;
}

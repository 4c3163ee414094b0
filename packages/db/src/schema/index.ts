// ─── Schema Barrel Export ─────────────────────────────────────────────
// All Drizzle schema definitions exported from here.
// This is the single import point for migrations and the Drizzle client.

export * from './catalog.js';
export * from './consumption.js';
export * from './analytics.js';

import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: [
    './src/schema/catalog.ts',
    './src/schema/consumption.ts',
    './src/schema/analytics.ts',
  ],
  out: './drizzle',
  dialect: 'postgresql',
  schemaFilter: ['inventory', 'analytics'],
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgresql://localhost:5432/stockpulse',
  },
  verbose: true,
  strict: true,
});

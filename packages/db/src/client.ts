import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

// ─── Connection Pool ──────────────────────────────────────────────────
const connectionString = process.env.DATABASE_URL;
if (!connectionString) {
  throw new Error('DATABASE_URL environment variable is required');
}

// Tables live in the inventory and analytics Postgres schemas.
const SEARCH_PATH = 'inventory,analytics,public';

const queryClient = postgres(connectionString, {
  max: 10,
  idle_timeout: 20,
  connect_timeout: 10,
  connection: { search_path: SEARCH_PATH },
});

export const db = drizzle(queryClient, { schema });

export type Database = typeof db;

// ─── Shutdown ─────────────────────────────────────────────────────────
export async function closeDb(): Promise<void> {
  await queryClient.end({ timeout: 5 });
}

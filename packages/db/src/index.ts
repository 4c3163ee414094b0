export { db, closeDb } from './client.js';
export type { Database } from './client.js';

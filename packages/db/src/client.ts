import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export type Database = ReturnType<typeof createDatabase>;

export function createDatabase(connectionString: string) {
  const client = postgres(connectionString);
  return drizzle({ client, schema });
}

/**
 * Close the underlying postgres.js pool so the process can exit.
 */
export async function closeDatabase(db: Database): Promise<void> {
  await db.$client.end();
}

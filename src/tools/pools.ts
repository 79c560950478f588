import pg from 'pg';

const { Pool } = pg;

/**
 * One pool per database, shared across all modules and keyed by
 * connection string.
 */
const pools = new Map<string, pg.Pool>();

/**
 * Gets or creates the connection pool for `connectionString`.
 */
export function getPool(connectionString: string): pg.Pool {
  let pool = pools.get(connectionString);
  if (!pool) {
    pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
    });
    pools.set(connectionString, pool);
  }
  return pool;
}

/**
 * Closes all connection pools.
 * Should be called during application shutdown to clean up resources.
 *
 * @example
 * ```typescript
 * process.on('SIGINT', async () => {
 *   await closeAllPools();
 *   process.exit(0);
 * });
 * ```
 */
export async function closeAllPools(): Promise<void> {
  const open = Array.from(pools.values());
  pools.clear();
  await Promise.all(open.map(pool => pool.end()));
}

#!/usr/bin/env tsx
/**
 * Prints the table definitions the agent works with: the field
 * configuration when present, otherwise the introspected database schema.
 */

import { loadConfig } from '../src/config.js';
import { loadRegistry } from '../src/app.js';
import { PgDatabase } from '../src/tools/db.js';
import { closeAllPools, getPool } from '../src/tools/pools.js';

async function showSchema() {
  const config = loadConfig();
  const database = new PgDatabase(getPool(config.databaseUrl), {
    statementTimeoutMs: config.statementTimeoutMs,
  });

  try {
    const registry = await loadRegistry(config, database);
    console.log('🔍 Schema\n');
    console.log(registry.formatForPrompt(process.argv[2]));

    for (const table of registry.tableNames()) {
      const schema = registry.getSchema(table);
      console.log(`📋 ${table}: required ${registry.requiredFields(table).join(', ') || '(none)'}`);
      if (schema.aliases.length > 0) {
        console.log(`   aliases: ${schema.aliases.join(', ')}`);
      }
    }
  } finally {
    await closeAllPools();
  }
}

showSchema().catch((error) => {
  console.error('❌ Error:', error);
  process.exit(1);
});

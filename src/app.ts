import { existsSync } from 'fs';
import type { Config, DatabaseClient, RunLogger, TextGenerator, ThreadStore } from './types.js';
import { Orchestrator } from './agent/orchestrator.js';
import { QuerySynthesizer } from './agent/sqlWriter.js';
import { SqlExecutor } from './agent/executor.js';
import { SchemaRegistry } from './tools/schema.js';
import { ConversationContextStore } from './tools/contextStore.js';
import { InMemoryThreadStore } from './tools/threadStore.js';
import { ControlDb, PgThreadStore, poolRunner } from './tools/controlDb.js';
import { PgDatabase } from './tools/db.js';
import { GeminiTextGenerator } from './tools/gemini.js';
import { getPool } from './tools/pools.js';
import { describeError } from './utils/errors.js';

export interface Agent {
  orchestrator: Orchestrator;
  registry: SchemaRegistry;
  contextStore: ConversationContextStore;
  controlDb: ControlDb | null;
}

export interface AgentParts {
  generator: TextGenerator;
  database: DatabaseClient;
  registry: SchemaRegistry;
  threadStore?: ThreadStore;
  runLogger?: RunLogger;
}

/**
 * Wires the pipeline from explicit collaborators.
 */
export function assembleAgent(config: Config, parts: AgentParts): Omit<Agent, 'controlDb'> {
  const contextStore = new ConversationContextStore({
    recentQueriesCap: config.recentQueriesCap,
    historyCap: config.historyCap,
  });
  const synthesizer = new QuerySynthesizer(parts.generator, parts.registry, contextStore, {
    timeoutMs: config.llmTimeoutMs,
  });
  const executor = new SqlExecutor(parts.database, {
    timeoutMs: config.statementTimeoutMs,
    maxRows: config.maxRows,
  });

  const orchestrator = new Orchestrator(
    {
      registry: parts.registry,
      synthesizer,
      executor,
      threadStore: parts.threadStore ?? new InMemoryThreadStore(),
      contextStore,
      runLogger: parts.runLogger,
    },
    {
      duplicateCheck: config.duplicateCheck,
      historyCap: config.historyCap,
      shortReplyMaxWords: config.shortReplyMaxWords,
    }
  );

  return { orchestrator, registry: parts.registry, contextStore };
}

/**
 * Field configuration file when present, otherwise database introspection.
 */
export async function loadRegistry(config: Config, database: DatabaseClient): Promise<SchemaRegistry> {
  if (existsSync(config.fieldConfigPath)) {
    const registry = SchemaRegistry.fromFile(config.fieldConfigPath);
    console.log(`✓ Loaded field configuration for ${registry.tableNames().length} tables`);
    return registry;
  }

  console.log('⚠️  No field configuration found - introspecting database schema');
  const registry = SchemaRegistry.fromIntrospection(await database.introspectSchema());
  console.log(`✓ Introspected ${registry.tableNames().length} tables`);
  return registry;
}

/**
 * Production wiring: PostgreSQL, Gemini and, when configured, the control
 * database for durable threads and run logs.
 */
export async function createAgent(config: Config): Promise<Agent> {
  const database = new PgDatabase(getPool(config.databaseUrl), {
    statementTimeoutMs: config.statementTimeoutMs,
  });
  const generator = GeminiTextGenerator.create({
    apiKey: config.geminiApiKey,
    model: config.geminiModel,
    retry: config.retry,
  });
  const registry = await loadRegistry(config, database);

  let controlDb: ControlDb | null = null;
  if (config.controlDbUrl) {
    try {
      const candidate = new ControlDb(poolRunner(getPool(config.controlDbUrl)));
      await candidate.initialize();
      controlDb = candidate;
    } catch (error) {
      console.warn(`⚠️  Control database unavailable, using in-memory threads: ${describeError(error)}`);
    }
  } else {
    console.log('⚠️  CONTROL_DB_URL not set - conversation state is kept in memory');
  }

  const agent = assembleAgent(config, {
    generator,
    database,
    registry,
    threadStore: controlDb ? new PgThreadStore(controlDb) : undefined,
    runLogger: controlDb ?? undefined,
  });

  return { ...agent, controlDb };
}

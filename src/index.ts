#!/usr/bin/env node
import readline from 'readline';
import { randomUUID } from 'crypto';
import { loadConfig } from './config.js';
import { createAgent, type Agent } from './app.js';
import { closeAllPools } from './tools/pools.js';
import type { RunResponse } from './types.js';
import { formatResult } from './utils/format.js';
import { describeError } from './utils/errors.js';

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

let threadId: string = randomUUID();

function question(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, resolve);
  });
}

function printResponse(response: RunResponse): void {
  if (response.finalQuery) {
    console.log(`\n📄 SQL: ${response.finalQuery}`);
  }
  if (response.executionResult) {
    console.log(`\n${formatResult(response.executionResult)}`);
  }
  console.log(`\n💡 ${response.summary}\n`);
}

function printContext(agent: Agent): void {
  const snapshot = agent.contextStore.snapshot();
  console.log(`\nThread: ${threadId}`);
  console.log(`Last operation: ${snapshot.lastOperation ?? 'none'}${snapshot.lastTable ? ` on ${snapshot.lastTable}` : ''}`);
  console.log(`Table usage: ${JSON.stringify(snapshot.tableUsage)}`);
  console.log(`Frequent operations: ${JSON.stringify(snapshot.userPatterns.frequentOperations)}`);
  if (snapshot.userPatterns.salaryRange) {
    console.log(`Salary range: ${snapshot.userPatterns.salaryRange.min} - ${snapshot.userPatterns.salaryRange.max}`);
  }
  console.log(`Recent queries: ${snapshot.recentQueries.length}\n`);
}

async function handleCommand(agent: Agent, cmd: string, args: string[]): Promise<boolean> {
  switch (cmd) {
    case '/schema': {
      console.log('\n' + agent.registry.formatForPrompt(args[0]) + '\n');
      return false;
    }

    case '/context':
      printContext(agent);
      return false;

    case '/thread': {
      threadId = args[0] || randomUUID();
      console.log(`✓ Switched to thread ${threadId}\n`);
      return false;
    }

    case '/logs': {
      if (!agent.controlDb) {
        console.log('\n⚠️  Control database not configured. Set CONTROL_DB_URL to keep run logs.\n');
        return false;
      }
      const logs = await agent.controlDb.getRecentRunLogs(10);
      for (const log of logs) {
        console.log(`  [${log.createdAt.toISOString()}] ${log.operation} ${log.table ?? '-'}: ${log.sql} (${log.rowsAffected} rows, ${log.durationMs}ms)`);
      }
      console.log();
      return false;
    }

    case '/exit':
    case '/quit':
      return true;

    case '/help': {
      console.log(`
Available commands:
  /schema [table]   - Show table definitions (optionally a single table)
  /context          - Show what the agent remembers about this session
  /thread [id]      - Switch to another conversation thread (new one if no id)
  /logs             - Show recent executed statements (needs CONTROL_DB_URL)
  /help             - Show this help message
  /exit, /quit      - Exit the CLI

Examples:
  Show all employees with salary greater than 50000
  Add employee named Sarah
  Update the salary of Sarah to 70000
  cancel            - Drop a request that is waiting for a value

Ask something to get started!
`);
      return false;
    }

    default:
      console.log(`Unknown command: ${cmd}. Type /help for available commands.`);
      return false;
  }
}

async function main() {
  console.log('🚀 SQL Conversation Agent\n');

  const config = loadConfig();
  const agent = await createAgent(config);

  console.log(`Tables: ${agent.registry.tableNames().join(', ')}`);
  console.log('Ready! Type a request or /help for commands.\n');

  while (true) {
    const input = await question('> ');
    const trimmed = input.trim();

    if (!trimmed) {
      continue;
    }

    if (trimmed.startsWith('/')) {
      const parts = trimmed.split(/\s+/);
      try {
        if (await handleCommand(agent, parts[0], parts.slice(1))) {
          break;
        }
      } catch (error) {
        console.error(`\n✗ Error: ${describeError(error)}\n`);
      }
      continue;
    }

    try {
      printResponse(await agent.orchestrator.run(threadId, trimmed));
    } catch (error) {
      console.error(`\n✗ Error: ${describeError(error)}\n`);
    }
  }

  // Cleanup
  await closeAllPools();
  rl.close();
  console.log('\n👋 Goodbye!');
  process.exit(0);
}

// Handle graceful shutdown
process.on('SIGINT', () => {
  console.log('\n\n👋 Shutting down...');
  rl.close();
  void closeAllPools()
    .catch(error => console.error('Failed to close pools:', error))
    .finally(() => process.exit(0));
});

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

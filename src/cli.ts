#!/usr/bin/env node
/**
 * stack-pulse command line
 *
 * Usage:
 *   stack-pulse collect [--verbose] [--ephemeral]  - Run one collection cycle
 *   stack-pulse serve [--port=N]                   - Serve the metrics API
 *   stack-pulse breakers                           - Show circuit breaker states
 *   stack-pulse reset-breaker <serviceId>          - Close one circuit breaker
 *   stack-pulse migrate                            - Run pending migrations
 *   stack-pulse rollback [id]                      - Roll back migrations
 *   stack-pulse migrations                         - Show migration status
 */

import type { Server } from 'http';
import dotenv from 'dotenv';
import type { Database } from 'better-sqlite3';
import { createApp } from './app';
import { CollectorConfig, loadConfig, loadServiceCatalog } from './config';
import { closeDatabase, getMigrationStatus, openDatabase, rollbackMigration, runMigrations } from './db';
import { createMetricsService, MetricsService } from './services/metrics';
import { createStateStore } from './stores';
import { getErrorMessage } from './utils/errors';
import logger from './utils/logger';

// Parse --key=value arguments
export function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith('--')) {
      const [key, ...rest] = arg.slice(2).split('=');
      parsed[key] = rest.length > 0 ? rest.join('=') : 'true';
    }
  }
  return parsed;
}

/** Arguments that are not --flags */
export function positionalArgs(args: string[]): string[] {
  return args.filter(arg => !arg.startsWith('--'));
}

export function parsePort(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${raw}`);
  }
  return port;
}

interface Runtime {
  service: MetricsService;
  db: Database | null;
}

function openRuntime(config: CollectorConfig, ephemeral: boolean): Runtime {
  const catalog = loadServiceCatalog(config.servicesFile);
  const db = ephemeral ? null : openDatabase(config.dbPath);
  const store = db ? createStateStore({ kind: 'sqlite', database: db }) : createStateStore({ kind: 'memory' });
  return { service: createMetricsService(config, catalog, store, logger), db };
}

function closeRuntime(runtime: Runtime): void {
  if (runtime.db) closeDatabase(runtime.db);
}

function printUsage(): void {
  console.log(`
stack-pulse

Commands:
  collect [--verbose] [--ephemeral]   Run one collection cycle (rate limited)
  serve [--port=N]                    Serve /api/health and /api/metrics
  breakers                            Show circuit breaker states
  reset-breaker <serviceId>           Close one circuit breaker
  migrate                             Run pending migrations
  rollback [id]                       Roll back migrations (optionally to a specific id)
  migrations                          Show migration status
  `);
}

async function collect(config: CollectorConfig, flags: Record<string, string>): Promise<void> {
  const runtime = openRuntime(config, flags.ephemeral === 'true');
  try {
    const { document, coalesced } = await runtime.service.orchestrator.runDetailed(Date.now());
    if (flags.verbose === 'true' || process.env.VERBOSE === '1') {
      console.log(JSON.stringify(document, null, 2));
    }
    logger.info(
      { coalesced, overallScore: document.effectiveness.overallScore, outputFile: config.outputFile },
      coalesced ? 'reused previous document' : 'metrics collected'
    );
  } finally {
    closeRuntime(runtime);
  }
}

function serve(config: CollectorConfig, flags: Record<string, string>): void {
  const port = parsePort(flags.port, config.port);
  const runtime = openRuntime(config, false);
  const app = createApp({ service: runtime.service, logger });

  const server: Server = app.listen(port, () => {
    logger.info({ port }, 'server started');
  });

  const shutdown = (): void => {
    logger.info('shutting down');
    server.close(() => {
      closeRuntime(runtime);
      process.exit(0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

function showBreakers(config: CollectorConfig): void {
  const runtime = openRuntime(config, false);
  try {
    const { breakers } = runtime.service;
    const statuses = breakers.listStatuses(Date.now());
    console.log(`\nCircuit breakers (threshold ${breakers.getFailureThreshold()}, cooldown ${breakers.getCooldownMs()}ms):`);
    console.log('─'.repeat(50));
    if (statuses.length === 0) {
      console.log('  all closed');
    }
    for (const status of statuses) {
      const icon = status.state === 'open' ? '✗' : '○';
      const since = new Date(status.lastFailureAt).toISOString();
      console.log(`  ${icon} ${status.serviceId}: ${status.failureCount} failure(s), last at ${since}`);
    }
    console.log('');
  } finally {
    closeRuntime(runtime);
  }
}

function resetBreaker(config: CollectorConfig, serviceId: string | undefined): void {
  if (!serviceId) {
    console.error('Usage: stack-pulse reset-breaker <serviceId>');
    process.exit(1);
  }
  const runtime = openRuntime(config, false);
  try {
    const removed = runtime.service.breakers.reset(serviceId);
    console.log(removed ? `Breaker for ${serviceId} reset.` : `No breaker record for ${serviceId}.`);
  } finally {
    closeRuntime(runtime);
  }
}

function withDatabase(config: CollectorConfig, fn: (db: Database) => void): void {
  const db = openDatabase(config.dbPath, { migrate: false });
  try {
    fn(db);
  } finally {
    closeDatabase(db);
  }
}

async function main(): Promise<void> {
  dotenv.config();

  const command = process.argv[2];
  const args = process.argv.slice(3);
  const flags = parseArgs(args);
  const positional = positionalArgs(args);

  const config = loadConfig();

  switch (command) {
    case 'collect':
      await collect(config, flags);
      break;

    case 'serve':
      serve(config, flags);
      break;

    case 'breakers':
      showBreakers(config);
      break;

    case 'reset-breaker':
      resetBreaker(config, positional[0]);
      break;

    case 'migrate':
      withDatabase(config, db => runMigrations(db));
      break;

    case 'rollback':
      withDatabase(config, db => rollbackMigration(db, positional[0]));
      break;

    case 'migrations':
      withDatabase(config, db => {
        console.log('\nMigration Status:');
        console.log('─'.repeat(50));
        for (const m of getMigrationStatus(db)) {
          const icon = m.applied ? '✓' : '○';
          console.log(`  ${icon} ${m.id}: ${m.name}`);
        }
        console.log('');
      });
      break;

    default:
      printUsage();
      process.exit(1);
  }
}

if (require.main === module) {
  main().catch(err => {
    logger.fatal({ err }, 'command failed');
    console.error('Error:', getErrorMessage(err));
    process.exit(1);
  });
}

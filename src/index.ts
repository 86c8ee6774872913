#!/usr/bin/env node

/**
 * Mesh Monitor
 *
 * Watches a mesh radio network through one gateway node. Samples the
 * gateway's node list on an interval, keeps a registry of every node,
 * raises low-battery and stale alerts, and appends changed readings to
 * JSONL history files.
 *
 * Usage:
 *   mesh-monitor                             # continuous, config.yml in the working directory
 *   mesh-monitor --mode oneshot              # sample once, print the table, exit
 *   mesh-monitor --serial-port /dev/ttyUSB0  # serial first, TCP fallback
 *   mesh-monitor --profile field             # use config.field.yml
 *   mesh-monitor --http-port 8080            # also serve the JSON API
 */

import * as fs from 'fs';
import { parseArgs, ParsedArgs, USAGE } from './cli-args';
import { ConfigError, loadConfig } from './config';
import { Config } from './config-schema';
import { formatAlert, formatNodeSummary, formatNodeTable } from './format';
import { getLogger, initLogger, LogLevel } from './logger';
import { MeshMonitor } from './monitor';
import { NodeView } from './registry/types';
import { TickResult } from './sampler/sampler';

function printBanner(): void {
  console.log('');
  console.log('  Mesh Monitor');
  console.log('  Battery, uptime and presence of every node a gateway can hear');
  console.log('');
}

function logLevelFor(config: Config): LogLevel {
  return config.logging.level ?? (config.logging.verbose ? 'debug' : 'info');
}

function printTable(nodes: NodeView[], result: TickResult): void {
  console.log(`=== Mesh Network Status (${new Date(result.at).toLocaleTimeString()}) ===`);
  for (const line of formatNodeTable(nodes)) console.log(line);
  for (const alert of result.alerts) console.log(formatAlert(alert));
  console.log('');
}

function printListing(monitor: MeshMonitor, filter: NonNullable<ParsedArgs['list']>): void {
  const nodes = filter === 'favorites'
    ? monitor.registry.listFavorites()
    : filter === 'non-favorites'
      ? monitor.registry.listNonFavorites()
      : monitor.registry.listAll();
  for (const node of nodes) console.log(formatNodeSummary(node));
}

async function runOneshot(monitor: MeshMonitor, args: ParsedArgs): Promise<number> {
  const result = await monitor.tick();
  if (args.list) printListing(monitor, args.list);
  else printTable(monitor.registry.listAll(), result);

  await monitor.stop();
  if (!result.ok) {
    console.error(`[Error] ${result.failedStage ?? 'sample'} failed: ${result.error ?? 'unknown error'}`);
    return 1;
  }
  return 0;
}

async function runContinuous(monitor: MeshMonitor, config: Config): Promise<void> {
  const log = getLogger('Main');
  monitor.sampler.on('tick', (result: TickResult) => {
    if (result.ok) printTable(monitor.registry.listAll(), result);
  });

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    console.log(`\n[Monitor] ${signal} received, shutting down...`);
    monitor.stop().then(() => {
      process.exit(0);
    }, (err: unknown) => {
      log.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const port = await monitor.start();
  if (port !== null) console.log(`[Monitor] JSON API on http://${config.http.host}:${port}/api/nodes`);
  console.log('[Monitor] Monitoring... (Ctrl+C to stop)');
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (args.help) {
    printBanner();
    console.log(USAGE);
    console.log('');
    return;
  }
  if (args.errors.length > 0) {
    for (const error of args.errors) console.error(`[Error] ${error}`);
    console.error('Run with --help for usage.');
    process.exitCode = 1;
    return;
  }

  // An explicitly named file must exist; the default config.yml may not
  if (args.configPath && !fs.existsSync(args.configPath)) {
    console.error(`[Error] Config file not found: ${args.configPath}`);
    process.exitCode = 1;
    return;
  }

  let config: Config;
  try {
    config = loadConfig(args.configPath, { overrides: args.overrides });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  initLogger({ level: logLevelFor(config), pretty: config.logging.pretty });
  const monitor = new MeshMonitor(config);

  if (config.sampling.mode === 'oneshot' || args.list) {
    process.exitCode = await runOneshot(monitor, args);
    return;
  }

  printBanner();
  await runContinuous(monitor, config);
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('[Fatal]', err instanceof Error ? err.message : err);
    process.exit(1);
  });
}

#!/usr/bin/env node
// cli/index.ts — CLI entry point

import { Command } from 'commander';
import { loadConfig, type CombatConfig } from '../src/shared/config.js';
import { logger, setLogLevel } from '../src/shared/logger.js';
import { CombatError } from '../src/shared/errors.js';
import { loadPatternDirectory } from '../src/patterns/pattern-loader.js';
import { buildEncounter, loadScenarioFile, runScenario } from '../src/server/scenario.js';
import { startServer } from '../src/server/index.js';
import { formatSummary, formatTickLine } from './format.js';
import { FeedClient } from './client.js';
import { startInputReader } from './input-reader.js';

const program = new Command();

function fail(err: unknown): never {
  if (err instanceof CombatError) {
    process.stderr.write(`${err.code}: ${err.message}\n`);
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Error: ${msg}\n`);
  }
  process.exit(1);
}

function configFrom(opts: { seed?: string; refundOnCancel?: boolean }): CombatConfig {
  const overrides: Partial<CombatConfig> = {};
  if (opts.seed !== undefined) {
    const seed = Number(opts.seed);
    if (!Number.isInteger(seed) || seed < 0) {
      process.stderr.write(`Invalid seed: ${opts.seed}\n`);
      process.exit(1);
    }
    overrides.seed = seed;
  }
  if (opts.refundOnCancel) overrides.refundStaminaOnCancel = true;
  const config = loadConfig(overrides);
  setLogLevel(config.logLevel);
  return config;
}

program
  .name('skirmish')
  .description('Run and inspect deterministic combat encounters')
  .version('0.1.0');

program
  .command('simulate')
  .description('Run a scenario headless and print what happened')
  .requiredOption('--scenario <path>', 'Scenario JSON file')
  .option('--patterns <dir>', 'Directory of pattern JSON files', 'content/patterns')
  .option('--seed <n>', 'Override the encounter seed')
  .option('--refund-on-cancel', 'Refund stamina when a prepared skill is cancelled')
  .option('--events', 'Print every tick that produced events')
  .option('--json', 'Print the summary as JSON')
  .action(async (opts: {
    scenario: string;
    patterns: string;
    seed?: string;
    refundOnCancel?: boolean;
    events?: boolean;
    json?: boolean;
  }) => {
    try {
      const config = configFrom(opts);
      const patterns = await loadPatternDirectory(opts.patterns, { telegraphLeadMs: config.telegraphLeadMs });
      const scenario = await loadScenarioFile(opts.scenario);
      const built = buildEncounter(scenario, patterns, config);

      const summary = runScenario(scenario, built, (result) => {
        if (opts.events && result.events.length > 0) {
          process.stdout.write(`${formatTickLine(result)}\n`);
        }
      });

      process.stdout.write(opts.json ? `${JSON.stringify(summary, null, 2)}\n` : `${formatSummary(summary)}\n`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('validate-patterns')
  .description('Load every pattern in a directory and report problems')
  .option('--patterns <dir>', 'Directory of pattern JSON files', 'content/patterns')
  .action(async (opts: { patterns: string }) => {
    try {
      const config = configFrom({});
      const patterns = await loadPatternDirectory(opts.patterns, { telegraphLeadMs: config.telegraphLeadMs });
      for (const pattern of patterns.values()) {
        process.stdout.write(`ok  ${pattern.name} (${pattern.archetype}, ${pattern.nodes.length} nodes)\n`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('serve')
  .description('Run a scenario in real time and stream its events over WebSocket')
  .requiredOption('--scenario <path>', 'Scenario JSON file')
  .option('--patterns <dir>', 'Directory of pattern JSON files', 'content/patterns')
  .option('--port <port>', 'Event feed port (defaults to SKIRMISH_FEED_PORT or 8090)')
  .option('--seed <n>', 'Override the encounter seed')
  .action(async (opts: { scenario: string; patterns: string; port?: string; seed?: string }) => {
    try {
      const config = configFrom(opts);
      if (opts.port !== undefined) {
        const port = Number(opts.port);
        if (!Number.isInteger(port) || port < 0) {
          process.stderr.write(`Invalid port: ${opts.port}\n`);
          process.exit(1);
        }
        config.feedPort = port;
      }

      const server = await startServer({ scenarioPath: opts.scenario, patternsDir: opts.patterns, config });

      // Graceful shutdown
      const shutdown = (): void => {
        process.stderr.write('Shutting down...\n');
        server.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error('shutdown failed', { error: err instanceof Error ? err.message : String(err) });
            process.exit(1);
          },
        );
      };

      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('watch')
  .description('Follow a running encounter; JSON lines on stdin are sent as player inputs')
  .requiredOption('--server <url>', 'Event feed WebSocket URL, e.g. ws://localhost:8090')
  .option('--json', 'Print raw feed messages as JSON lines')
  .action(async (opts: { server: string; json?: boolean }) => {
    const client = new FeedClient(opts.server, opts.json ? 'json' : 'pretty');

    // Graceful shutdown
    const shutdown = (): void => {
      process.stderr.write('Shutting down...\n');
      client.close();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    try {
      await client.connect();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      process.stderr.write(`Failed to connect: ${msg}\n`);
      process.exit(1);
    }

    startInputReader((msg) => client.send(msg));
  });

program.parseAsync().catch(fail);

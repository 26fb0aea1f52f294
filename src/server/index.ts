// server/index.ts — Live encounter wiring
// Wire: patterns → scenario → tick loop → event feed
// Graceful shutdown is left to the caller (the CLI installs SIGINT/SIGTERM handlers)

import type { CombatConfig } from '../shared/config.js';
import { logger, setLogLevel } from '../shared/logger.js';
import { loadPatternDirectory } from '../patterns/pattern-loader.js';
import { buildEncounter, loadScenarioFile, type BuiltEncounter } from './scenario.js';
import { CombatEventFeed } from './event-feed.js';

export interface ServeOptions {
  scenarioPath: string;
  patternsDir: string;
  config: CombatConfig;
}

export interface RunningServer {
  built: BuiltEncounter;
  feed: CombatEventFeed;
  stop(): Promise<void>;
}

export async function startServer(options: ServeOptions): Promise<RunningServer> {
  const { config } = options;
  setLogLevel(config.logLevel);

  // 1. Patterns (fatal if any asset is invalid)
  const patterns = await loadPatternDirectory(options.patternsDir, { telegraphLeadMs: config.telegraphLeadMs });
  logger.info('patterns loaded', { count: patterns.size, dir: options.patternsDir });

  // 2. Scenario → encounter
  const scenario = await loadScenarioFile(options.scenarioPath);
  const built = buildEncounter(scenario, patterns, config);
  logger.info('encounter ready', {
    scenario: scenario.name,
    combatants: built.encounter.combatants.size,
    seed: built.encounter.seed,
  });

  // 3. Event feed
  const feed = new CombatEventFeed(config.feedPort, built.encounter, built.inputs);
  await feed.ready();
  built.loop.setEventFeed(feed);
  logger.info('event feed listening', { port: config.feedPort });

  // 4. Tick loop
  built.loop.start();
  logger.info('tick loop started', { tickRateMs: config.tickRateMs });

  return {
    built,
    feed,
    async stop(): Promise<void> {
      built.loop.stop();
      await feed.close();
      logger.info('server stopped', { tick: built.encounter.tick });
    },
  };
}

/**
 * Command-line definition for metadatad
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { Logger } from 'pino';
import { createAgent, type MetadataAgent } from '../agent.js';
import { applyOverrides, type ConfigOverrides, loadConfig } from '../config/loader.js';
import { createLogger, getLogLevel, isLogLevel, LOG_LEVELS } from '../logger.js';

export type CliOptions = {
  config?: string;
  host?: string;
  port?: number;
  threads?: number;
  verbose?: boolean;
  logLevel?: string;
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`'${value}' is not an integer`);
  }
  return parsed;
}

export function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    host: options.host,
    port: options.port,
    numThreads: options.threads,
    verboseLogging: options.verbose,
    logLevel: options.logLevel && isLogLevel(options.logLevel) ? options.logLevel : undefined
  };
}

export function createProgram(
  run: (options: CliOptions) => Promise<void>,
  version: string
): Command {
  const program = new Command();

  program
    .name('metadatad')
    .description('Local metadata agent: maps resource ids to monitored resources over HTTP')
    .version(version)
    .option('-c, --config <path>', 'path to configuration file', process.env.METADATAD_CONFIG)
    .option('-H, --host <host>', 'address to bind the metadata API to')
    .option('-p, --port <port>', 'port for the metadata API', parseInteger)
    .option('-t, --threads <count>', 'requests dispatched concurrently', parseInteger)
    .option('-v, --verbose', 'log every request and lookup')
    .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS))
    .action(async (options: CliOptions) => {
      await run(options);
    });

  return program;
}

/**
 * Stop the agent on SIGINT/SIGTERM, then exit
 */
export function setupGracefulShutdown(args: {
  agent: Pick<MetadataAgent, 'stop'>;
  logger: Pick<Logger, 'info' | 'error'>;
  exit?: (code: number) => void;
}): void {
  const { agent, logger, exit = (code: number) => process.exit(code) } = args;
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    try {
      await agent.stop();
      logger.info('Shutdown complete');
      exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

export async function runAgent(options: CliOptions): Promise<MetadataAgent> {
  const logger = createLogger({ level: getLogLevel(options) });

  const loaded = await loadConfig(options.config, logger);
  const config = applyOverrides(loaded.data, toOverrides(options));
  logger.level = options.logLevel ?? (options.verbose ? 'debug' : config.logLevel);

  const agent = createAgent(config, { logger });
  await agent.start();
  setupGracefulShutdown({ agent, logger });
  return agent;
}

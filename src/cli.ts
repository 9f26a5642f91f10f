import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_CONFIG_PATH, resolveConfig, ResolvedConfig } from './config';
import { QaseApiClient } from './services/qase';
import { RunOptions } from './types';
import { ConfigError } from './utils/errors';
import { logger, serializeError, setVerbose } from './utils/logger';

export interface CommonOptions {
  config: string;
  token?: string;
  project?: string;
  dryRun: boolean;
  verbose: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Command with the flags every maintenance script shares.
 */
export function createScriptCommand(name: string, description: string): Command {
  return new Command(name)
    .description(description)
    .option('--config <path>', 'path to config file', DEFAULT_CONFIG_PATH)
    .option('--token <token>', 'Qase API token (overrides config file)')
    .option('--project <code>', 'Qase project code (overrides config file)')
    .option('--dry-run', 'perform a dry run without making changes', false)
    .option('-v, --verbose', 'show detailed information about each test case', false);
}

export interface ScriptContext {
  config: ResolvedConfig;
  client: QaseApiClient;
  run: RunOptions;
}

/**
 * Resolve configuration and build the API client for a parsed command.
 */
export function createContext(options: CommonOptions, requireProject = true): ScriptContext {
  setVerbose(options.verbose);
  const config = resolveConfig(options, process.env, { requireProject });
  const client = new QaseApiClient({
    apiToken: config.apiToken,
    projectCode: config.projectCode,
    baseUrl: config.baseUrl,
  });
  return { config, client, run: { dryRun: options.dryRun, verbose: options.verbose } };
}

export function handleFatal(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Error: ${error.message}`);
  } else {
    logger.error('Fatal error', { error: serializeError(error) });
  }
  process.exit(1);
}

import type { Command } from 'commander';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { CONFIG_PATH_ENV } from '../config/types.js';

export type RuntimeOptions = {
  config?: string;
  env?: string;
};

export function appendRuntimeOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to runnerkeeper.toml')
    .option('--env <path>', 'Path to an extra .env file');
}

/** Applies --env and --config before any config is read. */
export function applyRuntimeOptions(options: RuntimeOptions): void {
  if (options.env) {
    loadDotenv({ path: resolve(options.env), override: true });
  }
  if (options.config) {
    process.env[CONFIG_PATH_ENV] = resolve(options.config);
  }
}

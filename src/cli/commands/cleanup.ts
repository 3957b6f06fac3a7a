import type { Command } from 'commander';
import { loadWorkerConfig } from '../../config/env.js';
import type { WorkerConfig } from '../../config/types.js';
import { EXIT_FAILURE, EXIT_SUCCESS, ValidationError } from '../../errors.js';
import { createTokenExchanger } from '../../github/tokenExchanger.js';
import { createIdentityLookup } from '../../identity/lookup.js';
import { runShutdown } from '../../lifecycle/shutdown.js';
import { logger } from '../../logger.js';
import { appendRuntimeOptions, applyRuntimeOptions, type RuntimeOptions } from '../options.js';

export async function runCleanup(): Promise<number> {
  let config: WorkerConfig;
  try {
    config = loadWorkerConfig();
  } catch (err) {
    if (err instanceof ValidationError) {
      logger.error(
        { issues: err.issues },
        `Configuration validation failed: ${err.issues.join('; ')}`,
      );
      return EXIT_FAILURE;
    }
    throw err;
  }
  const outcome = await runShutdown({
    config,
    tokenExchanger: createTokenExchanger(config),
    lookupIdentityId: createIdentityLookup(),
  });
  logger.info(outcome, 'Cleanup finished');
  return EXIT_SUCCESS;
}

export function registerCleanupCommand(program: Command) {
  appendRuntimeOptions(
    program
      .command('cleanup')
      .description('Deregister the runner and delete its local identity without starting it'),
  ).action(async (options: RuntimeOptions) => {
    applyRuntimeOptions(options);
    process.exitCode = await runCleanup();
  });
}

import type { Command } from 'commander';
import { describeWorkerConfig, loadWorkerConfig } from '../../config/env.js';
import { EXIT_FAILURE, EXIT_SUCCESS, ValidationError } from '../../errors.js';
import { appendRuntimeOptions, applyRuntimeOptions, type RuntimeOptions } from '../options.js';

export function checkConfig(write: (line: string) => void): number {
  try {
    const config = loadWorkerConfig();
    write(JSON.stringify(describeWorkerConfig(config), null, 2));
    return EXIT_SUCCESS;
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    write('Invalid runner configuration:');
    for (const issue of err.issues) {
      write(`  - ${issue}`);
    }
    return EXIT_FAILURE;
  }
}

export function registerCheckConfigCommand(program: Command) {
  appendRuntimeOptions(
    program.command('check-config').description('Validate the runner configuration and print it'),
  ).action((options: RuntimeOptions) => {
    applyRuntimeOptions(options);
    process.exitCode = checkConfig((line) => process.stdout.write(`${line}\n`));
  });
}

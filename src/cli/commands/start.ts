import type { Command } from 'commander';
import { startRunnerRuntime } from '../../lifecycle/runtimeLauncher.js';
import { appendRuntimeOptions, applyRuntimeOptions, type RuntimeOptions } from '../options.js';

export function registerStartCommand(program: Command) {
  appendRuntimeOptions(
    program
      .command('start', { isDefault: true })
      .description('Register the runner, supervise run.sh and deregister on shutdown'),
  ).action(async (options: RuntimeOptions) => {
    applyRuntimeOptions(options);
    process.exitCode = await startRunnerRuntime();
  });
}

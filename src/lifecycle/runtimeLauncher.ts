import { loadWorkerConfig } from '../config/env.js';
import { createTokenExchanger } from '../github/tokenExchanger.js';
import { createConfigScriptProcedure } from '../identity/configurator.js';
import { createIdentityLookup } from '../identity/lookup.js';
import { runCommand } from '../runner/commandRunner.js';
import { prepareRunnerHome } from '../runner/runnerFiles.js';
import { launchRunner, resolveLaunchAccount } from '../supervisor/processSupervisor.js';
import { LifecycleManager, type LifecycleDeps } from './manager.js';

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export function createLifecycleDeps(): LifecycleDeps {
  return {
    loadConfig: loadWorkerConfig,
    createTokenExchanger,
    prepareRunnerHome,
    configure: createConfigScriptProcedure(runCommand),
    lookupIdentityId: createIdentityLookup(runCommand),
    resolveAccount: (config) => resolveLaunchAccount(config),
    launch: launchRunner,
    runExec: runCommand,
  };
}

/**
 * Runs the full lifecycle with SIGINT/SIGTERM routed to the manager from the
 * first instruction on. Resolves with the process exit code.
 */
export async function startRunnerRuntime(
  options: { deps?: Partial<LifecycleDeps> } = {},
): Promise<number> {
  const manager = new LifecycleManager({ ...createLifecycleDeps(), ...options.deps });
  const handlers = shutdownSignals.map((signal) => {
    const handler = () => manager.deliver({ type: 'signal', signal });
    process.on(signal, handler);
    return { signal, handler };
  });
  try {
    return await manager.run();
  } finally {
    for (const { signal, handler } of handlers) {
      process.off(signal, handler);
    }
  }
}

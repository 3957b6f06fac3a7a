import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import type { WorkerConfig } from '../config/types.js';
import { AuthError, ValidationError } from '../errors.js';
import type { ConfigureProcedure } from '../identity/configurator.js';
import { writeIdentityRecord } from '../identity/record.js';
import { logger } from '../logger.js';
import type { ChildExit, LaunchAccount, SupervisedChild } from '../supervisor/processSupervisor.js';
import { buildConfig } from '../../tests/helpers/env.js';
import { fakeTokenExchanger } from '../../tests/helpers/fakes.js';
import { LifecycleManager, type LifecycleDeps } from './manager.js';

type FakeChild = SupervisedChild & {
  exit(exit: ChildExit): void;
  signals: NodeJS.Signals[];
};

function fakeChild(options: { ignore?: NodeJS.Signals[] } = {}): FakeChild {
  let resolveExit!: (exit: ChildExit) => void;
  const exited = new Promise<ChildExit>((resolve) => {
    resolveExit = resolve;
  });
  const signals: NodeJS.Signals[] = [];
  return {
    pid: 4242,
    exited,
    signals,
    exit: (exit) => resolveExit(exit),
    signal: (signal) => {
      signals.push(signal);
      if (!options.ignore?.includes(signal)) resolveExit({ code: null, signal });
      return true;
    },
  };
}

function setup(config: WorkerConfig, overrides: Partial<LifecycleDeps> = {}) {
  const tokenExchanger = fakeTokenExchanger();
  const child = fakeChild();
  const deps = {
    loadConfig: vi.fn(() => config),
    createTokenExchanger: vi.fn(() => tokenExchanger),
    prepareRunnerHome: vi.fn(async () => undefined),
    configure: vi.fn<ConfigureProcedure>(async () => undefined),
    lookupIdentityId: vi.fn(async () => 17),
    resolveAccount: vi.fn(async (): Promise<LaunchAccount> => ({ mode: 'unprivileged' })),
    launch: vi.fn(async () => child),
    ...overrides,
  } satisfies LifecycleDeps;
  const manager = new LifecycleManager(deps);
  return { manager, deps, tokenExchanger, child };
}

describe('LifecycleManager', () => {
  it('registers, supervises, and exits with the child exit code', async () => {
    const config = buildConfig();
    const { manager, deps, tokenExchanger, child } = setup(config);

    const running = manager.run();
    await vi.waitFor(() => expect(manager.state).toBe('Running'));
    child.exit({ code: 7, signal: null });

    expect(await running).toBe(7);
    expect(manager.state).toBe('Terminated');
    expect(tokenExchanger.exchange).toHaveBeenCalledTimes(1);
    expect(deps.configure).toHaveBeenCalledTimes(1);
    expect(tokenExchanger.deregister).not.toHaveBeenCalled();
    expect(existsSync(join(config.runnerHome, '.runner'))).toBe(true);
  });

  it('reuses an existing identity without calling the control plane', async () => {
    const config = buildConfig();
    await writeIdentityRecord(config.runnerHome, { agentName: 'runner-1' });
    const { manager, deps, tokenExchanger, child } = setup(config);

    const running = manager.run();
    await vi.waitFor(() => expect(manager.state).toBe('Running'));
    child.exit({ code: 0, signal: null });

    expect(await running).toBe(0);
    expect(tokenExchanger.exchange).not.toHaveBeenCalled();
    expect(deps.configure).not.toHaveBeenCalled();
  });

  it('forwards a shutdown signal, deregisters once, and exits cleanly', async () => {
    const config = buildConfig();
    const { manager, tokenExchanger, child } = setup(config);

    const running = manager.run();
    await vi.waitFor(() => expect(manager.state).toBe('Running'));
    manager.deliver({ type: 'signal', signal: 'SIGTERM' });

    expect(await running).toBe(0);
    expect(manager.state).toBe('Terminated');
    expect(child.signals).toEqual(['SIGTERM']);
    expect(tokenExchanger.deregister).toHaveBeenCalledTimes(1);
    expect(tokenExchanger.deregister).toHaveBeenCalledWith(17, expect.any(AbortSignal));
    expect(existsSync(join(config.runnerHome, '.runner'))).toBe(false);
  });

  it('ignores a second signal while shutting down', async () => {
    const config = buildConfig();
    const { manager, tokenExchanger } = setup(config);
    const warn = vi.spyOn(logger, 'warn');

    const running = manager.run();
    await vi.waitFor(() => expect(manager.state).toBe('Running'));
    manager.deliver({ type: 'signal', signal: 'SIGTERM' });
    manager.deliver({ type: 'signal', signal: 'SIGINT' });

    expect(await running).toBe(0);
    expect(tokenExchanger.deregister).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { signal: 'SIGINT' },
      'Shutdown already in progress, ignoring signal',
    );
  });

  it('kills a child that outlives the grace period', async () => {
    const config = buildConfig({ childGraceMs: 20 });
    const child = fakeChild({ ignore: ['SIGTERM'] });
    const { manager } = setup(config, { launch: vi.fn(async () => child) });

    const running = manager.run();
    await vi.waitFor(() => expect(manager.state).toBe('Running'));
    manager.deliver({ type: 'signal', signal: 'SIGTERM' });

    expect(await running).toBe(0);
    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
  });

  it('fails validation without touching the control plane', async () => {
    const config = buildConfig();
    const error = vi.spyOn(logger, 'error');
    const { manager, deps } = setup(config, {
      loadConfig: () => {
        throw new ValidationError(['Missing required config: GITHUB_TOKEN']);
      },
    });

    expect(await manager.run()).toBe(1);
    expect(manager.state).toBe('Unconfigured');
    expect(deps.createTokenExchanger).not.toHaveBeenCalled();
    expect(deps.launch).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith(
      { stage: 'validate', issues: ['Missing required config: GITHUB_TOKEN'] },
      'Configuration validation failed: Missing required config: GITHUB_TOKEN',
    );
  });

  it('reports rejected credentials and never launches the runner', async () => {
    const config = buildConfig();
    const error = vi.spyOn(logger, 'error');
    const tokenExchanger = fakeTokenExchanger({
      exchange: vi.fn(async () =>
        Promise.reject(new AuthError('Registration token request', 401, 'Bad credentials')),
      ),
    });
    const { manager, deps } = setup(config, { createTokenExchanger: () => tokenExchanger });

    expect(await manager.run()).toBe(1);
    expect(manager.state).toBe('Unconfigured');
    expect(deps.configure).not.toHaveBeenCalled();
    expect(deps.launch).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith(
      { stage: 'token-exchange', status: 401 },
      'Failed to generate registration token: Bad credentials',
    );
  });

  it('shuts down without network calls when signalled before registering', async () => {
    const config = buildConfig();
    const tokenExchanger = fakeTokenExchanger();
    let manager: LifecycleManager | undefined;
    const ctx = setup(config, {
      createTokenExchanger: () => tokenExchanger,
      prepareRunnerHome: async () => {
        manager?.deliver({ type: 'signal', signal: 'SIGTERM' });
      },
    });
    manager = ctx.manager;

    expect(await manager.run()).toBe(0);
    expect(manager.state).toBe('Terminated');
    expect(tokenExchanger.exchange).not.toHaveBeenCalled();
    expect(tokenExchanger.deregister).not.toHaveBeenCalled();
    expect(ctx.deps.launch).not.toHaveBeenCalled();
  });

  it('abandons an in-flight configuration on a signal', async () => {
    const config = buildConfig();
    let manager: LifecycleManager | undefined;
    const configure = vi.fn<ConfigureProcedure>(
      ({ signal }) =>
        new Promise<void>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('configure aborted')));
          manager?.deliver({ type: 'signal', signal: 'SIGINT' });
        }),
    );
    const ctx = setup(config, { configure });
    manager = ctx.manager;

    expect(await manager.run()).toBe(0);
    expect(manager.state).toBe('Terminated');
    expect(configure).toHaveBeenCalledTimes(1);
    expect(ctx.tokenExchanger.deregister).not.toHaveBeenCalled();
    expect(ctx.deps.launch).not.toHaveBeenCalled();
    expect(existsSync(join(config.runnerHome, '.runner'))).toBe(false);
  });
});

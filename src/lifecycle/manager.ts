import { describeWorkerConfig } from '../config/env.js';
import type { WorkerConfig } from '../config/types.js';
import {
  AuthError,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  NetworkError,
  ValidationError,
} from '../errors.js';
import type { TokenExchanger } from '../github/tokenExchanger.js';
import type { ConfigureProcedure } from '../identity/configurator.js';
import { cleanupExistingIdentity, ensureIdentity } from '../identity/configurator.js';
import type { IdentityLookup } from '../identity/lookup.js';
import { logger } from '../logger.js';
import type { CommandRunner } from '../runner/commandRunner.js';
import type { ChildExit, LaunchAccount, SupervisedChild } from '../supervisor/processSupervisor.js';
import { exitCodeForChild } from '../supervisor/processSupervisor.js';
import { settleWithin } from './deadline.js';
import { Mailbox } from './mailbox.js';
import { runShutdown } from './shutdown.js';
import { LifecycleStateMachine, type LifecycleState } from './state.js';

export type LifecycleEvent =
  | { type: 'signal'; signal: NodeJS.Signals }
  | { type: 'child-exit'; exit: ChildExit };

export type LifecycleStage = 'validate' | 'prepare' | 'token-exchange' | 'configure' | 'supervise';

export type LifecycleDeps = {
  loadConfig: () => WorkerConfig;
  createTokenExchanger: (config: WorkerConfig) => TokenExchanger;
  prepareRunnerHome: (config: WorkerConfig) => Promise<void>;
  configure: ConfigureProcedure;
  lookupIdentityId: IdentityLookup;
  resolveAccount: (config: WorkerConfig) => Promise<LaunchAccount>;
  launch: (config: WorkerConfig, account: LaunchAccount) => Promise<SupervisedChild>;
  runExec?: CommandRunner;
};

type StageResult = { kind: 'ok' } | { kind: 'error'; stage: LifecycleStage; error: unknown };

type Signalled<T> = { kind: 'done'; value: T } | { kind: 'signalled' };

const CONFIGURE_UNWIND_MS = 5000;
const KILL_WAIT_MS = 2000;

function stageForError(err: unknown, fallback: LifecycleStage): LifecycleStage {
  if (err instanceof AuthError || err instanceof NetworkError) return 'token-exchange';
  return fallback;
}

/**
 * Drives one runner through Unconfigured -> Terminated. Signal handlers only
 * post messages; every transition happens on this control loop.
 */
export class LifecycleManager {
  readonly #deps: LifecycleDeps;
  readonly #mailbox = new Mailbox<LifecycleEvent>();
  readonly #abort = new AbortController();
  readonly #state: LifecycleStateMachine;
  #shuttingDown = false;

  constructor(deps: LifecycleDeps) {
    this.#deps = deps;
    this.#state = new LifecycleStateMachine((from, to) => {
      logger.debug({ from, to }, 'Lifecycle transition');
    });
  }

  get state(): LifecycleState {
    return this.#state.state;
  }

  deliver(event: LifecycleEvent): void {
    if (event.type === 'signal') {
      if (this.#shuttingDown) {
        logger.warn({ signal: event.signal }, 'Shutdown already in progress, ignoring signal');
        return;
      }
      this.#shuttingDown = true;
      this.#abort.abort();
    }
    this.#mailbox.post(event);
  }

  async run(): Promise<number> {
    logger.info('Starting runner lifecycle');
    this.#state.transition('Configuring');

    let config: WorkerConfig;
    try {
      config = this.#deps.loadConfig();
    } catch (err) {
      return this.#fail('validate', err);
    }
    logger.info(describeWorkerConfig(config), 'Configuration validated');
    const tokenExchanger = this.#deps.createTokenExchanger(config);

    const configuring = this.#configure(config, tokenExchanger);
    const configured = await this.#untilSignalled(configuring);
    if (configured.kind === 'signalled') {
      await settleWithin(configuring, CONFIGURE_UNWIND_MS);
      return this.#shutdown(config, tokenExchanger, await this.#nextSignal());
    }
    if (configured.value.kind === 'error') {
      return this.#fail(configured.value.stage, configured.value.error);
    }
    this.#state.transition('Configured');

    let child: SupervisedChild;
    try {
      const account = await this.#deps.resolveAccount(config);
      child = await this.#deps.launch(config, account);
    } catch (err) {
      return this.#fail('supervise', err);
    }
    this.#state.transition('Running');
    void child.exited.then((exit) => this.#mailbox.post({ type: 'child-exit', exit }));

    const event = await this.#mailbox.next();
    if (event.type === 'signal') {
      return this.#shutdown(config, tokenExchanger, event.signal, child);
    }

    const code = exitCodeForChild(event.exit);
    logger.info({ code, signal: event.exit.signal }, 'Runner process exited');
    this.#state.transition('Terminated');
    return code;
  }

  async #configure(config: WorkerConfig, tokenExchanger: TokenExchanger): Promise<StageResult> {
    const signal = this.#abort.signal;
    let stage: LifecycleStage = 'prepare';
    try {
      await this.#deps.prepareRunnerHome(config);
      stage = 'configure';
      if (config.cleanupExisting) {
        await cleanupExistingIdentity({
          config,
          tokenExchanger,
          signal,
          ...(this.#deps.runExec ? { runExec: this.#deps.runExec } : {}),
        });
      }
      await ensureIdentity({ config, tokenExchanger, configure: this.#deps.configure, signal });
      return { kind: 'ok' };
    } catch (error) {
      return { kind: 'error', stage: stageForError(error, stage), error };
    }
  }

  #untilSignalled<T>(work: Promise<T>): Promise<Signalled<T>> {
    const signal = this.#abort.signal;
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve({ kind: 'signalled' });
        return;
      }
      const onAbort = () => resolve({ kind: 'signalled' });
      signal.addEventListener('abort', onAbort, { once: true });
      void work.then((value) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ kind: 'done', value });
      });
    });
  }

  async #nextSignal(): Promise<NodeJS.Signals> {
    for (;;) {
      const event = await this.#mailbox.next();
      if (event.type === 'signal') return event.signal;
    }
  }

  async #shutdown(
    config: WorkerConfig,
    tokenExchanger: TokenExchanger,
    signal: NodeJS.Signals,
    child?: SupervisedChild,
  ): Promise<number> {
    logger.warn({ signal }, 'Received shutdown signal');
    this.#state.transition('ShuttingDown');

    if (child) {
      child.signal(signal);
      const exit = await settleWithin(child.exited, config.childGraceMs);
      if (!exit) {
        logger.warn({ pid: child.pid }, 'Runner process did not exit in time, killing it');
        child.signal('SIGKILL');
        await settleWithin(child.exited, KILL_WAIT_MS);
      }
    }

    await runShutdown({ config, tokenExchanger, lookupIdentityId: this.#deps.lookupIdentityId });
    this.#state.transition('Terminated');
    return EXIT_SUCCESS;
  }

  #fail(stage: LifecycleStage, err: unknown): number {
    if (err instanceof ValidationError) {
      logger.error(
        { stage, issues: err.issues },
        `Configuration validation failed: ${err.issues.join('; ')}`,
      );
    } else if (err instanceof AuthError) {
      logger.error(
        { stage, status: err.status },
        `Failed to generate registration token: ${err.detail}`,
      );
    } else {
      logger.error({ stage, err }, `Runner ${stage} failed`);
    }
    if (this.#state.canTransition('Unconfigured')) {
      this.#state.transition('Unconfigured');
    }
    return EXIT_FAILURE;
  }
}

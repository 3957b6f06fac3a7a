import type { WorkerConfig } from '../config/types.js';
import type { GitHubConfig, RunnerToken } from './client.js';
import { createRegistrationToken, createRemoveToken, deleteRunner } from './client.js';

export type RegistrationToken = RunnerToken;

/** Control-plane calls made with the durable credential of one runner config. */
export interface TokenExchanger {
  exchange(signal?: AbortSignal): Promise<RegistrationToken>;
  removalToken(signal?: AbortSignal): Promise<RegistrationToken>;
  deregister(identityId: number, signal?: AbortSignal): Promise<void>;
}

export function githubConfigFor(config: WorkerConfig): GitHubConfig {
  return {
    apiBaseUrl: config.apiBaseUrl,
    token: config.credential,
    timeoutMs: config.requestTimeoutMs,
  };
}

export function createTokenExchanger(config: WorkerConfig): TokenExchanger {
  const github = githubConfigFor(config);
  return {
    exchange: (signal) => createRegistrationToken(github, config.scope, signal),
    removalToken: (signal) => createRemoveToken(github, config.scope, signal),
    deregister: (identityId, signal) => deleteRunner(github, config.scope, identityId, signal),
  };
}

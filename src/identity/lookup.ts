import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { WorkerConfig } from '../config/types.js';
import { logger } from '../logger.js';
import { runCommand, type CommandRunner } from '../runner/commandRunner.js';
import { CONFIG_SCRIPT } from '../runner/runnerFiles.js';
import { readIdentityRecord } from './record.js';

export type ListedIdentity = {
  id: number;
  name: string;
};

/** Resolves the control-plane id of the configured runner, by name. */
export type IdentityLookup = (
  config: WorkerConfig,
  signal?: AbortSignal,
) => Promise<number | undefined>;

const listingLinePattern = /^\s*(\d+)\s+(\S+)/;

export function parseIdentityListing(output: string): ListedIdentity[] {
  const identities: ListedIdentity[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = listingLinePattern.exec(line);
    if (!match?.[1] || !match[2]) continue;
    identities.push({ id: Number.parseInt(match[1], 10), name: match[2] });
  }
  return identities;
}

async function listConfiguredIdentities(
  config: WorkerConfig,
  runExec: CommandRunner,
  signal?: AbortSignal,
): Promise<ListedIdentity[]> {
  const script = join(config.runnerHome, CONFIG_SCRIPT);
  if (!existsSync(script)) return [];
  try {
    const result = await runExec(script, ['list'], {
      cwd: config.runnerHome,
      allowFailure: true,
      timeoutMs: config.requestTimeoutMs,
      ...(signal ? { signal } : {}),
    });
    return parseIdentityListing(result.stdout);
  } catch (err) {
    logger.warn({ err }, 'Listing configured runners failed');
    return [];
  }
}

export function createIdentityLookup(runExec: CommandRunner = runCommand): IdentityLookup {
  return async (config, signal) => {
    const listed = await listConfiguredIdentities(config, runExec, signal);
    const match = listed.find((identity) => identity.name === config.identityName);
    if (match) return match.id;

    const record = await readIdentityRecord(config.runnerHome).catch(() => null);
    if (record?.agentId !== undefined && record.agentName === config.identityName) {
      return record.agentId;
    }
    return undefined;
  };
}

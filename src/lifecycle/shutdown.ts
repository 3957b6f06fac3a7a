import type { WorkerConfig } from '../config/types.js';
import type { TokenExchanger } from '../github/tokenExchanger.js';
import type { IdentityLookup } from '../identity/lookup.js';
import { hasIdentityRecord, removeIdentityRecord } from '../identity/record.js';
import { logger } from '../logger.js';
import { withDeadline } from './deadline.js';

export type ShutdownOutcome = {
  hadRecord: boolean;
  identityId?: number;
  deregistered: boolean;
  removed: string[];
};

/**
 * Deregisters the runner and deletes its local identity. Remote removal is
 * best effort and bounded by `shutdownTimeoutMs`; local cleanup always runs.
 */
export async function runShutdown(options: {
  config: WorkerConfig;
  tokenExchanger: Pick<TokenExchanger, 'deregister'>;
  lookupIdentityId: IdentityLookup;
}): Promise<ShutdownOutcome> {
  const { config, tokenExchanger, lookupIdentityId } = options;

  if (!hasIdentityRecord(config.runnerHome)) {
    logger.info('No runner configuration found, nothing to deregister');
    return { hadRecord: false, deregistered: false, removed: [] };
  }

  logger.info({ name: config.identityName }, 'Cleaning up runner');
  const controller = new AbortController();
  const progress: { identityId?: number; deregistered: boolean } = { deregistered: false };

  const remoteRemoval = async () => {
    const identityId = await lookupIdentityId(config, controller.signal);
    if (identityId === undefined) {
      logger.warn({ name: config.identityName }, 'Runner id not found, skipping remote removal');
      return;
    }
    progress.identityId = identityId;
    logger.info({ identityId }, 'Removing runner from control plane');
    await tokenExchanger.deregister(identityId, controller.signal);
    progress.deregistered = true;
    logger.info({ identityId }, 'Runner removed from control plane');
  };

  try {
    await withDeadline(remoteRemoval(), config.shutdownTimeoutMs, 'Runner deregistration');
  } catch (err) {
    controller.abort();
    logger.warn(
      { err, identityId: progress.identityId },
      'Failed to remove runner from control plane',
    );
  }

  const removed = await removeIdentityRecord(config.runnerHome);
  logger.info({ removed }, 'Runner cleanup completed');
  return { hadRecord: true, ...progress, removed };
}

import { existsSync } from 'node:fs';
import { chmod, cp, mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { WorkerConfig } from '../config/types.js';
import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';

export const CONFIG_SCRIPT = 'config.sh';
export const RUN_SCRIPT = 'run.sh';

/**
 * Makes sure the runner home holds the runner distribution and the work
 * directory exists. A mounted, empty runner home is seeded from the pristine
 * copy in `runnerDistDir`.
 */
export async function prepareRunnerHome(config: WorkerConfig): Promise<void> {
  await mkdir(config.runnerHome, { recursive: true });

  if (!existsSync(join(config.runnerHome, CONFIG_SCRIPT)) && existsSync(config.runnerDistDir)) {
    logger.info(
      { from: config.runnerDistDir, to: config.runnerHome },
      'Copying runner files into runner home',
    );
    await cp(config.runnerDistDir, config.runnerHome, { recursive: true });
    const entries = await readdir(config.runnerHome);
    for (const entry of entries.filter((name) => name.endsWith('.sh'))) {
      await chmod(join(config.runnerHome, entry), 0o755);
    }
  }

  await mkdir(config.workDir, { recursive: true });
}

export function runnerScriptPath(runnerHome: string, script: string): string {
  const path = join(runnerHome, script);
  if (!existsSync(path)) {
    throw new ConfigurationError(`${script} not found in runner home: ${runnerHome}`);
  }
  return path;
}

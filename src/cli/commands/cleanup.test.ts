import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { writeIdentityRecord } from '../../identity/record.js';
import { applyRequiredEnv } from '../../../tests/helpers/env.js';
import { runCleanup } from './cleanup.js';

describe('runCleanup', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  it('deregisters the recorded runner and deletes its identity', async () => {
    applyRequiredEnv({ RUNNER_NAME: 'runner-1' });
    const runnerHome = process.env.RUNNER_HOME ?? '';
    await writeIdentityRecord(runnerHome, { agentId: 17, agentName: 'runner-1' });
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

    expect(await runCleanup()).toBe(0);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://api.github.com/orgs/acme/actions/runners/17');
    expect(init?.method).toBe('DELETE');
    expect(existsSync(join(runnerHome, '.runner'))).toBe(false);
  });

  it('exits without a network call when nothing is registered', async () => {
    applyRequiredEnv();

    expect(await runCleanup()).toBe(0);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails on an invalid configuration', async () => {
    applyRequiredEnv({ GITHUB_TOKEN: undefined });

    expect(await runCleanup()).toBe(1);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

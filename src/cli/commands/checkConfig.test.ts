import { describe, expect, it } from 'vitest';
import { applyRequiredEnv } from '../../../tests/helpers/env.js';
import { checkConfig } from './checkConfig.js';

describe('checkConfig', () => {
  it('prints a summary of a valid configuration', () => {
    applyRequiredEnv({ RUNNER_HOME: '/srv/runner', RUNNER_NAME: 'runner-1' });
    const lines: string[] = [];

    expect(checkConfig((line) => lines.push(line))).toBe(0);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      scope: 'organization:acme',
      name: 'runner-1',
      labels: 'linux',
      group: 'default',
      workDir: '/srv/runner/_work',
      runnerHome: '/srv/runner',
      runAsPrivileged: false,
      replaceExisting: false,
      ephemeral: false,
    });
  });

  it('lists every issue of an invalid configuration', () => {
    applyRequiredEnv({ GITHUB_TOKEN: undefined });
    const lines: string[] = [];

    expect(checkConfig((line) => lines.push(line))).toBe(1);
    expect(lines).toEqual([
      'Invalid runner configuration:',
      '  - Missing required config: GITHUB_TOKEN',
    ]);
  });
});

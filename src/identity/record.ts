import { existsSync } from 'node:fs';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export const IDENTITY_RECORD_FILE = '.runner';
export const CREDENTIAL_FILES = ['.credentials', '.credentials_rsaparams'] as const;

export type IdentityRecord = {
  agentId?: number;
  agentName: string;
  poolName?: string;
  serverUrl?: string;
  workFolder?: string;
  labels?: string[];
  configuredAt?: string;
};

export function identityRecordPath(runnerHome: string): string {
  return join(runnerHome, IDENTITY_RECORD_FILE);
}

export function hasIdentityRecord(runnerHome: string): boolean {
  return existsSync(identityRecordPath(runnerHome));
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value : undefined;
}

function optionalId(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return undefined;
}

/** Parses a record body; the runner tool writes it with a UTF-8 BOM. */
export function parseIdentityRecord(raw: string): IdentityRecord {
  const parsed = JSON.parse(raw.replace(/^\uFEFF/, '')) as unknown;
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Identity record must be a JSON object.');
  }
  const data = parsed as Record<string, unknown>;
  const agentName = optionalString(data.agentName);
  if (!agentName) {
    throw new Error('Identity record is missing agentName.');
  }
  const agentId = optionalId(data.agentId);
  const poolName = optionalString(data.poolName);
  const serverUrl = optionalString(data.serverUrl) ?? optionalString(data.gitHubUrl);
  const workFolder = optionalString(data.workFolder);
  const configuredAt = optionalString(data.configuredAt);
  const labels = Array.isArray(data.labels)
    ? data.labels.filter((label): label is string => typeof label === 'string')
    : undefined;

  return {
    agentName,
    ...(agentId !== undefined ? { agentId } : {}),
    ...(poolName ? { poolName } : {}),
    ...(serverUrl ? { serverUrl } : {}),
    ...(workFolder ? { workFolder } : {}),
    ...(labels ? { labels } : {}),
    ...(configuredAt ? { configuredAt } : {}),
  };
}

export async function readIdentityRecord(runnerHome: string): Promise<IdentityRecord | null> {
  if (!hasIdentityRecord(runnerHome)) return null;
  const raw = await readFile(identityRecordPath(runnerHome), 'utf8');
  return parseIdentityRecord(raw);
}

export async function writeIdentityRecord(
  runnerHome: string,
  record: IdentityRecord,
): Promise<void> {
  await writeFile(identityRecordPath(runnerHome), `${JSON.stringify(record, null, 2)}\n`, {
    mode: 0o600,
  });
}

/** Deletes the record and its credential files. Returns the names that existed. */
export async function removeIdentityRecord(runnerHome: string): Promise<string[]> {
  const removed: string[] = [];
  for (const name of [IDENTITY_RECORD_FILE, ...CREDENTIAL_FILES]) {
    const path = join(runnerHome, name);
    if (!existsSync(path)) continue;
    await rm(path, { force: true });
    removed.push(name);
  }
  return removed;
}

import os from 'node:os';
import { getTomlNumber, getTomlString, getTomlStringArray } from './toml.js';

export function parseCommaList(value?: string): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function parseBooleanValue(raw: string, name: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off', ''].includes(normalized)) return false;
  throw new Error(`Invalid ${name} value: ${raw}. Use true/false.`);
}

export function resolveOptionalFlagFromSources(
  name: string,
  tomlValue: unknown,
  defaultValue = false,
): boolean {
  const raw = process.env[name];
  if (raw !== undefined) return parseBooleanValue(raw, name);
  if (tomlValue === undefined) return defaultValue;
  if (typeof tomlValue === 'boolean') return tomlValue;
  if (typeof tomlValue === 'string') return parseBooleanValue(tomlValue, `${name} (toml)`);
  throw new Error(`Invalid ${name} in TOML. Use true/false.`);
}

export function resolveStringValue(
  envName: string,
  tomlValue: unknown,
  options: { required?: boolean; defaultValue?: string } = {},
): string | undefined {
  const envRaw = process.env[envName];
  if (envRaw !== undefined) {
    const trimmed = envRaw.trim();
    if (trimmed !== '') return trimmed;
  }
  const tomlString = getTomlString(tomlValue, envName);
  if (tomlString !== undefined) {
    const trimmed = tomlString.trim();
    if (trimmed !== '') return trimmed;
  }
  if (options.defaultValue !== undefined) return options.defaultValue;
  if (options.required) throw new Error(`Missing required config: ${envName}`);
  return undefined;
}

function expandHomePath(value: string): string {
  const home = os.homedir();
  if (value === '~') return home;
  if (value.startsWith('~/')) return `${home}/${value.slice(2)}`;
  if (value === '$HOME') return home;
  if (value.startsWith('$HOME/')) return `${home}/${value.slice(6)}`;
  if (value === '${HOME}') return home;
  if (value.startsWith('${HOME}/')) return `${home}/${value.slice(8)}`;
  return value;
}

export function resolvePathValue(
  envName: string,
  tomlValue: unknown,
  options: { required?: boolean; defaultValue?: string } = {},
): string | undefined {
  const raw = resolveStringValue(envName, tomlValue, options);
  if (!raw) return raw;
  return expandHomePath(raw);
}

export function resolveStringArrayFromSources(envName: string, tomlValue: unknown): string[] {
  const envRaw = process.env[envName];
  if (envRaw !== undefined && envRaw.trim() !== '') return parseCommaList(envRaw);
  const tomlArray = getTomlStringArray(tomlValue, envName);
  return (tomlArray ?? []).map((item) => item.trim()).filter(Boolean);
}

export function resolvePositiveIntegerFromSources(
  envName: string,
  tomlValue: unknown,
  defaultValue: number,
): number {
  const envRaw = process.env[envName];
  if (envRaw !== undefined && envRaw.trim() !== '') {
    const normalized = envRaw.trim();
    if (!/^\d+$/.test(normalized)) {
      throw new Error(`Invalid ${envName}. Expected a positive integer.`);
    }
    const parsed = Number.parseInt(normalized, 10);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new Error(`Invalid ${envName}. Expected a positive integer.`);
    }
    return parsed;
  }

  const tomlNumber = getTomlNumber(tomlValue, envName);
  if (tomlNumber !== undefined) {
    if (!Number.isInteger(tomlNumber) || tomlNumber < 1) {
      throw new Error(`Invalid ${envName} in TOML. Expected a positive integer.`);
    }
    return tomlNumber;
  }

  return defaultValue;
}

import os from 'node:os';

export class InvalidSettingError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = 'InvalidSettingError';
    this.key = key;
  }
}

export function parseBooleanValue(raw: string, name: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  throw new InvalidSettingError(name, `Invalid ${name} value: ${raw}. Use true/false.`);
}

export function resolveOptionalFlag(
  name: string,
  fileValue: string | undefined,
  defaultValue = false,
): boolean {
  if (fileValue !== undefined && fileValue.trim() !== '') return parseBooleanValue(fileValue, name);
  const envRaw = process.env[name];
  if (envRaw !== undefined && envRaw.trim() !== '') return parseBooleanValue(envRaw, name);
  return defaultValue;
}

export function resolveStringValue(
  envName: string,
  options: { defaultValue?: string } = {},
): string | undefined {
  const envRaw = process.env[envName];
  if (envRaw !== undefined) {
    const trimmed = envRaw.trim();
    if (trimmed !== '') return trimmed;
  }
  return options.defaultValue;
}

export function resolvePositiveInteger(envName: string, defaultValue: number): number {
  const raw = process.env[envName];
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const normalized = raw.trim();
  if (!/^\d+$/.test(normalized)) {
    throw new InvalidSettingError(envName, `Invalid ${envName}. Expected a positive integer.`);
  }
  const parsed = Number.parseInt(normalized, 10);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidSettingError(envName, `Invalid ${envName}. Expected a positive integer.`);
  }
  return parsed;
}

export function expandHomePath(value: string): string {
  const home = os.homedir();
  if (value === '~') return home;
  if (value.startsWith('~/')) return `${home}/${value.slice(2)}`;
  if (value === '$HOME') return home;
  if (value.startsWith('$HOME/')) return `${home}/${value.slice(6)}`;
  if (value === '${HOME}') return home;
  if (value.startsWith('${HOME}/')) return `${home}/${value.slice(8)}`;
  return value;
}

import fs from 'fs/promises';
import path from 'path';
import { CONFIG_PATH, DEFAULT_DATABASE_PATH } from './dirs';
import { isLogLevel, type LogLevel } from './logger';

export interface HealthCheckConfig {
  timeoutMs: number;
  cacheTtlSeconds: number;
}

export interface AppConfig {
  logLevel: LogLevel;
  databasePath: string;
  commandTimeoutMs: number; // upper bound for every systemctl / ss call
  health: HealthCheckConfig;
}

export const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'info',
  databasePath: DEFAULT_DATABASE_PATH,
  commandTimeoutMs: 10_000,
  health: {
    timeoutMs: 2_000,
    cacheTtlSeconds: 60
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveNumber(value: unknown): number | undefined {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) && n > 0 ? n : undefined;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Lays a partially filled config object over the defaults, dropping keys
 * with the wrong type. Environment variables win over both.
 */
export function resolveConfig(raw: unknown, env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const file = isRecord(raw) ? raw : {};
  const health = isRecord(file.health) ? file.health : {};

  const logLevel = [env.LOG_LEVEL, file.logLevel].find(isLogLevel) ?? DEFAULT_CONFIG.logLevel;

  return {
    logLevel,
    databasePath: nonEmptyString(env.DATABASE_PATH) ?? nonEmptyString(file.databasePath) ?? DEFAULT_CONFIG.databasePath,
    commandTimeoutMs: positiveNumber(env.COMMAND_TIMEOUT_MS) ?? positiveNumber(file.commandTimeoutMs) ?? DEFAULT_CONFIG.commandTimeoutMs,
    health: {
      timeoutMs: positiveNumber(health.timeoutMs) ?? DEFAULT_CONFIG.health.timeoutMs,
      cacheTtlSeconds: positiveNumber(health.cacheTtlSeconds) ?? DEFAULT_CONFIG.health.cacheTtlSeconds
    }
  };
}

export async function getConfig(): Promise<AppConfig> {
  let raw: unknown = {};
  try {
    const content = await fs.readFile(CONFIG_PATH, 'utf-8');
    raw = JSON.parse(content);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      console.warn(`Ignoring unreadable config at ${CONFIG_PATH}:`, error);
    }
  }
  return resolveConfig(raw);
}

export async function saveConfig(config: AppConfig): Promise<void> {
  await fs.mkdir(path.dirname(CONFIG_PATH), { recursive: true });
  await fs.writeFile(CONFIG_PATH, JSON.stringify(config, null, 2));
}

export async function updateConfig(updates: Partial<AppConfig>): Promise<AppConfig> {
  const current = await getConfig();
  const updated: AppConfig = {
    ...current,
    ...updates,
    health: { ...current.health, ...updates.health }
  };
  await saveConfig(updated);
  return updated;
}

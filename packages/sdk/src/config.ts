import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_TTL_SECONDS, InvalidConfigError } from 'roundgrid-protocol';

export type Environment = Record<string, string | undefined>;

export interface GridConfig {
  /** Overrides the timeout of every sendAndReceive call when set */
  messageTimeoutMs?: number;
  pollIntervalMs: number;
  encryptionEnabled: boolean;
  defaultTtlSeconds: number;
}

export const ENV = {
  MSG_TIMEOUT: 'ROUNDGRID_MSG_TIMEOUT',
  POLL_INTERVAL: 'ROUNDGRID_POLL_INTERVAL',
  ENCRYPTION_ENABLED: 'ROUNDGRID_ENCRYPTION_ENABLED',
  DEFAULT_TTL: 'ROUNDGRID_DEFAULT_TTL',
} as const;

function readSeconds(env: Environment, name: string, allowZero: boolean): number | undefined {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
    throw new InvalidConfigError(name, raw);
  }
  return value;
}

/**
 * Read grid settings from the environment. Durations are given in seconds.
 */
export function loadGridConfig(env: Environment = process.env): GridConfig {
  const timeout = readSeconds(env, ENV.MSG_TIMEOUT, true);
  const pollInterval = readSeconds(env, ENV.POLL_INTERVAL, false);
  const ttl = readSeconds(env, ENV.DEFAULT_TTL, false);

  const config: GridConfig = {
    pollIntervalMs: pollInterval === undefined ? DEFAULT_POLL_INTERVAL_MS : pollInterval * 1000,
    encryptionEnabled: env[ENV.ENCRYPTION_ENABLED]?.trim().toLowerCase() !== 'false',
    defaultTtlSeconds: ttl ?? DEFAULT_TTL_SECONDS,
  };
  if (timeout !== undefined) {
    config.messageTimeoutMs = timeout * 1000;
  }
  return config;
}

/**
 * Environment settings with explicit overrides applied on top.
 */
export function resolveGridConfig(overrides: Partial<GridConfig> = {}, env: Environment = process.env): GridConfig {
  const config = loadGridConfig(env);
  return {
    messageTimeoutMs: overrides.messageTimeoutMs ?? config.messageTimeoutMs,
    pollIntervalMs: overrides.pollIntervalMs ?? config.pollIntervalMs,
    encryptionEnabled: overrides.encryptionEnabled ?? config.encryptionEnabled,
    defaultTtlSeconds: overrides.defaultTtlSeconds ?? config.defaultTtlSeconds,
  };
}

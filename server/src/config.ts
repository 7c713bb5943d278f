import fs from 'fs';
import { floor } from '@tubular/math';
import { asLines, toNumber } from '@tubular/util';
import { DEFAULT_NTP_PORT, SntpServerOptions } from './sntp-server';
import { isReferenceSource, ReferenceSource } from './ntp-types';
import { splitIpAndPort } from './util';

export const DEFAULT_ENV_FILE = '.env';

export interface ServerConfig {
  host: string;
  port: number;
  server: Partial<SntpServerOptions>;
}

type Env = Record<string, string | undefined>;

/**
 * Copy `NAME=value` lines from an env file into `env`. Variables already set win, and a missing
 * file is not an error.
 */
export function loadEnvFile(file: string, env: Env = process.env): void {
  if (!fs.existsSync(file))
    return;

  const lines = asLines(fs.readFileSync(file).toString());

  for (const line of lines) {
    const $ = /^\s*(\w+)\s*=\s*([^#]*)/.exec(line);

    if ($ && env[$[1]] == null)
      env[$[1]] = $[2].trim();
  }
}

function positive(value: string | undefined, defaultValue: number): number {
  const n = toNumber(value, defaultValue);

  return n > 0 ? n : defaultValue;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  loadEnvFile(env.SNTP_ENV_FILE || DEFAULT_ENV_FILE, env);

  const [host, port] = splitIpAndPort(env.SNTP_LISTEN || '0.0.0.0', DEFAULT_NTP_PORT);
  const referenceSource = env.SNTP_REFERENCE_SOURCE || ReferenceSource.Local;

  if (!isReferenceSource(referenceSource))
    throw new Error(`Unknown reference source "${referenceSource}"`);

  const sweepSeconds = toNumber(env.SNTP_SWEEP_INTERVAL, 60);

  return {
    host: host || '0.0.0.0',
    port: port ?? DEFAULT_NTP_PORT,
    server: {
      rateLimit: {
        burst: floor(positive(env.SNTP_BURST, 1)) || 1,
        idleTimeout: positive(env.SNTP_CLIENT_IDLE_TIMEOUT, 86_400) * 1000,
        maxClients: floor(positive(env.SNTP_MAX_CLIENTS, 10_000)) || 1,
        minInterval: positive(env.SNTP_MIN_INTERVAL, 10) * 1000
      },
      referenceSource,
      sweepInterval: sweepSeconds > 0 ? sweepSeconds * 1000 : 0
    }
  };
}

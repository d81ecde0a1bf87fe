import dotenv from 'dotenv';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

dotenv.config();

export interface HttpConfig {
  timeoutMs: number;
  userAgent: string;
}

export interface AppConfig {
  dataDir: string;
  profilesPath: string;
  batchesDir: string;
  templatesDir: string;
  /** Value of MAILGOAT_PROFILE, used when --profile is omitted */
  profileOverride: string | undefined;
  http: HttpConfig;
  logging: {
    level: string;
    pretty: boolean;
  };
  environment: string;
}

const DEFAULT_HTTP_TIMEOUT_MS = 15_000;

function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return resolve(path);
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Builds the configuration from an environment map. `config` below is the
 * process-wide instance; tests build their own.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = expandHome(env.MAILGOAT_HOME || '~/.mailgoat');

  return {
    dataDir,
    profilesPath: join(dataDir, 'profiles.json'),
    batchesDir: join(dataDir, 'batches'),
    templatesDir: join(dataDir, 'templates'),
    profileOverride: env.MAILGOAT_PROFILE || undefined,
    http: {
      timeoutMs: parsePositiveInt(env.MAILGOAT_HTTP_TIMEOUT_MS, DEFAULT_HTTP_TIMEOUT_MS),
      userAgent: 'mailgoat-cli/1.0.0',
    },
    logging: {
      level: env.LOG_LEVEL ?? 'info',
      pretty: env.NODE_ENV === 'development',
    },
    environment: env.NODE_ENV || 'production',
  };
}

export const config: AppConfig = loadConfig();

import dotenv from 'dotenv';
import { ConfigError } from '../utils/errors';

dotenv.config();

// winston's npm levels
export const LOG_LEVELS: readonly string[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly nodeEnv: string;
  readonly logLevel: string;

  // Profile owner
  readonly user: {
    readonly email: string;
    readonly name: string;
    readonly stack: string;
  };

  // Cat fact provider
  readonly catFact: {
    readonly apiUrl: string;
    readonly timeoutSeconds: number;
    readonly fallback: string;
  };
}

export type Env = Record<string, string | undefined>;

export const DEFAULTS = {
  port: '8000',
  host: '0.0.0.0',
  nodeEnv: 'development',
  logLevel: 'info',
  userEmail: 'dev@example.com',
  userName: 'Profile Owner',
  userStack: 'Node.js/Express',
  catFactApiUrl: 'https://catfact.ninja/fact',
  catFactTimeout: '5.0',
  catFactFallback: 'Cats are wonderful creatures!',
} as const;

// Largest delay Node's timers accept
export const MAX_TIMER_MS = 2_147_483_647;
export const MAX_TIMEOUT_SECONDS = MAX_TIMER_MS / 1000;

// Blank values fall back to the default.
function read(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Checks a loaded configuration and throws a ConfigError naming every problem found.
 */
export function validateConfig(config: AppConfig): void {
  const problems: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    problems.push('PORT must be an integer between 1 and 65535');
  }
  if (!LOG_LEVELS.includes(config.logLevel)) {
    problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }
  if (!config.user.email) problems.push('USER_EMAIL must not be empty');
  if (!config.user.name) problems.push('USER_NAME must not be empty');
  if (!config.user.stack) problems.push('USER_STACK must not be empty');
  const { timeoutSeconds } = config.catFact;
  if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
    problems.push('CAT_FACT_TIMEOUT must be a positive number of seconds');
  } else if (timeoutSeconds > MAX_TIMEOUT_SECONDS) {
    problems.push(`CAT_FACT_TIMEOUT must not exceed ${MAX_TIMEOUT_SECONDS} seconds`);
  }
  if (!isHttpUrl(config.catFact.apiUrl)) {
    problems.push('CAT_FACT_API_URL must be an absolute http(s) URL');
  }
  if (!config.catFact.fallback) problems.push('CAT_FACT_FALLBACK must not be empty');

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    port: Number(read(env, 'PORT', DEFAULTS.port)),
    host: read(env, 'HOST', DEFAULTS.host),
    nodeEnv: read(env, 'NODE_ENV', DEFAULTS.nodeEnv),
    logLevel: read(env, 'LOG_LEVEL', DEFAULTS.logLevel),
    user: Object.freeze({
      email: read(env, 'USER_EMAIL', DEFAULTS.userEmail),
      name: read(env, 'USER_NAME', DEFAULTS.userName),
      stack: read(env, 'USER_STACK', DEFAULTS.userStack),
    }),
    catFact: Object.freeze({
      apiUrl: read(env, 'CAT_FACT_API_URL', DEFAULTS.catFactApiUrl),
      timeoutSeconds: Number(read(env, 'CAT_FACT_TIMEOUT', DEFAULTS.catFactTimeout)),
      fallback: read(env, 'CAT_FACT_FALLBACK', DEFAULTS.catFactFallback),
    }),
  };

  validateConfig(config);

  return Object.freeze(config);
}

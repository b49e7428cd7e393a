import { loadConfig, AppConfig, Env } from '../src/config/environment';
import { createLogger, Logger } from '../src/utils/logger';
import type { Clock } from '../src/services/profile-service';

export const FACT_HOST = 'http://cat-facts.test';
export const FACT_PATH = '/fact';

export const TEST_ENV: Env = {
  NODE_ENV: 'test',
  USER_EMAIL: 'tester@example.com',
  USER_NAME: 'Test Person',
  USER_STACK: 'TypeScript/Express',
  CAT_FACT_API_URL: `${FACT_HOST}${FACT_PATH}`,
  CAT_FACT_TIMEOUT: '0.2',
  CAT_FACT_FALLBACK: 'Cats are wonderful creatures!'
};

export function testConfig(overrides: Env = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

export function testLogger(): Logger {
  return createLogger({ logLevel: 'info', nodeEnv: 'test' });
}

/** Clock returning the given instants in order, repeating the last one. */
export function sequenceClock(...isoTimes: string[]): Clock {
  let index = 0;
  return () => {
    const iso = isoTimes[Math.min(index, isoTimes.length - 1)];
    index += 1;
    return new Date(iso);
  };
}

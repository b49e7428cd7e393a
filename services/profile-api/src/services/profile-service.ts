import type { AppConfig } from '../config/environment';
import type { FactClient } from '../clients/cat-fact-client';
import { toFactProviderError } from '../clients/cat-fact-client';
import type { Logger } from '../utils/logger';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface ProfileUser {
  email: string;
  name: string;
  stack: string;
}

export interface ProfileResponse {
  status: 'success';
  user: ProfileUser;
  timestamp: string;
  fact: string;
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
}

/**
 * UTC ISO 8601 timestamp, taken from the clock on every call.
 * Millisecond precision with the `Z` designator, e.g. `2026-10-19T14:17:12.880Z`.
 */
export function isoTimestamp(clock: Clock): string {
  return clock().toISOString();
}

export class ProfileService {
  private readonly user: AppConfig['user'];
  private readonly fallbackFact: string;
  private readonly factClient: FactClient;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: {
    config: Pick<AppConfig, 'user' | 'catFact'>;
    factClient: FactClient;
    logger: Logger;
    clock?: Clock;
  }) {
    this.user = deps.config.user;
    this.fallbackFact = deps.config.catFact.fallback;
    this.factClient = deps.factClient;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Fetch a fresh fact, or the configured fallback if the provider fails in any way.
   * Never rejects.
   */
  async getFact(): Promise<string> {
    try {
      const fact = await this.factClient.fetchFact();
      this.logger.debug('Fetched cat fact');
      return fact;
    } catch (error) {
      const failure = toFactProviderError(error);
      this.logger.warn('Cat fact unavailable, using fallback', {
        reason: failure.reason,
        status: failure.status,
        error: failure.message
      });
      return this.fallbackFact;
    }
  }

  async getProfile(): Promise<ProfileResponse> {
    const fact = await this.getFact();

    return {
      status: 'success',
      user: {
        email: this.user.email,
        name: this.user.name,
        stack: this.user.stack
      },
      timestamp: isoTimestamp(this.clock),
      fact
    };
  }
}

import type { FactClient } from '../../src/clients/cat-fact-client';
import { ProfileService, isoTimestamp } from '../../src/services/profile-service';
import { FactProviderError } from '../../src/utils/errors';
import { sequenceClock, testConfig, testLogger } from '../helpers';

class StubFactClient implements FactClient {
  calls = 0;

  constructor(private readonly outcomes: Array<string | Error>) {}

  async fetchFact(): Promise<string> {
    const outcome = this.outcomes[Math.min(this.calls, this.outcomes.length - 1)];
    this.calls += 1;
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

describe('ProfileService', () => {
  const config = testConfig();

  it('should compose the profile from configuration, clock and fetched fact', async () => {
    const service = new ProfileService({
      config,
      factClient: new StubFactClient(['Cats have five toes on their front paws.']),
      logger: testLogger(),
      clock: sequenceClock('2026-10-19T14:17:12.880Z')
    });

    await expect(service.getProfile()).resolves.toEqual({
      status: 'success',
      user: {
        email: 'tester@example.com',
        name: 'Test Person',
        stack: 'TypeScript/Express'
      },
      timestamp: '2026-10-19T14:17:12.880Z',
      fact: 'Cats have five toes on their front paws.'
    });
  });

  it('should substitute the fallback and log the reason when the provider fails', async () => {
    const logger = testLogger();
    const warn = jest.spyOn(logger, 'warn');
    const service = new ProfileService({
      config,
      factClient: new StubFactClient([new FactProviderError('http_status', 'Cat fact provider returned status 500', { status: 500 })]),
      logger
    });

    const profile = await service.getProfile();

    expect(profile.status).toBe('success');
    expect(profile.fact).toBe('Cats are wonderful creatures!');
    expect(warn).toHaveBeenCalledWith('Cat fact unavailable, using fallback', {
      reason: 'http_status',
      status: 500,
      error: 'Cat fact provider returned status 500'
    });
  });

  it('should absorb unexpected errors from the client as well', async () => {
    const service = new ProfileService({
      config,
      factClient: new StubFactClient([new TypeError('boom')]),
      logger: testLogger()
    });

    await expect(service.getFact()).resolves.toBe('Cats are wonderful creatures!');
  });

  it('should fetch a new fact and timestamp on every call', async () => {
    const client = new StubFactClient(['First fact', 'Second fact']);
    const service = new ProfileService({
      config,
      factClient: client,
      logger: testLogger(),
      clock: sequenceClock('2026-10-19T10:00:00.000Z', '2026-10-19T10:00:01.500Z')
    });

    const first = await service.getProfile();
    const second = await service.getProfile();

    expect(client.calls).toBe(2);
    expect([first.fact, second.fact]).toEqual(['First fact', 'Second fact']);
    expect([first.timestamp, second.timestamp]).toEqual(['2026-10-19T10:00:00.000Z', '2026-10-19T10:00:01.500Z']);
  });

  it('should return a copy of the configured user rather than the frozen config object', async () => {
    const service = new ProfileService({ config, factClient: new StubFactClient(['x']), logger: testLogger() });

    const profile = await service.getProfile();

    expect(profile.user).not.toBe(config.user);
    expect(Object.keys(profile.user)).toEqual(['email', 'name', 'stack']);
  });
});

describe('isoTimestamp', () => {
  it('should format the clock reading as UTC ISO 8601', () => {
    expect(isoTimestamp(() => new Date(Date.UTC(2026, 9, 19, 8, 5, 3, 7)))).toBe('2026-10-19T08:05:03.007Z');
  });
});

import axios, { AxiosInstance } from 'axios';
import { AppConfig, MAX_TIMER_MS } from '../config/environment';
import { FactProviderError } from '../utils/errors';

export interface FactClient {
  fetchFact(): Promise<string>;
}

interface CatFactBody {
  fact: string;
}

function isCatFactBody(data: unknown): data is CatFactBody {
  return (
    typeof data === 'object' &&
    data !== null &&
    'fact' in data &&
    typeof data.fact === 'string' &&
    data.fact.trim().length > 0
  );
}

/**
 * Translates whatever axios rejected with into a FactProviderError.
 */
export function toFactProviderError(error: unknown): FactProviderError {
  if (error instanceof FactProviderError) return error;

  // Aborted by the per-call deadline signal
  if (axios.isCancel(error) || (error instanceof Error && error.name === 'AbortError')) {
    return new FactProviderError('timeout', 'Cat fact provider timed out', { cause: error });
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new FactProviderError('timeout', 'Cat fact provider timed out', { cause: error });
    }
    if (error.response) {
      const { status } = error.response;
      return new FactProviderError('http_status', `Cat fact provider returned status ${status}`, {
        status,
        cause: error
      });
    }
    return new FactProviderError('network', `Cat fact provider unreachable: ${error.message}`, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FactProviderError('network', `Cat fact request failed: ${message}`, { cause: error });
}

/**
 * Seconds to whole milliseconds, kept within 1..MAX_TIMER_MS.
 * axios reads a 0 timeout as "no timeout", and Node fires oversized timers at once.
 */
export function timeoutMs(seconds: number): number {
  return Math.min(MAX_TIMER_MS, Math.max(1, Math.ceil(seconds * 1000)));
}

/**
 * HTTP client for the third-party cat fact provider.
 * One request per call; no retries and nothing cached.
 *
 * axios's `timeout` only covers socket inactivity, so every call also carries an
 * abort signal that bounds the whole exchange, connect and body included.
 */
export class CatFactClient implements FactClient {
  private readonly http: AxiosInstance;
  private readonly url: string;
  private readonly deadlineMs: number;

  constructor(settings: AppConfig['catFact']) {
    this.url = settings.apiUrl;
    this.deadlineMs = timeoutMs(settings.timeoutSeconds);
    this.http = axios.create({
      timeout: this.deadlineMs,
      headers: { Accept: 'application/json' }
    });
  }

  async fetchFact(): Promise<string> {
    let data: unknown;
    try {
      ({ data } = await this.http.get<unknown>(this.url, { signal: AbortSignal.timeout(this.deadlineMs) }));
    } catch (error) {
      throw toFactProviderError(error);
    }

    if (!isCatFactBody(data)) {
      throw new FactProviderError('malformed_body', 'Cat fact provider response has no usable "fact" field');
    }
    return data.fact;
  }
}

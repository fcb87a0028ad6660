import { err, ok, type FetchError, type Result } from './result';

export interface JsonHttpClient {
  getJson(url: string): Promise<Result<unknown>>;
}

export type FetchImplementation = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchJsonClientOptions {
  timeoutMs?: number;
  fetchImpl?: FetchImplementation;
  userAgent?: string;
}

const DEFAULT_TIMEOUT_MS = 10_000;

function isTimeoutError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }
  // AbortSignal.timeout rejects with a TimeoutError DOMException; a manual abort surfaces as AbortError.
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

export class FetchJsonClient implements JsonHttpClient {
  private readonly timeoutMs: number;

  private readonly fetchImpl: FetchImplementation;

  private readonly userAgent: string;

  constructor({ timeoutMs = DEFAULT_TIMEOUT_MS, fetchImpl, userAgent }: FetchJsonClientOptions = {}) {
    this.timeoutMs = Math.max(1, Math.floor(timeoutMs));
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    this.userAgent = userAgent ?? 'live-event-ranking/0.1';
  }

  public async getJson(url: string): Promise<Result<unknown>> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'User-Agent': this.userAgent,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        return err<FetchError>({ kind: 'timeout', url, timeoutMs: this.timeoutMs });
      }
      const message = error instanceof Error ? error.message : String(error);
      return err<FetchError>({ kind: 'transport', url, status: null, message });
    }

    if (response.status === 404) {
      return err<FetchError>({ kind: 'not-found', url });
    }

    if (!response.ok) {
      return err<FetchError>({
        kind: 'transport',
        url,
        status: response.status,
        message: `Unexpected status ${response.status}`,
      });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (isTimeoutError(error)) {
        return err<FetchError>({ kind: 'timeout', url, timeoutMs: this.timeoutMs });
      }
      const message = error instanceof Error ? error.message : String(error);
      return err<FetchError>({ kind: 'transport', url, status: response.status, message });
    }

    try {
      return ok<unknown>(JSON.parse(text));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Invalid JSON body';
      return err<FetchError>({ kind: 'malformed', url, message });
    }
  }
}

export default FetchJsonClient;

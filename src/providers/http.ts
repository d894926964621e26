/**
 * Bounded HTTP access for provider clients
 */

import {
  ProviderParseError,
  ProviderUnavailableError,
  describeError,
  type ProviderName,
} from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  provider: ProviderName;
  timeoutMs: number;
  userAgent: string;
  fetch?: FetchLike;
}

/**
 * Parses the body, rejecting with the signal's reason once it aborts even if
 * the body stream itself never settles.
 */
function readJson(response: Response, signal: AbortSignal): Promise<unknown> {
  return new Promise<unknown>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    void response.json().then(
      (body: unknown) => {
        signal.removeEventListener('abort', onAbort);
        resolve(body);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class HttpClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * GETs url and parses the JSON body. One timer bounds the whole exchange,
   * headers and body. Every transport failure surfaces as
   * ProviderUnavailableError; body shape is left to the caller.
   */
  async getJson(url: string, symbol: string, method: string): Promise<unknown> {
    const { provider, timeoutMs, userAgent } = this.options;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    const timedOut = (cause?: Error) =>
      new ProviderUnavailableError(
        `${provider} request timed out after ${timeoutMs}ms`,
        provider,
        symbol,
        method,
        null,
        cause
      );

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          signal: controller.signal,
          headers: {
            accept: 'application/json',
            'user-agent': userAgent,
          },
        });
      } catch (error) {
        const cause = error instanceof Error ? error : undefined;
        if (controller.signal.aborted) {
          throw timedOut(cause);
        }
        throw new ProviderUnavailableError(
          `${provider} request failed: ${describeError(error)}`,
          provider,
          symbol,
          method,
          null,
          cause
        );
      }

      if (!response.ok) {
        throw new ProviderUnavailableError(
          `${provider} API error: ${response.status} ${response.statusText}`,
          provider,
          symbol,
          method,
          response.status
        );
      }

      try {
        return await readJson(response, controller.signal);
      } catch (error) {
        if (controller.signal.aborted) {
          throw timedOut(error instanceof Error ? error : undefined);
        }
        throw new ProviderParseError(
          `${provider} returned a non-JSON body: ${describeError(error)}`,
          provider,
          symbol,
          method
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}

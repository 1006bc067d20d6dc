import { retryWithBackoff, type RetryOptions } from "./retry";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string
  ) {
    // query strings carry the API key
    super(`HTTP ${status} for ${url.split("?")[0]}`);
    this.name = "HttpError";
  }

  get retryable(): boolean {
    return this.status >= 500 && this.status < 600;
  }
}

export interface FetchWithRetryOptions extends RetryOptions {
  acceptableStatus?: (status: number) => boolean;
}

/**
 * Wraps the native fetch API with automated retry logic for transient failures.
 * Retries 5xx responses and network-level exceptions; any other unacceptable
 * status fails fast with an HttpError carrying the response body.
 * @param url - The destination endpoint
 * @param init - Standard RequestInit options (headers, method, body, etc.)
 * @param options - Retry behavior and the acceptable status predicate
 * @returns A promise resolving to the successful Response object
 * @example
 * await fetchWithRetry('https://www.googleapis.com/youtube/v3/playlistItems?...', undefined, { maxAttempts: 3 })
 */
export async function fetchWithRetry(
  url: string,
  init?: RequestInit,
  options: FetchWithRetryOptions = {}
): Promise<Response> {
  const {
    acceptableStatus = (status) => status >= 200 && status < 300,
    ...retryOptions
  } = options;

  return retryWithBackoff(
    async () => {
      const res = await fetch(url, init);

      if (!acceptableStatus(res.status)) {
        const body = await res.text().catch(() => "");
        throw new HttpError(res.status, url, body);
      }

      return res;
    },
    {
      ...retryOptions,
      shouldRetry: (err) =>
        (retryOptions.shouldRetry?.(err) ?? true) &&
        (!(err instanceof HttpError) || err.retryable)
    }
  );
}

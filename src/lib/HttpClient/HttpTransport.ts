import { Context, Duration, Effect, Layer } from 'effect';
import { NetworkError, RequestAbortError, type TransportError } from '../errors.js';

/**
 * A response whose status and headers have arrived. Any status counts as
 * completed; only failures to obtain a response are errors. The body stays
 * on the wire until `text` runs.
 */
export interface HttpResponse {
  readonly url: string;
  readonly status: number;
  /** Lower-cased header names */
  readonly headers: Readonly<Record<string, string>>;
  readonly text: Effect.Effect<string, TransportError>;
  /** Abandons the body unread */
  readonly discard: Effect.Effect<void>;
}

export interface HttpRequestOptions {
  readonly timeout: Duration.DurationInput;
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * The network boundary of the crawler. Robots lookups and page fetches both
 * go through it, which keeps every other module free of I/O details.
 */
export interface HttpTransport {
  readonly get: (
    url: string,
    options: HttpRequestOptions
  ) => Effect.Effect<HttpResponse, TransportError>;
}

export const HttpTransport = Context.GenericTag<HttpTransport>('HttpTransport');

/**
 * Transport over the global `fetch`. The headers and the body are each read
 * under the timeout, which aborts the request through an AbortController.
 */
export const makeFetchTransport = (): HttpTransport => ({
  get: (url, options) =>
    Effect.gen(function* () {
      const timeoutMs = Duration.toMillis(Duration.decode(options.timeout));
      const controller = new AbortController();

      const abortable = <A>(run: () => Promise<A>) =>
        Effect.suspend(() => {
          const startMs = Date.now();
          return Effect.tryPromise({
            try: async (signal) => {
              const onAbort = () => controller.abort();
              signal.addEventListener('abort', onAbort);
              const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
              try {
                return await run();
              } finally {
                clearTimeout(timeoutId);
                signal.removeEventListener('abort', onAbort);
              }
            },
            catch: (error): TransportError =>
              error instanceof Error && error.name === 'AbortError'
                ? RequestAbortError.timeout(url, Date.now() - startMs)
                : NetworkError.fromCause(url, error),
          });
        });

      const response = yield* abortable(() =>
        fetch(url, {
          headers: options.headers,
          redirect: 'follow',
          signal: controller.signal,
        })
      );

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      const completed: HttpResponse = {
        url: response.url || url,
        status: response.status,
        headers,
        text: abortable(() => response.text()),
        discard: Effect.sync(() => controller.abort()),
      };
      return completed;
    }),
});

export const FetchHttpTransportLive = Layer.sync(HttpTransport, makeFetchTransport);

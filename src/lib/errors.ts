import { Data } from 'effect';

/**
 * Transport-level failures (connection refused, reset, DNS).
 */
export class NetworkError extends Data.TaggedError('NetworkError')<{
  readonly url: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(url: string, cause: unknown): NetworkError {
    return new NetworkError({
      url,
      cause,
      message: `Failed to fetch ${url}: ${cause}`,
    });
  }
}

/**
 * A request aborted because it outlived its timeout.
 */
export class RequestAbortError extends Data.TaggedError('RequestAbortError')<{
  readonly url: string;
  readonly duration: number;
  readonly reason: 'timeout';
  readonly message: string;
}> {
  static timeout(url: string, duration: number): RequestAbortError {
    return new RequestAbortError({
      url,
      duration,
      reason: 'timeout',
      message: `Request to ${url} aborted after ${duration}ms due to timeout`,
    });
  }
}

/**
 * Errors a transport may raise for a single request. Both are retryable.
 */
export type TransportError = NetworkError | RequestAbortError;

/**
 * Robots.txt fetching errors
 */
export class RobotsTxtError extends Data.TaggedError('RobotsTxtError')<{
  readonly url: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(url: string, cause: unknown): RobotsTxtError {
    return new RobotsTxtError({
      url,
      cause,
      message: `Failed to fetch robots.txt: ${cause}`,
    });
  }
}

/**
 * Raised once every attempt allowed by the retry policy has failed.
 */
export class FetchError extends Data.TaggedError('FetchError')<{
  readonly url: string;
  readonly attempts: number;
  readonly cause: TransportError;
  readonly message: string;
}> {
  static exhausted(
    url: string,
    attempts: number,
    cause: TransportError
  ): FetchError {
    return new FetchError({
      url,
      attempts,
      cause,
      message: `Giving up on ${url} after ${attempts} attempt(s): ${cause.message}`,
    });
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends Data.TaggedError('ConfigurationError')<{
  readonly message: string;
  readonly details?: unknown;
}> {}

/**
 * File system errors
 */
export class FileSystemError extends Data.TaggedError('FileSystemError')<{
  readonly operation: 'write' | 'create';
  readonly path: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static write(path: string, cause: unknown): FileSystemError {
    return new FileSystemError({
      operation: 'write',
      path,
      cause,
      message: `Failed to write file ${path}: ${cause}`,
    });
  }

  static create(path: string, cause: unknown): FileSystemError {
    return new FileSystemError({
      operation: 'create',
      path,
      cause,
      message: `Failed to create directory ${path}: ${cause}`,
    });
  }
}

export type CrawlerError =
  | NetworkError
  | RequestAbortError
  | RobotsTxtError
  | FetchError
  | ConfigurationError
  | FileSystemError;

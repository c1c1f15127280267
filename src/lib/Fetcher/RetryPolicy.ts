import { Duration, Schedule } from 'effect';

/**
 * Bounded retry policy for page fetches.
 *
 * `backoff(attempt)` is the pause after the given failed attempt (1-based).
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly backoff: (attempt: number) => Duration.DurationInput;
}

export const fixedDelay = (
  maxAttempts: number,
  delay: Duration.DurationInput
): RetryPolicy => ({
  maxAttempts,
  backoff: () => delay,
});

/**
 * Schedule that allows `maxAttempts - 1` retries, pausing `backoff(n)` after
 * the n-th failure.
 */
export const retrySchedule = (policy: RetryPolicy) =>
  Schedule.recurs(Math.max(0, policy.maxAttempts - 1)).pipe(
    Schedule.addDelay((retriesSoFar) => policy.backoff(retriesSoFar + 1))
  );

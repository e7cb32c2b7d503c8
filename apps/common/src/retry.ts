import { logger } from "./logger.js";

export type Sleep = (ms: number) => Promise<void>;

export const wait: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  retries: number;
  initialBackoffMs: number;
  sleep?: Sleep;
}

export async function withRetry<T>(
  actionName: string,
  policy: RetryPolicy,
  handler: (attempt: number) => Promise<T>,
  shouldRetry: (result: T) => boolean,
): Promise<T> {
  const sleep = policy.sleep ?? wait;
  const attempts = policy.retries + 1;
  let currentAttempt = 1;

  for (;;) {
    const result = await handler(currentAttempt);
    if (currentAttempt >= attempts || !shouldRetry(result)) {
      return result;
    }

    const sleepMs = policy.initialBackoffMs * Math.pow(2, currentAttempt - 1);
    logger.warn("retrying action", {
      actionName,
      attempt: currentAttempt,
      sleepMs,
    });
    await sleep(sleepMs);
    currentAttempt += 1;
  }
}

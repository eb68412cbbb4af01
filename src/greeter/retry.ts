import pRetry, { AbortError } from "p-retry";

import type { SubsystemLogger } from "../logging.js";

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
};

/**
 * Runs `run` up to `policy.attempts` times with exponential backoff and re-raises the
 * last failure. Throw `AbortError` from `run` to stop without further attempts.
 */
export async function withRetry<T>(params: {
  label: string;
  policy: RetryPolicy;
  run: (attemptNumber: number) => Promise<T>;
  logger?: SubsystemLogger;
  context?: Record<string, unknown>;
}): Promise<T> {
  const { label, policy, logger, context } = params;
  return await pRetry(params.run, {
    retries: Math.max(0, policy.attempts - 1),
    factor: 2,
    minTimeout: policy.baseDelayMs,
    randomize: false,
    onFailedAttempt: (error) => {
      logger?.warn(
        {
          ...context,
          attempt: error.attemptNumber,
          retriesLeft: error.retriesLeft,
          err: error.message,
        },
        `${label} attempt failed`,
      );
    },
  });
}

export { AbortError };

// SPDX-License-Identifier: Apache-2.0

import * as constants from '../constants.js';
import {AdapterError} from '../errors/adapter-error.js';
import {sleep} from '../helpers.js';
import {Duration} from '../time/duration.js';

export interface WebhookRetryBackoff {
  initialDelay: Duration;
  factor: number;
  /** the number of attempts, including the first */
  steps: number;
}

export function defaultWebhookRetryBackoff(): WebhookRetryBackoff {
  return {
    initialDelay: constants.DEFAULT_WEBHOOK_RETRY_INITIAL_DELAY,
    factor: constants.DEFAULT_WEBHOOK_RETRY_FACTOR,
    steps: constants.DEFAULT_WEBHOOK_RETRY_STEPS,
  };
}

/**
 * Call a webhook until it succeeds or the backoff runs out of steps
 * @param operation - the webhook call
 * @param backoff - the delays between attempts
 * @throws AdapterError caused by the last failure
 */
export async function retryWithBackoff<T>(operation: () => Promise<T>, backoff: WebhookRetryBackoff): Promise<T> {
  let delay = backoff.initialDelay.toMillis();
  let lastError: unknown;
  for (let attempt = 1; attempt <= backoff.steps; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
    }
    if (attempt < backoff.steps && delay > 0) {
      await sleep(Duration.ofMillis(delay));
    }
    delay *= backoff.factor;
  }
  throw new AdapterError(`webhook call failed after ${backoff.steps} attempt(s)`, lastError);
}

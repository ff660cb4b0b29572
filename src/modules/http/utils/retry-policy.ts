/**
 * Retry Policy
 *
 * The single decision procedure behind every request the executor sends:
 * given the attempt index and what happened, either wait and retry or fail
 * with a typed error. Pure, so it is tested without any transport.
 */

import {
  ConnectionError,
  classifyResponse,
  classifyTransportFailure,
  createApiError,
} from '@/modules/errors';
import { retryConfig } from '../config';
import type { HttpHeaders, RetryContext, RetryDecision } from '../types';

/**
 * Schedule delay for an attempt index: 1s, 2s, then 4s from index 2 on
 */
export function getBackoffDelay(attempt: number): number {
  const schedule = retryConfig.backoffScheduleMs;
  return schedule[Math.min(Math.max(attempt, 0), schedule.length - 1)];
}

/**
 * Retry-After in milliseconds, when the header holds a non-negative number of seconds
 */
export function parseRetryAfter(headers: HttpHeaders): number | undefined {
  const value = headers[retryConfig.retryAfterHeader];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const seconds = Number(value.trim());
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }
  return seconds * 1000;
}

export function decideRetry({ attempt, maxRetries, outcome }: RetryContext): RetryDecision {
  const attemptsRemain = attempt < maxRetries;

  if (outcome.type === 'transport-error') {
    const failure = classifyTransportFailure(outcome.error);
    if (failure.retryable && attemptsRemain) {
      return { action: 'retry', delayMs: getBackoffDelay(attempt) };
    }
    return {
      action: 'fail',
      error: new ConnectionError(
        `Connection failed after ${attempt + 1} attempts: ${failure.message}`,
        { cause: outcome.error }
      ),
    };
  }

  const classification = classifyResponse(outcome.status, outcome.body);
  if (!classification.retryable) {
    return { action: 'fail', error: classification.error };
  }

  if (attemptsRemain) {
    // Server hint wins over the schedule whenever it parses
    const delayMs = parseRetryAfter(outcome.headers) ?? getBackoffDelay(attempt);
    return { action: 'retry', delayMs };
  }

  return { action: 'fail', error: createApiError(outcome.status, outcome.body) };
}

/**
 * JSON-over-HTTP client for knowledge sources.
 * Per-call timeout, bounded retries with backoff on 429/5xx and transport
 * errors; failures come back as values, never as exceptions.
 */

import {
  HTTP_BACKOFF_BASE_MS,
  HTTP_BACKOFF_CAP_MS,
  HTTP_BACKOFF_JITTER_MS,
  HTTP_MAX_ATTEMPTS,
} from '../../config/constants';
import { logger } from '../../utils/logger';
import { failure, success, type Result } from '../../utils/result';
import { backoffDelay, delay } from '../../utils/retry';
import type { SourceFailure } from './knowledge.types';

export interface HttpClientOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export type JsonResult = Result<unknown, SourceFailure>;

function fail(error: SourceFailure): JsonResult {
  return failure(error);
}

export function isTransient(error: SourceFailure): boolean {
  switch (error.kind) {
    case 'timeout':
    case 'network':
    case 'rate-limited':
      return true;
    case 'http':
      return (error.status ?? 0) >= 500;
    default:
      return false;
  }
}

function looksLikeJson(contentType: string, body: string): boolean {
  return contentType.includes('json') || body.startsWith('{') || body.startsWith('[');
}

export class JsonHttpClient {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.maxAttempts = options.maxAttempts ?? HTTP_MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? HTTP_BACKOFF_BASE_MS;
    this.maxDelayMs = options.maxDelayMs ?? HTTP_BACKOFF_CAP_MS;
    this.userAgent = options.userAgent ?? 'AcronymGlossary/1.0';
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
  }

  async getJson(url: string, params: Record<string, string> = {}): Promise<JsonResult> {
    const target = new URL(url);
    for (const [key, value] of Object.entries(params)) {
      target.searchParams.set(key, value);
    }

    let lastError: SourceFailure = { kind: 'network', message: 'No request attempted' };

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const outcome = await this.attempt(target);
      if (outcome.ok) {
        return outcome;
      }

      lastError = outcome.error;
      if (!isTransient(lastError)) {
        break;
      }

      if (attempt < this.maxAttempts - 1) {
        const wait = backoffDelay(attempt, {
          baseDelayMs: this.baseDelayMs,
          maxDelayMs: this.maxDelayMs,
          jitterMs: HTTP_BACKOFF_JITTER_MS,
          random: this.random,
        });
        logger.debug(
          { host: target.host, attempt: attempt + 1, wait, kind: lastError.kind },
          'Retrying knowledge request'
        );
        await this.sleep(wait);
      }
    }

    logger.warn(
      { host: target.host, path: target.pathname, kind: lastError.kind, status: lastError.status },
      'Knowledge request failed'
    );
    return fail(lastError);
  }

  private async attempt(target: URL): Promise<JsonResult> {
    try {
      const response = await this.fetchImpl(target, {
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.status !== 200) {
        await response.body?.cancel();
      }
      if (response.status === 429) {
        return fail({ kind: 'rate-limited', status: 429, message: 'Rate limited' });
      }
      if (response.status !== 200) {
        return fail({
          kind: 'http',
          status: response.status,
          message: `Unexpected status ${response.status}`,
        });
      }

      const body = (await response.text()).trim();
      if (!looksLikeJson(response.headers.get('content-type') ?? '', body)) {
        return fail({ kind: 'malformed', status: 200, message: 'Response is not JSON' });
      }

      try {
        const data: unknown = JSON.parse(body);
        return success(data);
      } catch {
        return fail({ kind: 'malformed', status: 200, message: 'Invalid JSON body' });
      }
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return fail({ kind: 'timeout', message: `Timed out after ${this.timeoutMs}ms` });
      }
      return fail({
        kind: 'network',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

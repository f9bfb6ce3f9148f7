import { createHmac } from 'node:crypto';

import Bottleneck from 'bottleneck';
import pRetry from 'p-retry';
import type { Logger } from 'pino';
import pino from 'pino';
import { fetch, type Dispatcher, type RequestInit } from 'undici';
import { z } from 'zod';

import type { TerminalEnv } from '../config/env.js';

type Primitive = string | number | boolean;
export type QueryParams = Record<string, Primitive | undefined>;

export type TerminalClientOptions = {
  env: TerminalEnv;
  logger?: Logger;
  rateLimitRps?: number;
  requestTimeoutMs?: number;
  retryCount?: number;
  /** undici dispatcher, e.g. a MockAgent in tests. */
  dispatcher?: Dispatcher;
};

const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
const DEFAULT_RETRY_COUNT = 3;
const DEFAULT_RATE_LIMIT_RPS = 10;

const serverTimeSchema = z.object({ serverTime: z.number().finite() });

export function buildSortedQueryString(params: QueryParams = {}): string {
  const entries = Object.entries(params)
    .filter(([, value]) => value !== undefined)
    .sort(([left], [right]) => left.localeCompare(right));

  const query = new URLSearchParams();
  for (const [key, value] of entries) {
    query.set(key, String(value));
  }

  return query.toString();
}

export function signTerminalPayload(apiKey: string, timestamp: string, paramString: string, secret: string): string {
  const payload = `${apiKey}${timestamp}${paramString}`;
  return createHmac('sha256', secret).update(payload).digest('hex');
}

/**
 * HTTP client for the terminal bridge. Every private call is signed and goes
 * through one rate limiter. Reads are retried on 429, 5xx and network
 * failures; writes never are.
 * Responses come back unparsed; callers validate them.
 */
export class TerminalClient {
  private readonly env: TerminalEnv;
  private readonly logger: Logger;
  private readonly limiter: Bottleneck;
  private readonly requestTimeoutMs: number;
  private readonly retryCount: number;
  private readonly dispatcher?: Dispatcher;
  private serverTimeOffsetMs = 0;

  constructor(options: TerminalClientOptions) {
    this.env = options.env;
    this.logger = options.logger ?? pino({ name: 'terminal-client' });
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryCount = options.retryCount ?? DEFAULT_RETRY_COUNT;
    this.dispatcher = options.dispatcher;

    const rateLimitRps = options.rateLimitRps ?? DEFAULT_RATE_LIMIT_RPS;
    const minTimeMs = Math.ceil(1000 / Math.max(1, rateLimitRps));
    this.limiter = new Bottleneck({ maxConcurrent: 1, minTime: minTimeMs });
  }

  async publicGet(path: string, params: QueryParams = {}): Promise<unknown> {
    const query = buildSortedQueryString(params);
    const fullPath = query ? `${path}?${query}` : path;

    return this.withRetry(() => this.scheduleRequest(fullPath, { method: 'GET' }), 'publicGet');
  }

  async privateGet(path: string, params: QueryParams = {}): Promise<unknown> {
    const timestamp = this.getRequestTimestamp();
    const paramString = buildSortedQueryString(params);
    const signature = signTerminalPayload(this.env.TERMINAL_API_KEY, timestamp, paramString, this.env.TERMINAL_API_SECRET);

    const query = paramString ? `?${paramString}` : '';
    return this.withRetry(
      () =>
        this.scheduleRequest(`${path}${query}`, {
          method: 'GET',
          headers: this.buildPrivateHeaders(timestamp, signature)
        }),
      'privateGet'
    );
  }

  async privatePost(path: string, body: Record<string, unknown>): Promise<unknown> {
    const timestamp = this.getRequestTimestamp();
    const rawBody = JSON.stringify(body);
    const signature = signTerminalPayload(this.env.TERMINAL_API_KEY, timestamp, rawBody, this.env.TERMINAL_API_SECRET);

    // Writes are never retried; reconciliation on the next tick settles a lost response.
    return this.scheduleRequest(path, {
      method: 'POST',
      headers: {
        ...this.buildPrivateHeaders(timestamp, signature),
        'Content-Type': 'application/json'
      },
      body: rawBody
    });
  }

  async synchronizeServerTimeOffset(timePath = '/api/v1/time'): Promise<number> {
    const parsed = serverTimeSchema.safeParse(await this.publicGet(timePath));
    if (!parsed.success) {
      throw new Error('Invalid server time response from terminal bridge');
    }

    this.serverTimeOffsetMs = parsed.data.serverTime - Date.now();
    this.logger.info({ offsetMs: this.serverTimeOffsetMs }, 'terminal server time offset synchronized');
    return this.serverTimeOffsetMs;
  }

  private getRequestTimestamp(): string {
    return String(Date.now() + this.serverTimeOffsetMs);
  }

  private buildPrivateHeaders(timestamp: string, signature: string): Record<string, string> {
    return {
      'X-Api-Key': this.env.TERMINAL_API_KEY,
      'X-Request-Time': timestamp,
      'X-Signature': signature,
      'X-Recv-Window': String(this.env.RECV_WINDOW_MS)
    };
  }

  private async withRetry<T>(fn: () => Promise<T>, action: string): Promise<T> {
    return pRetry(
      async () => {
        try {
          return await fn();
        } catch (error: unknown) {
          if (!isRetryableError(error) && error instanceof Error) {
            throw new pRetry.AbortError(error);
          }

          throw error;
        }
      },
      {
        retries: this.retryCount,
        factor: 2,
        minTimeout: 100,
        maxTimeout: 2000,
        onFailedAttempt: (error) => {
          this.logger.warn(
            {
              action,
              attemptNumber: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              errorMessage: error.message
            },
            'terminal request attempt failed'
          );
        }
      }
    );
  }

  private async scheduleRequest(path: string, init: RequestInit): Promise<unknown> {
    return this.limiter.schedule(async () => {
      const url = new URL(path, this.env.TERMINAL_BASE_URL).toString();

      const controller = new AbortController();
      const timeoutHandle = setTimeout(() => controller.abort(), this.requestTimeoutMs);

      try {
        this.logger.debug({ method: init.method, path }, 'sending terminal request');

        const response = await fetch(url, {
          ...init,
          signal: controller.signal,
          dispatcher: this.dispatcher
        });

        if (!response.ok) {
          const bodyText = await response.text();
          throw new TerminalHttpError(response.status, bodyText || response.statusText);
        }

        return await response.json();
      } catch (error: unknown) {
        if (isAbortError(error)) {
          throw new TerminalNetworkError('Request timeout reached');
        }

        throw error;
      } finally {
        clearTimeout(timeoutHandle);
      }
    });
  }
}

export class TerminalHttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'TerminalHttpError';
    this.statusCode = statusCode;
  }
}

export class TerminalNetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TerminalNetworkError';
  }
}

function isRetryableError(error: unknown): boolean {
  if (error instanceof TerminalHttpError) {
    return error.statusCode === 429 || (error.statusCode >= 500 && error.statusCode < 600);
  }

  if (error instanceof TerminalNetworkError) {
    return true;
  }

  return error instanceof TypeError;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

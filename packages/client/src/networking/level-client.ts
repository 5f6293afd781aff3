import { LevelErrorResponseSchema, LevelResponseSchema, toLevelDescriptor } from '@maze/shared';
import type { LevelDescriptor } from '@maze/shared';

export type FetchErrorKind = 'not_found' | 'network' | 'server_error' | 'timeout' | 'cancelled';

export interface FetchError {
  kind: FetchErrorKind;
  stageNumber: number;
  message: string;
  status?: number;
}

export type FetchLevelResult =
  | { ok: true; descriptor: LevelDescriptor; cached: boolean }
  | { ok: false; error: FetchError };

export interface FetchInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type FetchFn = (input: string, init?: FetchInit) => Promise<Response>;

// What the engine needs from a level source
export interface LevelSource {
  fetchLevel(stageNumber: number, options?: { signal?: AbortSignal }): Promise<FetchLevelResult>;
}

export interface LevelClientOptions {
  baseUrl: string;
  timeoutMs: number;
  cacheLevels?: boolean;
  fetchImpl?: FetchFn;
}

/**
 * Read-only client for the Level Data Service (`GET {baseUrl}/level/{n}`).
 * Never throws: every failure comes back as a `FetchError`.
 */
export class LevelClient implements LevelSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly cacheLevels: boolean;
  private readonly fetchImpl: FetchFn;
  private readonly cache = new Map<number, LevelDescriptor>();

  constructor(options: LevelClientOptions) {
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new Error(`Level fetch timeout must be a positive number, got ${options.timeoutMs}`);
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.cacheLevels = options.cacheLevels ?? false;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  clearCache(): void {
    this.cache.clear();
  }

  async fetchLevel(stageNumber: number, options: { signal?: AbortSignal } = {}): Promise<FetchLevelResult> {
    if (!Number.isInteger(stageNumber) || stageNumber < 1) {
      return failure('not_found', stageNumber, `Invalid stage number ${stageNumber}`);
    }

    const cached = this.cache.get(stageNumber);
    if (cached) {
      return { ok: true, descriptor: cached, cached: true };
    }

    const url = `${this.baseUrl}/level/${stageNumber}`;
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const callerSignal = options.signal;
    const onCallerAbort = () => controller.abort();
    if (callerSignal?.aborted) controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      console.log(`[LevelClient] Fetching stage ${stageNumber} from ${url}`);
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      const body: unknown = await response.json().catch((err: unknown) => {
        if (controller.signal.aborted) throw err;
        return undefined;
      });

      if (response.status === 404) {
        const notFound = LevelErrorResponseSchema.safeParse(body);
        const message = notFound.success ? notFound.data.error : `Stage ${stageNumber} not found`;
        console.warn(`[LevelClient] ${message}`);
        return failure('not_found', stageNumber, message, response.status);
      }

      if (!response.ok) {
        console.warn(`[LevelClient] Level service error: ${response.status} ${response.statusText}`);
        return failure('server_error', stageNumber, `Level service responded ${response.status}`, response.status);
      }

      const parsed = LevelResponseSchema.safeParse(body);
      if (!parsed.success) {
        console.warn(`[LevelClient] Unexpected response body for stage ${stageNumber}`);
        return failure('server_error', stageNumber, 'Level service returned an invalid body', response.status);
      }
      if (!parsed.data.success) {
        console.warn(`[LevelClient] Level service returned error: ${parsed.data.error}`);
        return failure('server_error', stageNumber, parsed.data.error, response.status);
      }
      if (parsed.data.data.stage_number !== stageNumber) {
        return failure(
          'server_error',
          stageNumber,
          `Requested stage ${stageNumber} but received stage ${parsed.data.data.stage_number}`,
          response.status,
        );
      }

      const descriptor = toLevelDescriptor(parsed.data.data);
      if (this.cacheLevels) this.cache.set(stageNumber, descriptor);
      console.log(`[LevelClient] Loaded stage ${stageNumber} (${descriptor.width}x${descriptor.height})`);
      return { ok: true, descriptor, cached: false };
    } catch (err) {
      if (timedOut) {
        console.warn(`[LevelClient] Stage ${stageNumber} request timed out after ${this.timeoutMs}ms`);
        return failure('timeout', stageNumber, `Request timed out after ${this.timeoutMs}ms`);
      }
      if (callerSignal?.aborted) {
        return failure('cancelled', stageNumber, 'Request cancelled');
      }
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[LevelClient] Network error fetching stage ${stageNumber}: ${message}`);
      return failure('network', stageNumber, message);
    } finally {
      clearTimeout(timeout);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

function failure(kind: FetchErrorKind, stageNumber: number, message: string, status?: number): FetchLevelResult {
  return { ok: false, error: status === undefined ? { kind, stageNumber, message } : { kind, stageNumber, message, status } };
}

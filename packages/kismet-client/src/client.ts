import { Buffer } from 'node:buffer';
import { fetch, Headers } from 'undici';
import type { Response } from 'undici';
import { z } from 'zod';
import { KismetClientError } from './errors';
import type {
  DeviceRecord,
  KismetClientOptions,
  KismetCredentials,
  RecentDevicesInput
} from './types';

const DEFAULT_TIMEOUT_MS = 5_000;

const deviceListSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Forwards a caller's abort into the request controller. Returns the
 * listener cleanup so long-lived signals do not accumulate handlers.
 */
function forwardAbort(controller: AbortController, signal?: AbortSignal): () => void {
  if (!signal) {
    return () => undefined;
  }
  if (signal.aborted) {
    controller.abort(signal.reason);
    return () => undefined;
  }
  const onAbort = () => controller.abort(signal.reason);
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}

function encodeBasicAuth(credentials: KismetCredentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
  return `Basic ${token}`;
}

function describeCause(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause;
    if (cause instanceof Error && cause.message) {
      return `${err.message}: ${cause.message}`;
    }
    return err.message;
  }
  return String(err);
}

/**
 * Kismet accepts a negative timestamp as "seconds before now" on the
 * last-time device view.
 */
export function recentDevicesPath(windowSeconds: number): string {
  const seconds = Math.max(0, Math.trunc(windowSeconds));
  return `devices/last-time/-${seconds}/devices.json`;
}

export class KismetClient {
  private readonly baseUrl: URL;
  private readonly timeoutMs: number;
  private readonly credentials?: KismetCredentials;
  private readonly userAgent?: string;

  constructor(options: KismetClientOptions) {
    if (!options.baseUrl) {
      throw new Error('KismetClient requires a baseUrl');
    }
    // Keep any path prefix (reverse proxies) when resolving relative endpoints.
    const normalized = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.baseUrl = new URL(normalized);
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_TIMEOUT_MS;
    this.credentials = options.credentials;
    this.userAgent = options.userAgent;
  }

  async getRecentDevices(input: RecentDevicesInput): Promise<DeviceRecord[]> {
    const url = new URL(recentDevicesPath(input.windowSeconds), this.baseUrl);
    const payload = await this.getJson(url, input.signal);
    const parsed = deviceListSchema.safeParse(payload);
    if (!parsed.success) {
      throw new KismetClientError('Kismet device response was not an array of device objects', {
        statusCode: 200,
        code: 'INVALID_RESPONSE',
        details: parsed.error.issues.slice(0, 5)
      });
    }
    return parsed.data;
  }

  private async getJson(url: URL, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const detach = forwardAbort(controller, signal);
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error('Request timed out'));
    }, this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.buildHeaders(),
        signal: controller.signal
      });

      if (!response.ok) {
        await this.handleErrorResponse(response);
      }

      const text = await response.text();
      try {
        return JSON.parse(text);
      } catch (err) {
        throw new KismetClientError('Kismet returned invalid JSON', {
          statusCode: response.status,
          code: 'INVALID_JSON',
          details: err instanceof Error ? err.message : String(err)
        });
      }
    } catch (err) {
      if (err instanceof KismetClientError) {
        throw err;
      }
      if (signal?.aborted) {
        throw new KismetClientError('Kismet request was aborted', {
          statusCode: 0,
          code: 'ABORTED',
          details: url.toString()
        });
      }
      if (timedOut) {
        throw new KismetClientError(`Kismet request timed out after ${this.timeoutMs}ms`, {
          statusCode: 0,
          code: 'TIMEOUT',
          details: url.toString()
        });
      }
      throw new KismetClientError('Kismet request failed', {
        statusCode: 0,
        code: 'NETWORK_ERROR',
        details: describeCause(err)
      });
    } finally {
      clearTimeout(timeout);
      detach();
    }
  }

  private buildHeaders(): Headers {
    const headers = new Headers({ Accept: 'application/json' });
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    if (this.credentials) {
      headers.set('Authorization', encodeBasicAuth(this.credentials));
    }
    return headers;
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const body = await response.text().catch(() => null);
    throw new KismetClientError(
      `Kismet responded with ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
      {
        statusCode: response.status,
        code: 'HTTP_ERROR',
        details: body
      }
    );
  }
}

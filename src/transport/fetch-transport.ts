/**
 * HTTP transport over the global fetch API.
 *
 * Each request gets its own abort timer; an abort or network error becomes a
 * TransportError so callers can tell "no response" from a bad status.
 */

import { TransportError } from '../errors';
import type { BridgeTransport, TransportResponse } from './transport';

export interface FetchTransportOptions {
  host: string;
  port: number;
}

export class FetchTransport implements BridgeTransport {
  readonly target: string;

  constructor(options: FetchTransportOptions) {
    this.target = `http://${options.host}:${options.port}`;
  }

  get(path: string, timeoutMs: number): Promise<TransportResponse> {
    return this.request('GET', path, undefined, timeoutMs);
  }

  post(path: string, body: string, timeoutMs: number): Promise<TransportResponse> {
    return this.request('POST', path, body, timeoutMs);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body: string | undefined,
    timeoutMs: number,
  ): Promise<TransportResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(`${this.target}${path}`, {
        method,
        headers: body !== undefined ? { 'content-type': 'application/json' } : undefined,
        body,
        signal: controller.signal,
      });
      const text = await res.text();
      return { status: res.status, body: text };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TransportError(method, path, `timed out after ${timeoutMs}ms`);
      }
      throw new TransportError(method, path, describeCause(err));
    } finally {
      clearTimeout(timer);
    }
  }
}

/** fetch wraps socket errors as TypeError('fetch failed') with the real one in cause */
function describeCause(err: unknown): string {
  if (err instanceof Error) {
    const cause: unknown = err.cause;
    if (cause instanceof Error && cause.message) {
      return cause.message;
    }
    return err.message;
  }
  return String(err);
}

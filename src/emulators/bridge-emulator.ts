/**
 * BridgeEmulator: in-process virtual bridge
 *
 * Implements the BridgeTransport interface so a BridgeClient sees no
 * difference between HTTP and the emulator. Serves the same routes and
 * bodies as the real bridge:
 *   GET  /health   200 { status, has_state, last_update, ready_sent, ready_acknowledged }
 *   GET  /state    204 {} before the first state, else 200 { state: "<json>", timestamp }
 *   GET  /ready    200 { ready: true }
 *   POST /action   200 { status: 'sent', command } | 400 { error }
 *
 * Adds fault injection for tests and a command log ring buffer.
 */

import { TransportError } from '../errors';
import { getLogger } from '../logger';
import type { BridgeTransport, TransportResponse } from '../transport/transport';

const log = getLogger('Emulator');

export interface EmulatorLogEntry {
  timestamp: number;
  action: string;
  details: string;
}

interface Fault {
  status: number;
  body: string;
  remaining: number;
}

type Route = 'GET /health' | 'GET /state' | 'GET /ready' | 'POST /action';

export class BridgeEmulator implements BridgeTransport {
  readonly target = 'emulator';

  private latestState: string | null = null;
  private lastUpdate: number | null = null;
  private ready = true;
  private offline = false;
  private readySent = false;
  private readyAcknowledged = false;
  private commands: string[] = [];
  private faults = new Map<string, Fault[]>();
  private requests = new Map<string, number>();
  private _log: EmulatorLogEntry[] = [];
  private readonly maxLogSize = 200;
  private verbose: boolean;

  constructor(verbose = false) {
    this.verbose = verbose;
  }

  // --- Transport surface ---

  async get(path: string, _timeoutMs: number): Promise<TransportResponse> {
    const injected = this.intercept('GET', path);
    if (injected) return injected;

    switch (path) {
      case '/health':
        return json(200, {
          status: this.ready ? 'ready' : 'starting',
          has_state: this.latestState !== null,
          last_update: this.lastUpdate,
          ready_sent: this.readySent,
          ready_acknowledged: this.readyAcknowledged,
        });
      case '/state':
        if (this.latestState === null) {
          return json(204, {});
        }
        return json(200, { state: this.latestState, timestamp: this.lastUpdate });
      case '/ready':
        this.readySent = true;
        this.log('Ready', 'Manual ready handshake');
        return json(200, { ready: true });
      default:
        return json(404, { error: 'Not found' });
    }
  }

  async post(path: string, body: string, _timeoutMs: number): Promise<TransportResponse> {
    const injected = this.intercept('POST', path);
    if (injected) return injected;

    if (path !== '/action') {
      return json(404, { error: 'Not found' });
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      return json(400, { error: 'Invalid JSON' });
    }

    const command = typeof data === 'object' && data !== null && 'command' in data ? data.command : undefined;
    if (typeof command !== 'string' || command === '') {
      return json(400, { error: 'Missing command field' });
    }

    this.commands.push(command);
    this.log('Command', command);
    return json(200, { status: 'sent', command });
  }

  // --- Game side ---

  /**
   * Publish a new snapshot. The marker defaults to the previous one plus 1;
   * pass the current marker explicitly to swap the payload without a change
   * the client can see.
   */
  publishState(state: object | string, timestamp?: number): number {
    this.latestState = typeof state === 'string' ? state : JSON.stringify(state);
    this.lastUpdate = timestamp ?? (this.lastUpdate ?? 0) + 1;
    this.readyAcknowledged = true;
    this.log('Publish', `timestamp=${this.lastUpdate}`);
    return this.lastUpdate;
  }

  /** Drop the current snapshot so /state answers 204 again */
  clearState(): void {
    this.latestState = null;
    this.lastUpdate = null;
  }

  /** Report a non-ready status from /health */
  setReady(ready: boolean): void {
    this.ready = ready;
  }

  /** While offline every request rejects as if the connection was refused */
  setOffline(offline: boolean): void {
    this.offline = offline;
    this.log('Offline', String(offline));
  }

  // --- Fault injection ---

  /** Answer the next `count` requests to route with `status` */
  failNext(route: Route, status: number, count = 1): void {
    this.addFault(route, { status, body: JSON.stringify({ error: 'injected' }), remaining: count });
  }

  /** Answer the next `count` requests to route with 200 and a body that is not JSON */
  corruptNext(route: Route, count = 1): void {
    this.addFault(route, { status: 200, body: '{"state": <truncated', remaining: count });
  }

  // --- Inspection ---

  getCommands(): string[] {
    return [...this.commands];
  }

  /** Number of requests received for a route, faults included */
  requestCount(route: Route): number {
    return this.requests.get(route) ?? 0;
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  // --- Internals ---

  private intercept(method: 'GET' | 'POST', path: string): TransportResponse | null {
    const route = `${method} ${path}`;
    this.requests.set(route, (this.requests.get(route) ?? 0) + 1);

    if (this.offline) {
      throw new TransportError(method, path, 'connect ECONNREFUSED (emulator offline)');
    }

    const queue = this.faults.get(route);
    const fault = queue?.[0];
    if (!queue || !fault) return null;

    fault.remaining--;
    if (fault.remaining <= 0) queue.shift();
    this.log('Fault', `${route} -> ${fault.status}`);
    return { status: fault.status, body: fault.body };
  }

  private addFault(route: Route, fault: Fault): void {
    const queue = this.faults.get(route) ?? [];
    queue.push(fault);
    this.faults.set(route, queue);
  }

  /** Append to ring buffer and log when verbose */
  private log(action: string, details: string): void {
    this._log.push({ timestamp: Date.now(), action, details });
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
    if (this.verbose) {
      log.info(`${action}: ${details}`);
    }
  }
}

function json(status: number, payload: unknown): TransportResponse {
  return { status, body: JSON.stringify(payload) };
}

/**
 * Failure Tracker
 *
 * Counts consecutive request failures. Reaching the threshold forces the
 * session to DISCONNECTED; any success forgives everything before it.
 * LastError survives successes for post-mortem inspection.
 *
 * Emits `failure(kind, message, consecutiveFailures)` for each counted failure.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import type { FailureKind } from '../errors';
import type { ConnectionStatusMachine } from './connection-status';
import type { LastError } from './types';

export class FailureTracker extends EventEmitter {
  private _count = 0;
  private _lastError: LastError | null = null;
  private _lastSuccess: number | null = null;
  private readonly max: number;
  private status: ConnectionStatusMachine;
  private log: Logger;

  constructor(maxConsecutiveFailures: number, status: ConnectionStatusMachine, log: Logger) {
    super();
    this.max = maxConsecutiveFailures;
    this.status = status;
    this.log = log;
  }

  get consecutiveFailures(): number {
    return this._count;
  }

  get maxConsecutiveFailures(): number {
    return this.max;
  }

  get lastError(): LastError | null {
    return this._lastError;
  }

  get lastSuccess(): Date | null {
    return this._lastSuccess !== null ? new Date(this._lastSuccess) : null;
  }

  /**
   * Count a failed request. Returns true when this failure left the counter
   * at or above the threshold.
   */
  recordFailure(kind: FailureKind, message: string): boolean {
    this._count++;
    this.noteError(kind, message);
    this.log.warn({ kind, failures: this._count, max: this.max }, message);
    this.emit('failure', kind, message, this._count);

    if (this._count < this.max) return false;

    if (this.status.status !== 'DISCONNECTED') {
      this.log.error(`${this._count} consecutive failures, disconnecting`);
    }
    this.status.markDisconnected(`${this._count} consecutive failures`);
    return true;
  }

  recordSuccess(): void {
    this._count = 0;
    this._lastSuccess = Date.now();
  }

  /** Set LastError without counting a failure */
  noteError(kind: FailureKind, message: string): void {
    this._lastError = { kind, message, at: new Date() };
  }
}

/**
 * Connection Status Machine
 *
 * DISCONNECTED -> CONNECTED -> WAITING_FOR_STATE -> READY, with a return to
 * DISCONNECTED from anywhere. Transitions go through the mark* methods only;
 * each real change emits `statusChange(next, prev)`.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import type { ConnectionStatus } from './types';

export class ConnectionStatusMachine extends EventEmitter {
  private _status: ConnectionStatus = 'DISCONNECTED';
  private log: Logger;

  constructor(log: Logger) {
    super();
    this.log = log;
  }

  get status(): ConnectionStatus {
    return this._status;
  }

  /** Health probe succeeded. Only a disconnected session moves. */
  markConnected(): boolean {
    if (this._status !== 'DISCONNECTED') return false;
    return this.setStatus('CONNECTED');
  }

  /** Connected, no state payload yet */
  markWaiting(): boolean {
    if (this._status !== 'CONNECTED') return false;
    return this.setStatus('WAITING_FOR_STATE');
  }

  /** A non-empty state has been cached */
  markReady(): boolean {
    if (this._status !== 'CONNECTED' && this._status !== 'WAITING_FOR_STATE') return false;
    return this.setStatus('READY');
  }

  markDisconnected(reason: string): boolean {
    return this.setStatus('DISCONNECTED', reason);
  }

  private setStatus(next: ConnectionStatus, reason?: string): boolean {
    if (this._status === next) return false;
    const prev = this._status;
    this._status = next;
    this.log.info({ prev, next, reason }, `${prev} -> ${next}`);
    this.emit('statusChange', next, prev);
    return true;
  }
}

/**
 * Health Prober
 *
 * GET /health decides whether a session may leave DISCONNECTED. Anything
 * short of a 200 reporting "ready" is a tracked failure and leaves the
 * session disconnected.
 */

import { BridgeError, ProtocolError } from '../errors';
import { decodeHealth, type HealthReport } from '../protocol/envelope';
import { trackFailure, type SessionContext } from './context';

export class HealthProber {
  private ctx: SessionContext;
  private _lastReport: HealthReport | null = null;

  constructor(ctx: SessionContext) {
    this.ctx = ctx;
  }

  /** Body of the last successful probe */
  get lastReport(): HealthReport | null {
    return this._lastReport;
  }

  async connect(): Promise<boolean> {
    const { transport, timeoutMs, tracker, status, log } = this.ctx;
    log.debug({ target: transport.target }, 'Probing bridge health');

    try {
      const res = await transport.get('/health', timeoutMs);
      if (res.status !== 200) {
        throw new ProtocolError('Health check', res.status, res.body);
      }
      const report = decodeHealth(res.body);
      if (!report.ready) {
        throw new BridgeError('protocol', `Bridge not ready (status "${report.status}")`);
      }
      this._lastReport = report;
    } catch (err) {
      const { message } = trackFailure(this.ctx, err);
      status.markDisconnected(message);
      return false;
    }

    tracker.recordSuccess();
    status.markConnected();
    return true;
  }

  /**
   * Manual ready handshake (GET /ready) for bridges started without the
   * automatic one. Does not change status.
   */
  async requestReadyHandshake(): Promise<boolean> {
    const { transport, timeoutMs, tracker } = this.ctx;
    try {
      const res = await transport.get('/ready', timeoutMs);
      if (res.status !== 200) {
        throw new ProtocolError('Ready handshake', res.status, res.body);
      }
    } catch (err) {
      trackFailure(this.ctx, err);
      return false;
    }
    tracker.recordSuccess();
    return true;
  }
}

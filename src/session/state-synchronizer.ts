/**
 * State Synchronizer
 *
 * Polls GET /state and owns the cached snapshot. A snapshot whose marker
 * matches the cached one is not decoded again; the cached document object is
 * returned as-is. Emits `state(document, marker)` for each accepted update.
 */

import { EventEmitter } from 'events';
import { ProtocolError, classifyError } from '../errors';
import { decodeEnvelope, decodePayload } from '../protocol/envelope';
import type { CachedState, StateDocument } from '../state/types';
import { trackFailure, type SessionContext } from './context';

export class StateSynchronizer extends EventEmitter {
  private ctx: SessionContext;
  private cache: CachedState | null = null;

  constructor(ctx: SessionContext) {
    super();
    this.ctx = ctx;
  }

  get cached(): CachedState | null {
    return this.cache;
  }

  async getState(): Promise<StateDocument | undefined> {
    const { transport, timeoutMs, tracker, log } = this.ctx;

    let document: StateDocument;
    let updated = false;
    try {
      const res = await transport.get('/state', timeoutMs);
      if (res.status === 204) {
        log.debug('No state yet (204)');
        return undefined;
      }
      if (res.status !== 200) {
        throw new ProtocolError('State request', res.status, res.body);
      }

      const { marker, payload } = decodeEnvelope(res.body);
      if (this.cache && this.cache.marker === marker) {
        log.debug({ marker }, 'State unchanged');
        document = this.cache.document;
      } else {
        document = decodePayload(payload);
        this.cache = Object.freeze({ document, marker, receivedAt: Date.now() });
        updated = true;
      }
    } catch (err) {
      trackFailure(this.ctx, err);
      return undefined;
    }

    tracker.recordSuccess();
    if (Object.keys(document).length > 0) {
      this.ctx.status.markReady();
    }
    if (updated && this.cache) {
      log.debug({ marker: this.cache.marker }, 'State updated');
      this.emit('state', document, this.cache.marker);
    }
    return document;
  }

  /**
   * True when the bridge holds a snapshot the cache has not seen. Never
   * touches the cache, the failure counter, LastError or status; a failed
   * probe answers false.
   */
  async hasNewState(): Promise<boolean> {
    const { transport, timeoutMs, log } = this.ctx;
    try {
      const res = await transport.get('/state', timeoutMs);
      if (res.status !== 200) {
        log.debug({ status: res.status }, 'No new state');
        return false;
      }
      const { marker } = decodeEnvelope(res.body);
      return this.cache === null || this.cache.marker !== marker;
    } catch (err) {
      log.debug({ err: classifyError(err).message }, 'New-state probe failed');
      return false;
    }
  }
}

/**
 * Action Dispatcher
 *
 * POST /action with one encoded command. Fire-and-forget: the resulting
 * state change is observed by polling. No retry.
 */

import { ProtocolError, classifyError } from '../errors';
import { encodeActionBody, type CommandArg } from '../protocol/commands';
import { trackFailure, type SessionContext } from './context';

export class ActionDispatcher {
  private ctx: SessionContext;

  constructor(ctx: SessionContext) {
    this.ctx = ctx;
  }

  async sendAction(command: string, args: readonly CommandArg[] = []): Promise<boolean> {
    const { transport, timeoutMs, tracker, log } = this.ctx;

    let body: string;
    try {
      body = encodeActionBody(command, args);
    } catch (err) {
      // Nothing was sent, so the bridge is not to blame
      const { kind, message } = classifyError(err);
      tracker.noteError(kind, message);
      log.warn(message);
      return false;
    }

    log.debug({ body }, 'Sending action');
    try {
      const res = await transport.post('/action', body, timeoutMs);
      if (res.status !== 200) {
        throw new ProtocolError(`Action "${command}"`, res.status, res.body);
      }
    } catch (err) {
      trackFailure(this.ctx, err);
      return false;
    }

    tracker.recordSuccess();
    return true;
  }
}

import type { Logger } from 'pino';
import { classifyError, type ClassifiedError } from '../errors';
import type { ConnectionStatusMachine } from '../health/connection-status';
import type { FailureTracker } from '../health/failure-tracker';
import type { BridgeTransport } from '../transport/transport';

/** What every session component shares with its owning client */
export interface SessionContext {
  transport: BridgeTransport;
  timeoutMs: number;
  tracker: FailureTracker;
  status: ConnectionStatusMachine;
  log: Logger;
}

/** Classify a thrown value and count it as a failed request */
export function trackFailure(ctx: SessionContext, err: unknown): ClassifiedError {
  const classified = classifyError(err);
  ctx.tracker.recordFailure(classified.kind, classified.message);
  return classified;
}

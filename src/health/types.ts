/**
 * Session Health Types
 *
 * Connection status machine and health reporting for a bridge session.
 */

import type { FailureKind } from '../errors';
import type { StateMarker } from '../state/types';

/** Connection states for a bridge session */
export type ConnectionStatus = 'DISCONNECTED' | 'CONNECTED' | 'WAITING_FOR_STATE' | 'READY';

/** Most recent failure; kept across successes */
export interface LastError {
  kind: FailureKind;
  message: string;
  at: Date;
}

/** Health snapshot for a session */
export interface SessionHealth {
  target: string;
  status: ConnectionStatus;
  consecutiveFailures: number;
  maxConsecutiveFailures: number;
  lastError: LastError | null;
  lastSuccess: Date | null;
  lastMarker: StateMarker | null;
  lastStateAt: Date | null;
}

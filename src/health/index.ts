export { ConnectionStatusMachine } from './connection-status';
export { FailureTracker } from './failure-tracker';
export type { ConnectionStatus, LastError, SessionHealth } from './types';

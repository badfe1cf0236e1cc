export { HealthProber } from './health-prober';
export { StateSynchronizer } from './state-synchronizer';
export { ActionDispatcher } from './action-dispatcher';
export type { SessionContext } from './context';

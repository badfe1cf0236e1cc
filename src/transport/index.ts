/**
 * Transport barrel exports and factory.
 */

export type { BridgeTransport, TransportResponse } from './transport';
export { FetchTransport } from './fetch-transport';
export type { FetchTransportOptions } from './fetch-transport';

import type { SessionConfig } from '../config';
import { BridgeEmulator } from '../emulators';
import { FetchTransport } from './fetch-transport';
import type { BridgeTransport } from './transport';

/**
 * Pick the transport for a session: the in-process emulator when `emulate`
 * is set, HTTP otherwise.
 */
export function createTransport(config: SessionConfig): BridgeTransport {
  if (config.emulate) {
    return new BridgeEmulator(config.debug);
  }
  return new FetchTransport({ host: config.host, port: config.port });
}

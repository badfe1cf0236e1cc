/**
 * Game Bridge Client
 *
 * Drives a turn-based game session exposed by a local HTTP bridge:
 *   GET  /health   readiness probe
 *   GET  /state    latest snapshot, deduplicated by its timestamp marker
 *   POST /action   one text command per call
 *
 * Usage:
 *   const client = new BridgeClient({ port: 8080 });
 *   if (await client.connect() && await client.waitForReady(10000)) {
 *     await client.playCard(0);
 *   }
 */

export { BridgeClient, DEFAULT_READY_TIMEOUT_MS } from './client/bridge-client';
export type { BridgeClientOptions } from './client/bridge-client';

export { loadConfig, resolveSessionConfig, DEFAULT_CONFIG_FILE } from './config';
export type { ClientConfig, SessionConfig } from './config';
export type { SessionConfigInput } from './config-schema';

export {
  BridgeError,
  TransportError,
  ProtocolError,
  DecodeError,
  ReadyTimeoutError,
  CommandEncodingError,
} from './errors';
export type { FailureKind } from './errors';

export type { ConnectionStatus, LastError, SessionHealth } from './health/types';

export { initLogger, getLogger } from './logger';
export type { LoggerConfig, LogLevel } from './logger';

export { encodeCommand, Commands } from './protocol/commands';
export type { ActionCommand, CommandArg, MouseButton } from './protocol/commands';

export * from './state/accessors';
export type { JsonValue, StateDocument, StateMarker, CachedState } from './state/types';

export { FetchTransport, createTransport } from './transport';
export type { BridgeTransport, TransportResponse } from './transport';
export { BridgeEmulator } from './emulators';
export type { EmulatorLogEntry } from './emulators';

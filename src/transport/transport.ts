/**
 * BridgeTransport Interface
 *
 * Request/response access to the bridge's HTTP surface. Implementations
 * resolve for every HTTP status and reject with TransportError only when no
 * response arrived at all (refused, reset, timed out).
 */

export interface TransportResponse {
  status: number;
  body: string;
}

export interface BridgeTransport {
  /** Human-readable target, e.g. "http://127.0.0.1:8080" or "emulator" */
  readonly target: string;

  get(path: string, timeoutMs: number): Promise<TransportResponse>;

  post(path: string, body: string, timeoutMs: number): Promise<TransportResponse>;
}

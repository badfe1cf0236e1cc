/**
 * Error taxonomy for bridge sessions.
 *
 * Session operations never throw these at callers; they are raised inside the
 * transport/protocol layers and folded into a FailureKind + message by
 * classifyError() before reaching the failure tracker.
 */

export type FailureKind = 'transport' | 'protocol' | 'decode' | 'timeout' | 'encoding';

/** Base error for all bridge errors */
export class BridgeError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string) {
    super(message);
    this.name = 'BridgeError';
    this.kind = kind;
  }
}

/** No response from the bridge (refused, reset, timed out) */
export class TransportError extends BridgeError {
  constructor(
    public readonly method: 'GET' | 'POST',
    public readonly path: string,
    public readonly causeMessage: string,
  ) {
    super('transport', `${method} ${path}: no response (${causeMessage})`);
    this.name = 'TransportError';
  }
}

/** The bridge answered with a status the operation does not accept */
export class ProtocolError extends BridgeError {
  constructor(
    public readonly operation: string,
    public readonly status: number,
    public readonly body = '',
  ) {
    super('protocol', `${operation} failed (status ${status})`);
    this.name = 'ProtocolError';
  }
}

/** A response body could not be parsed into the expected shape */
export class DecodeError extends BridgeError {
  constructor(what: string, public readonly detail: string) {
    super('decode', `Failed to parse ${what}: ${detail}`);
    this.name = 'DecodeError';
  }
}

/** waitForReady() gave up; a composite of individually tracked polls */
export class ReadyTimeoutError extends BridgeError {
  constructor(public readonly timeoutMs: number) {
    super('timeout', `Timed out after ${timeoutMs}ms waiting for game state`);
    this.name = 'ReadyTimeoutError';
  }
}

/** An action that cannot be expressed as a bridge command */
export class CommandEncodingError extends BridgeError {
  constructor(public readonly command: string, details: string) {
    super('encoding', `Cannot encode command "${command}": ${details}`);
    this.name = 'CommandEncodingError';
  }
}

export interface ClassifiedError {
  kind: FailureKind;
  message: string;
}

/** Map anything thrown inside a session operation onto a failure kind */
export function classifyError(err: unknown): ClassifiedError {
  if (err instanceof BridgeError) {
    return { kind: err.kind, message: err.message };
  }
  if (err instanceof Error) {
    return { kind: 'transport', message: err.message };
  }
  return { kind: 'transport', message: String(err) };
}

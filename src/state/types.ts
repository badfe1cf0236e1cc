/**
 * Game state types
 *
 * The bridge forwards whatever JSON document the game emits. The client
 * treats it as an opaque, deep-frozen tree and reads fields through the
 * accessors in ./accessors.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | readonly JsonValue[] | { readonly [key: string]: JsonValue };

/** One snapshot of game state; always a JSON object at the root */
export type StateDocument = { readonly [key: string]: JsonValue };

/** Staleness marker the bridge attaches to each snapshot */
export type StateMarker = number | string;

/** Last accepted snapshot; replaced wholesale, never patched */
export interface CachedState {
  readonly document: StateDocument;
  readonly marker: StateMarker;
  /** Local receipt time (epoch ms) */
  readonly receivedAt: number;
}

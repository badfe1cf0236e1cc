/**
 * Bridge response decoding
 *
 * /health and /state bodies are validated with zod. The /state envelope is
 * decoded in two steps so a caller can compare markers before paying for the
 * nested payload parse.
 */

import { z } from 'zod';
import { DecodeError } from '../errors';
import type { JsonValue, StateDocument, StateMarker } from '../state/types';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const stateDocumentSchema = z.record(jsonValueSchema);

const markerSchema = z.union([z.number(), z.string()]);

const healthSchema = z.object({
  status: z.string(),
  has_state: z.boolean().optional(),
  last_update: markerSchema.nullable().optional(),
});

const envelopeSchema = z.object({
  state: z.union([z.string(), z.record(z.unknown())]),
  timestamp: markerSchema,
});

export interface HealthReport {
  status: string;
  /** true only for status "ready" */
  ready: boolean;
  hasState: boolean;
  lastUpdate: StateMarker | null;
}

export interface StateEnvelope {
  marker: StateMarker;
  /** Nested document, still encoded when the bridge sent it as a string */
  payload: string | Record<string, unknown>;
}

export function decodeHealth(body: string): HealthReport {
  const parsed = healthSchema.safeParse(parseJson(body, 'health response'));
  if (!parsed.success) {
    throw new DecodeError('health response', summarize(parsed.error));
  }
  const { status, has_state, last_update } = parsed.data;
  return {
    status,
    ready: status === 'ready',
    hasState: has_state ?? false,
    lastUpdate: last_update ?? null,
  };
}

export function decodeEnvelope(body: string): StateEnvelope {
  const parsed = envelopeSchema.safeParse(parseJson(body, 'state envelope'));
  if (!parsed.success) {
    throw new DecodeError('state envelope', summarize(parsed.error));
  }
  return { marker: parsed.data.timestamp, payload: parsed.data.state };
}

/**
 * Decode the nested state document. The result is deep-frozen so a cached
 * snapshot can be handed to callers without copying.
 */
export function decodePayload(payload: string | Record<string, unknown>): StateDocument {
  const raw = typeof payload === 'string' ? parseJson(payload, 'state payload') : payload;
  const parsed = stateDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError('state payload', summarize(parsed.error));
  }
  return deepFreeze(parsed.data);
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DecodeError(what, err instanceof Error ? err.message : String(err));
  }
}

function summarize(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`)
    .join('; ');
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

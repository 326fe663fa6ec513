/**
 * @fileoverview Wire form of review events.
 *
 * Transports (WebSocket, SSE, NDJSON on stdout) send the envelope with
 * snake_case keys at every level: `event_type`, `source_id`,
 * `payload.finding.location.line_start`, and so on.
 *
 * @module events/serialize
 */

import type { ReviewEvent } from './types';

export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | { [key: string]: WireValue };

/**
 * `lineStart` -> `line_start`.
 */
export function toSnakeCase(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

function toWire(value: unknown): WireValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toWire);
  }
  if (typeof value === 'object') {
    const out: { [key: string]: WireValue } = {};
    for (const [key, inner] of Object.entries(value)) {
      if (inner === undefined) continue;
      out[toSnakeCase(key)] = toWire(inner);
    }
    return out;
  }
  return String(value);
}

/**
 * Convert an event to its wire object.
 */
export function serializeEvent(event: ReviewEvent): { [key: string]: WireValue } {
  return {
    event_type: event.eventType,
    source_id: event.sourceId,
    sequence: event.sequence,
    timestamp: event.timestamp,
    payload: toWire(event.payload),
  };
}

/**
 * One NDJSON line for an event.
 */
export function serializeEventLine(event: ReviewEvent): string {
  return JSON.stringify(serializeEvent(event));
}

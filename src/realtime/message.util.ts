import WebSocket from 'ws';
import { ServerMessage } from './realtime.types';

/**
 * Decode an inbound frame into `{ type, data }`.
 *
 * Returns `null` for invalid JSON, non-objects and frames without a string
 * `type`. A missing `data` field decodes as `null`.
 */
export function decodeServerMessage(raw: WebSocket.RawData | string): ServerMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString());
  } catch {
    return null;
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return null;
  const msg = parsed as Record<string, unknown>;
  if (typeof msg.type !== 'string' || msg.type.length === 0) return null;

  return { type: msg.type, data: msg.data ?? null };
}

/** Append the access token to the real-time endpoint as the `token` query parameter. */
export function buildRealtimeUrl(baseUrl: string, accessToken: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('token', accessToken);
  return url.toString();
}

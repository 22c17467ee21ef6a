import { decodeHex, isKnownClientFrameType, safeValidateClientFrame } from '@live-relay/shared';

import type { InboundFrame } from './wsTransport';

export type ClientAction =
  | { kind: 'audio'; bytes: Uint8Array }
  | { kind: 'text'; text: string }
  | { kind: 'reset' }
  | { kind: 'ping' }
  | { kind: 'invalid'; error: string }
  | { kind: 'ignored'; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hexAudio(raw: string): ClientAction {
  const bytes = decodeHex(raw.trim());
  if (!bytes) {
    return { kind: 'invalid', error: 'Frame is neither JSON nor hex-encoded audio' };
  }
  if (bytes.length === 0) {
    return { kind: 'ignored', reason: 'empty audio frame' };
  }
  return { kind: 'audio', bytes };
}

/**
 * Maps one inbound WebSocket frame to the action the session takes. Binary
 * frames and text that is not a JSON object are raw audio; unknown frame
 * types are ignored.
 */
export function decodeClientFrame(frame: InboundFrame): ClientAction {
  if (frame.kind === 'binary') {
    return frame.bytes.length > 0
      ? { kind: 'audio', bytes: frame.bytes }
      : { kind: 'ignored', reason: 'empty audio frame' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(frame.text);
  } catch {
    return hexAudio(frame.text);
  }

  if (!isRecord(parsed)) {
    return hexAudio(frame.text);
  }

  const type = parsed['type'];
  if (!isKnownClientFrameType(type)) {
    return { kind: 'ignored', reason: `unknown frame type: ${String(type)}` };
  }

  const result = safeValidateClientFrame(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { kind: 'invalid', error: `Invalid ${type} frame: ${detail}` };
  }

  const message = result.data;
  switch (message.type) {
    case 'audio': {
      return hexAudio(message.data);
    }
    case 'text':
      return { kind: 'text', text: message.text };
    case 'reset':
      return { kind: 'reset' };
    case 'ping':
      return { kind: 'ping' };
  }
}

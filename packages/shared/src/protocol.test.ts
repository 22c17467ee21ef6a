import { describe, expect, it } from 'vitest';
import {
  isKnownClientFrameType,
  safeValidateClientFrame,
  safeValidateServerFrame,
  validateClientFrame,
  type ClientFrame,
  type ServerFrame,
} from './protocol';

describe('client frame validation', () => {
  it('accepts a text frame', () => {
    const frame: ClientFrame = { type: 'text', text: 'hello' };
    expect(validateClientFrame(frame)).toEqual(frame);
  });

  it('accepts an audio frame carrying hex data', () => {
    const frame: ClientFrame = { type: 'audio', data: '00ff10' };
    expect(validateClientFrame(frame)).toEqual(frame);
  });

  it('rejects an audio frame with non-hex data', () => {
    const result = safeValidateClientFrame({ type: 'audio', data: 'not-hex' });
    expect(result.success).toBe(false);
  });

  it('rejects a text frame without text', () => {
    expect(() => validateClientFrame({ type: 'text' })).toThrow();
  });

  it('accepts reset and ping frames', () => {
    expect(safeValidateClientFrame({ type: 'reset' }).success).toBe(true);
    expect(safeValidateClientFrame({ type: 'ping' }).success).toBe(true);
  });

  it('rejects unknown frame types', () => {
    const result = safeValidateClientFrame({ type: 'dance' });
    expect(result.success).toBe(false);
  });

  it('recognises known client frame types', () => {
    expect(isKnownClientFrameType('audio')).toBe(true);
    expect(isKnownClientFrameType('reset')).toBe(true);
    expect(isKnownClientFrameType('dance')).toBe(false);
    expect(isKnownClientFrameType(42)).toBe(false);
  });
});

describe('server frame validation', () => {
  it('accepts a connected frame', () => {
    const frame: ServerFrame = { type: 'connected', sessionId: 'session-1', state: 'connected' };
    const result = safeValidateServerFrame(frame);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual(frame);
    }
  });

  it('accepts tool results carrying either a result or an error', () => {
    const ok: ServerFrame = {
      type: 'tool_result',
      tool: 'get_current_time',
      result: { result: { time: '12:00:00' } },
    };
    const failed: ServerFrame = {
      type: 'tool_result',
      tool: 'get_weather',
      result: { error: 'Function execution timed out after 30s' },
    };
    expect(safeValidateServerFrame(ok).success).toBe(true);
    expect(safeValidateServerFrame(failed).success).toBe(true);
  });

  it('rejects a tool result carrying both result and error', () => {
    const result = safeValidateServerFrame({
      type: 'tool_result',
      tool: 'get_weather',
      result: { result: 1, error: 'boom' },
    });
    expect(result.success).toBe(false);
  });

  it('rejects a turn_complete frame with a zero turn number', () => {
    expect(safeValidateServerFrame({ type: 'turn_complete', turnNumber: 0 }).success).toBe(false);
  });

  it('rejects a state_change frame with an unknown state', () => {
    expect(safeValidateServerFrame({ type: 'state_change', state: 'sleeping' }).success).toBe(
      false,
    );
  });
});

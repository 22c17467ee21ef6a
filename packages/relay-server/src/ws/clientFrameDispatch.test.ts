import { describe, expect, it } from 'vitest';

import { decodeClientFrame, type ClientAction } from './clientFrameDispatch';

function decodeText(text: string): ClientAction {
  return decodeClientFrame({ kind: 'text', text });
}

function audioBytes(action: ClientAction): number[] | null {
  return action.kind === 'audio' ? Array.from(action.bytes) : null;
}

describe('decodeClientFrame', () => {
  it('maps the known frame types', () => {
    expect(decodeText(JSON.stringify({ type: 'text', text: 'Hello' }))).toEqual({
      kind: 'text',
      text: 'Hello',
    });
    expect(decodeText(JSON.stringify({ type: 'reset' }))).toEqual({ kind: 'reset' });
    expect(decodeText(JSON.stringify({ type: 'ping' }))).toEqual({ kind: 'ping' });
    expect(audioBytes(decodeText(JSON.stringify({ type: 'audio', data: '00ff10' })))).toEqual([
      0, 255, 16,
    ]);
  });

  it('treats binary frames as raw audio', () => {
    expect(audioBytes(decodeClientFrame({ kind: 'binary', bytes: new Uint8Array([9, 8]) }))).toEqual([
      9, 8,
    ]);
    expect(decodeClientFrame({ kind: 'binary', bytes: new Uint8Array() })).toEqual({
      kind: 'ignored',
      reason: 'empty audio frame',
    });
  });

  it('treats text that is not a JSON object as hex audio', () => {
    expect(audioBytes(decodeText('0102'))).toEqual([1, 2]);
    expect(audioBytes(decodeText(' abcd\n'))).toEqual([171, 205]);
    expect(decodeText('xyz')).toEqual({
      kind: 'invalid',
      error: 'Frame is neither JSON nor hex-encoded audio',
    });
  });

  it('ignores unknown frame types', () => {
    expect(decodeText(JSON.stringify({ type: 'dance' }))).toEqual({
      kind: 'ignored',
      reason: 'unknown frame type: dance',
    });
    expect(decodeText(JSON.stringify({ text: 'no type' }))).toEqual({
      kind: 'ignored',
      reason: 'unknown frame type: undefined',
    });
  });

  it('reports invalid payloads for known types', () => {
    expect(decodeText(JSON.stringify({ type: 'text', text: 42 }))).toEqual({
      kind: 'invalid',
      error: 'Invalid text frame: text: Expected string, received number',
    });
    expect(decodeText(JSON.stringify({ type: 'audio', data: 'abc' }))).toEqual({
      kind: 'invalid',
      error: 'Invalid audio frame: data: Audio data must be an even-length hex string',
    });
  });
});

import { describe, expect, it } from 'vitest';

import type { SessionSettings } from '../sessionSettings';
import { FakeDownstream } from '../test/fakeDownstream';
import { FakeLiveClient, flushAsync } from '../test/fakeLive';
import { ToolExecutor } from '../tools/toolExecutor';
import { ClientSession } from './clientSession';

const SETTINGS: SessionSettings = {
  model: 'gemini-live-test',
  responseModalities: ['AUDIO'],
  systemInstruction: 'Be brief.',
  googleSearch: true,
  contextWindowCompression: false,
  audioInputMimeType: 'audio/pcm;rate=16000',
  toolTimeoutMs: 1_000,
  limits: {
    maxMessagesPerMinute: 60,
    maxAudioBytesPerMinute: 1_000,
    maxToolCallsPerMinute: 30,
  },
};

interface CreateOptions {
  limits?: Partial<SessionSettings['limits']>;
  executor?: ToolExecutor | null;
  toolAllowlist?: string[];
  now?: () => number;
}

function createSession(options: CreateOptions = {}) {
  const client = new FakeLiveClient();
  const downstream = new FakeDownstream();
  let executor: ToolExecutor | undefined;
  if (options.executor === undefined) {
    executor = new ToolExecutor({ timeoutMs: 1_000 });
    executor.registerTool('echo', 'Echo', undefined, (args) => args['value']);
  } else if (options.executor !== null) {
    executor = options.executor;
  }
  const settings: SessionSettings = {
    ...SETTINGS,
    ...(options.toolAllowlist ? { toolAllowlist: options.toolAllowlist } : {}),
    limits: { ...SETTINGS.limits, ...options.limits },
  };
  const session = new ClientSession({
    sessionId: 'session-1',
    downstream,
    liveClient: client,
    settings,
    ...(executor ? { toolExecutor: executor } : {}),
    ...(options.now ? { now: options.now } : {}),
  });
  const done = session.run();
  return { client, downstream, session, done };
}

async function createConnectedSession(options: CreateOptions = {}) {
  const created = createSession(options);
  await flushAsync();
  created.downstream.clear();
  return created;
}

describe('ClientSession', () => {
  it('connects upstream and announces the session', async () => {
    const { client, downstream, session } = createSession();
    await flushAsync();

    expect(downstream.frames).toEqual([
      { type: 'state_change', state: 'connecting' },
      { type: 'state_change', state: 'connected' },
      { type: 'connected', sessionId: 'session-1', state: 'connected' },
    ]);
    expect(session.state).toBe('connected');
    expect(client.opens).toEqual([
      {
        model: 'gemini-live-test',
        config: {
          responseModalities: ['AUDIO'],
          systemInstruction: 'Be brief.',
          tools: [
            { functionDeclarations: [{ name: 'echo', description: 'Echo' }] },
            { googleSearch: {} },
          ],
          contextWindowCompression: false,
        },
      },
    ]);
  });

  it('declares the allowed standard tools by default', async () => {
    const { client } = createSession({ executor: null, toolAllowlist: ['get_current_time'] });
    await flushAsync();

    const tools = client.opens[0]?.config.tools;
    expect(tools).toHaveLength(2);
    expect(tools?.[0]).toMatchObject({ functionDeclarations: [{ name: 'get_current_time' }] });
    expect(tools?.[1]).toEqual({ googleSearch: {} });
  });

  it('keeps the downstream open when the connect fails and retries on reset', async () => {
    const client = new FakeLiveClient();
    client.failNextOpen(new Error('no key'));
    const downstream = new FakeDownstream();
    const session = new ClientSession({
      sessionId: 'session-1',
      downstream,
      liveClient: client,
      settings: SETTINGS,
      toolExecutor: new ToolExecutor(),
    });
    void session.run();
    await flushAsync();

    expect(downstream.frames).toEqual([
      { type: 'state_change', state: 'connecting' },
      { type: 'state_change', state: 'error' },
      { type: 'error', error: 'Connection failed: no key' },
    ]);
    expect(downstream.closeCalls).toEqual([]);

    downstream.clear();
    downstream.sendJson({ type: 'text', text: 'Hello' });
    downstream.sendJson({ type: 'reset' });
    await flushAsync();

    expect(downstream.frames).toEqual([
      { type: 'error', error: 'Session not connected' },
      { type: 'state_change', state: 'closing' },
      { type: 'state_change', state: 'closed' },
      { type: 'state_change', state: 'connecting' },
      { type: 'state_change', state: 'connected' },
      { type: 'session_reset', sessionId: 'session-1' },
    ]);
    expect(session.state).toBe('connected');
  });

  it('forwards upstream audio, text and completed turns', async () => {
    const { client, downstream, session } = await createConnectedSession();
    client.latest.emit({ audioData: new Uint8Array([0xab, 0x01]), textDelta: 'Hi' });
    client.latest.emit({ turnComplete: true });
    client.latest.emit({ textDelta: 'again' });
    client.latest.emit({ turnComplete: true });
    await flushAsync();

    expect(downstream.frames).toEqual([
      { type: 'audio', data: 'ab01' },
      { type: 'text', text: 'Hi' },
      { type: 'turn_complete', turnNumber: 1 },
      { type: 'text', text: 'again' },
      { type: 'turn_complete', turnNumber: 2 },
    ]);
    expect(session.getMetrics().turnCount).toBe(2);
  });

  it('forwards client text and audio upstream in arrival order', async () => {
    const { client, downstream } = await createConnectedSession();

    downstream.sendJson({ type: 'text', text: 'Hello' });
    downstream.sendBinary([1, 2, 3]);
    downstream.sendText('0a0b');
    downstream.sendJson({ type: 'audio', data: 'ff' });
    await flushAsync();

    const stream = client.latest;
    expect(stream.sentText).toEqual(['Hello']);
    expect(stream.sentAudio.map((chunk) => Array.from(chunk.bytes))).toEqual([[1, 2, 3], [10, 11], [255]]);
    expect(stream.sentAudio.every((chunk) => chunk.mimeType === 'audio/pcm;rate=16000')).toBe(true);
    expect(downstream.frames).toEqual([]);
  });

  it('answers pings, ignores unknown frames and reports invalid ones', async () => {
    const { downstream } = await createConnectedSession();

    downstream.sendJson({ type: 'ping' });
    downstream.sendJson({ type: 'dance' });
    downstream.sendJson({ type: 'text' });
    downstream.sendText('not audio');
    await flushAsync();

    expect(downstream.frames).toEqual([
      { type: 'pong' },
      { type: 'error', error: 'Invalid text frame: text: Required' },
      { type: 'error', error: 'Frame is neither JSON nor hex-encoded audio' },
    ]);
  });

  it('runs tool calls and returns the batch upstream in call order', async () => {
    const { client, downstream, session } = await createConnectedSession();
    client.latest.emit({
      toolCalls: [
        { id: 'call-1', name: 'echo', args: { value: 'x' } },
        { id: 'call-2', name: 'missing', args: {} },
      ],
    });
    await flushAsync();

    expect(downstream.frames[0]).toEqual({
      type: 'tool_call_start',
      tools: [
        { name: 'echo', args: { value: 'x' } },
        { name: 'missing', args: {} },
      ],
    });
    const results = downstream.ofType('tool_result');
    expect(results).toHaveLength(2);
    expect(results).toEqual(
      expect.arrayContaining([
        { type: 'tool_result', tool: 'echo', result: { result: 'x' } },
        { type: 'tool_result', tool: 'missing', result: { error: 'Unknown function: missing' } },
      ]),
    );
    expect(client.latest.sentToolResults).toEqual([
      [
        { invocationId: 'call-1', name: 'echo', response: { result: 'x' } },
        { invocationId: 'call-2', name: 'missing', response: { error: 'Unknown function: missing' } },
      ],
    ]);
    expect(session.getMetrics().toolCallCount).toBe(2);
  });

  it('keeps one result per call when a batch repeats an id', async () => {
    const { client, downstream } = await createConnectedSession();
    client.latest.emit({
      toolCalls: [
        { id: 'dup', name: 'echo', args: { value: 1 } },
        { id: 'dup', name: 'echo', args: { value: 2 } },
      ],
    });
    await flushAsync();

    expect(client.latest.sentToolResults).toEqual([
      [
        { invocationId: 'dup', name: 'echo', response: { result: 1 } },
        { invocationId: 'dup', name: 'echo', response: { result: 2 } },
      ],
    ]);
    expect(downstream.ofType('tool_result')).toHaveLength(2);
  });

  it('answers tool calls over the rate limit with an error result', async () => {
    const { client, session } = await createConnectedSession({ limits: { maxToolCallsPerMinute: 1 } });
    client.latest.emit({
      toolCalls: [
        { id: 'call-1', name: 'echo', args: { value: 'a' } },
        { id: 'call-2', name: 'echo', args: { value: 'b' } },
      ],
    });
    await flushAsync();

    expect(client.latest.sentToolResults).toEqual([
      [
        { invocationId: 'call-1', name: 'echo', response: { result: 'a' } },
        {
          invocationId: 'call-2',
          name: 'echo',
          response: { error: 'Tool call rate limit exceeded (max 1 per minute)' },
        },
      ],
    ]);
    expect(session.getMetrics().toolCallCount).toBe(2);
  });

  it('forwards interruptions and resumes the session', async () => {
    const { client, downstream, session } = await createConnectedSession();
    client.latest.emit({ interrupted: true });
    await flushAsync();

    expect(downstream.frames).toEqual([
      { type: 'state_change', state: 'interrupted' },
      { type: 'interrupted' },
      { type: 'state_change', state: 'connected' },
    ]);
    expect(session.state).toBe('connected');
  });

  it('forwards trailing events after an interruption and completes the turn', async () => {
    const { client, downstream, session } = await createConnectedSession();
    client.latest.emit({ interrupted: true });
    client.latest.emit({ textDelta: 'a' });
    client.latest.emit({ textDelta: 'b' });
    client.latest.emit({ textDelta: 'c' });
    client.latest.emit({ turnComplete: true });
    await flushAsync();

    expect(downstream.frames).toEqual([
      { type: 'state_change', state: 'interrupted' },
      { type: 'interrupted' },
      { type: 'state_change', state: 'connected' },
      { type: 'text', text: 'a' },
      { type: 'text', text: 'b' },
      { type: 'text', text: 'c' },
      { type: 'turn_complete', turnNumber: 1 },
    ]);
    expect(session.state).toBe('connected');
    expect(session.getMetrics().turnCount).toBe(1);
  });

  it('limits client text frames', async () => {
    const { client, downstream } = await createConnectedSession({ limits: { maxMessagesPerMinute: 1 } });

    downstream.sendJson({ type: 'text', text: 'one' });
    downstream.sendJson({ type: 'text', text: 'two' });
    await flushAsync();

    expect(client.latest.sentText).toEqual(['one']);
    expect(downstream.frames).toEqual([
      { type: 'error', error: 'Message rate limit exceeded (max 1 per minute)' },
    ]);
  });

  it('reports the audio limit once per exceeded window', async () => {
    const { client, downstream } = await createConnectedSession({
      limits: { maxAudioBytesPerMinute: 4 },
    });

    downstream.sendBinary([1, 2, 3]);
    downstream.sendBinary([4, 5, 6]);
    downstream.sendBinary([7, 8, 9]);
    await flushAsync();

    expect(client.latest.sentAudio).toHaveLength(1);
    expect(downstream.frames).toEqual([
      { type: 'error', error: 'Audio rate limit exceeded (max 4 bytes per minute)' },
    ]);
  });

  it('resets counters and restarts the receive loop on reset', async () => {
    const { client, downstream, session } = await createConnectedSession();
    client.latest.emit({ turnComplete: true });
    await flushAsync();
    expect(session.getMetrics().turnCount).toBe(1);
    downstream.clear();

    downstream.sendJson({ type: 'reset' });
    await flushAsync();

    expect(downstream.frames).toEqual([
      { type: 'state_change', state: 'closing' },
      { type: 'state_change', state: 'closed' },
      { type: 'state_change', state: 'connecting' },
      { type: 'state_change', state: 'connected' },
      { type: 'session_reset', sessionId: 'session-1' },
    ]);
    expect(session.getMetrics().turnCount).toBe(0);
    expect(client.streams).toHaveLength(2);
    expect(client.streams[0]?.closed).toBe(true);

    downstream.clear();
    client.latest.emit({ turnComplete: true });
    await flushAsync();
    expect(downstream.frames).toEqual([{ type: 'turn_complete', turnNumber: 1 }]);
  });

  it('reports metrics', async () => {
    let clock = 1_000;
    const { session } = await createConnectedSession({ now: () => clock });
    clock = 3_540;

    expect(session.getMetrics()).toEqual({
      sessionId: 'session-1',
      durationSeconds: 2.5,
      turnCount: 0,
      toolCallCount: 0,
      state: 'connected',
    });
  });

  it('tears down when the client disconnects', async () => {
    const { client, downstream, session, done } = await createConnectedSession();

    downstream.disconnect();
    await done;

    expect(client.latest.closed).toBe(true);
    expect(session.state).toBe('closed');
    expect(session.isClosed).toBe(true);
    expect(downstream.types()).not.toContain('disconnected');
    expect(downstream.closeCalls).toEqual([{ code: 1000, reason: 'session closed' }]);
  });

  it('says goodbye when the server closes the session', async () => {
    const { downstream, session, done } = await createConnectedSession();

    await session.close();
    await done;

    expect(downstream.frames).toEqual([
      { type: 'state_change', state: 'closing' },
      { type: 'state_change', state: 'closed' },
      { type: 'disconnected', sessionId: 'session-1' },
    ]);
    expect(downstream.closeCalls).toEqual([{ code: 1000, reason: 'session closed' }]);
    await expect(session.close()).resolves.toBeUndefined();
  });

  it('reports a dropped upstream and closes the session', async () => {
    const { client, downstream, done } = await createConnectedSession();

    client.latest.drop();
    await done;

    expect(downstream.frames).toEqual([
      { type: 'state_change', state: 'error' },
      { type: 'error', error: 'Upstream error: Upstream connection closed' },
      { type: 'state_change', state: 'closing' },
      { type: 'state_change', state: 'closed' },
      { type: 'disconnected', sessionId: 'session-1' },
    ]);
  });

  it('discards tool results that finish after the session closed', async () => {
    let release: (value: string) => void = () => undefined;
    const gate = new Promise<string>((resolve) => {
      release = resolve;
    });
    const executor = new ToolExecutor({ timeoutMs: 1_000 });
    executor.registerTool('slow', 'Slow', undefined, () => gate);
    const { client, downstream, session } = await createConnectedSession({ executor });

    client.latest.emit({ toolCalls: [{ id: 'call-1', name: 'slow', args: {} }] });
    await flushAsync();
    await session.close();
    release('late');
    await flushAsync();

    expect(downstream.ofType('tool_result')).toEqual([]);
    expect(client.latest.sentToolResults).toEqual([]);
    expect(session.getMetrics().toolCallCount).toBe(0);
  });
});

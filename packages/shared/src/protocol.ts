import { z } from 'zod';

import { isHexString } from './hex';

export const SessionStateSchema = z.enum([
  'disconnected',
  'connecting',
  'connected',
  'interrupted',
  'closing',
  'closed',
  'error',
]);
export type SessionState = z.infer<typeof SessionStateSchema>;

const HexAudioSchema = z.string().refine(isHexString, {
  message: 'Audio data must be an even-length hex string',
});

export const ClientAudioFrameSchema = z.object({
  type: z.literal('audio'),
  /**
   * Hex-encoded audio bytes. Clients that can send binary WebSocket frames
   * may skip the JSON envelope entirely.
   */
  data: HexAudioSchema,
});

export const ClientTextFrameSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const ClientResetFrameSchema = z.object({
  type: z.literal('reset'),
});

export const ClientPingFrameSchema = z.object({
  type: z.literal('ping'),
});

export const ClientFrameSchema = z.discriminatedUnion('type', [
  ClientAudioFrameSchema,
  ClientTextFrameSchema,
  ClientResetFrameSchema,
  ClientPingFrameSchema,
]);

export type ClientAudioFrame = z.infer<typeof ClientAudioFrameSchema>;
export type ClientTextFrame = z.infer<typeof ClientTextFrameSchema>;
export type ClientResetFrame = z.infer<typeof ClientResetFrameSchema>;
export type ClientPingFrame = z.infer<typeof ClientPingFrameSchema>;
export type ClientFrame = z.infer<typeof ClientFrameSchema>;
export type ClientFrameType = ClientFrame['type'];

export const CLIENT_FRAME_TYPES: readonly ClientFrameType[] = ['audio', 'text', 'reset', 'ping'];

export function isKnownClientFrameType(value: unknown): value is ClientFrameType {
  return typeof value === 'string' && CLIENT_FRAME_TYPES.some((type) => type === value);
}

export const ToolCallSummarySchema = z.object({
  name: z.string(),
  args: z.record(z.string(), z.unknown()),
});
export type ToolCallSummary = z.infer<typeof ToolCallSummarySchema>;

/**
 * Response envelope for one tool invocation. Exactly one of `result` or
 * `error` is present; this is also the payload returned upstream.
 */
export const ToolResponsePayloadSchema = z.union([
  z.object({ error: z.string() }).strict(),
  z.object({ result: z.unknown() }).strict(),
]);
export type ToolResponsePayload = { result: unknown } | { error: string };

export const ServerConnectedFrameSchema = z.object({
  type: z.literal('connected'),
  sessionId: z.string(),
  state: SessionStateSchema,
});

export const ServerStateChangeFrameSchema = z.object({
  type: z.literal('state_change'),
  state: SessionStateSchema,
});

export const ServerAudioFrameSchema = z.object({
  type: z.literal('audio'),
  data: HexAudioSchema,
});

export const ServerTextFrameSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const ServerToolCallStartFrameSchema = z.object({
  type: z.literal('tool_call_start'),
  tools: z.array(ToolCallSummarySchema),
});

export const ServerToolResultFrameSchema = z.object({
  type: z.literal('tool_result'),
  tool: z.string(),
  result: ToolResponsePayloadSchema,
});

export const ServerInterruptedFrameSchema = z.object({
  type: z.literal('interrupted'),
});

export const ServerTurnCompleteFrameSchema = z.object({
  type: z.literal('turn_complete'),
  turnNumber: z.number().int().positive(),
});

export const ServerSessionResetFrameSchema = z.object({
  type: z.literal('session_reset'),
  sessionId: z.string(),
});

export const ServerDisconnectedFrameSchema = z.object({
  type: z.literal('disconnected'),
  sessionId: z.string(),
});

export const ServerErrorFrameSchema = z.object({
  type: z.literal('error'),
  error: z.string(),
});

export const ServerPongFrameSchema = z.object({
  type: z.literal('pong'),
});

export const ServerFrameSchema = z.discriminatedUnion('type', [
  ServerConnectedFrameSchema,
  ServerStateChangeFrameSchema,
  ServerAudioFrameSchema,
  ServerTextFrameSchema,
  ServerToolCallStartFrameSchema,
  ServerToolResultFrameSchema,
  ServerInterruptedFrameSchema,
  ServerTurnCompleteFrameSchema,
  ServerSessionResetFrameSchema,
  ServerDisconnectedFrameSchema,
  ServerErrorFrameSchema,
  ServerPongFrameSchema,
]);

export type ServerConnectedFrame = z.infer<typeof ServerConnectedFrameSchema>;
export type ServerStateChangeFrame = z.infer<typeof ServerStateChangeFrameSchema>;
export type ServerAudioFrame = z.infer<typeof ServerAudioFrameSchema>;
export type ServerTextFrame = z.infer<typeof ServerTextFrameSchema>;
export type ServerToolCallStartFrame = z.infer<typeof ServerToolCallStartFrameSchema>;
export type ServerToolResultFrame = {
  type: 'tool_result';
  tool: string;
  result: ToolResponsePayload;
};
export type ServerInterruptedFrame = z.infer<typeof ServerInterruptedFrameSchema>;
export type ServerTurnCompleteFrame = z.infer<typeof ServerTurnCompleteFrameSchema>;
export type ServerSessionResetFrame = z.infer<typeof ServerSessionResetFrameSchema>;
export type ServerDisconnectedFrame = z.infer<typeof ServerDisconnectedFrameSchema>;
export type ServerErrorFrame = z.infer<typeof ServerErrorFrameSchema>;
export type ServerPongFrame = z.infer<typeof ServerPongFrameSchema>;

export type ServerFrame =
  | ServerConnectedFrame
  | ServerStateChangeFrame
  | ServerAudioFrame
  | ServerTextFrame
  | ServerToolCallStartFrame
  | ServerToolResultFrame
  | ServerInterruptedFrame
  | ServerTurnCompleteFrame
  | ServerSessionResetFrame
  | ServerDisconnectedFrame
  | ServerErrorFrame
  | ServerPongFrame;

export const SessionMetricsSchema = z.object({
  sessionId: z.string(),
  durationSeconds: z.number().nonnegative(),
  turnCount: z.number().int().nonnegative(),
  toolCallCount: z.number().int().nonnegative(),
  state: SessionStateSchema,
});
export type SessionMetrics = z.infer<typeof SessionMetricsSchema>;

export function validateClientFrame(data: unknown): ClientFrame {
  return ClientFrameSchema.parse(data);
}

export function safeValidateClientFrame(data: unknown) {
  return ClientFrameSchema.safeParse(data);
}

export function safeValidateServerFrame(data: unknown) {
  return ServerFrameSchema.safeParse(data);
}

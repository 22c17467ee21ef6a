import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import type { ToolInvocationResult } from '../tools/types';
import type { LiveConnectConfig, UpstreamEvent } from './types';

const PartSchema = z
  .object({
    text: z.string().optional(),
    thought: z.boolean().optional(),
    inlineData: z
      .object({
        mimeType: z.string().optional(),
        data: z.string(),
      })
      .optional(),
  })
  .passthrough();

const FunctionCallSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  args: z.record(z.string(), z.unknown()).optional(),
});

export const LiveServerMessageSchema = z
  .object({
    setupComplete: z.object({}).passthrough().optional(),
    serverContent: z
      .object({
        modelTurn: z.object({ parts: z.array(PartSchema).optional() }).passthrough().optional(),
        interrupted: z.boolean().optional(),
        turnComplete: z.boolean().optional(),
        generationComplete: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    toolCall: z
      .object({ functionCalls: z.array(FunctionCallSchema).optional() })
      .passthrough()
      .optional(),
    toolCallCancellation: z
      .object({ ids: z.array(z.string()).optional() })
      .passthrough()
      .optional(),
    sessionResumptionUpdate: z
      .object({
        newHandle: z.string().optional(),
        resumable: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    goAway: z.object({ timeLeft: z.string().optional() }).passthrough().optional(),
    error: z
      .object({
        code: z.number().optional(),
        message: z.string().optional(),
        status: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type LiveServerMessage = z.infer<typeof LiveServerMessageSchema>;

export function buildLiveUrl(baseUrl: string, apiVersion: string, apiKey: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  return (
    `${base}/ws/google.ai.generativelanguage.${apiVersion}.GenerativeService.BidiGenerateContent` +
    `?key=${encodeURIComponent(apiKey)}`
  );
}

export function redactKey(url: string): string {
  return url.replace(/([?&]key=)[^&]+/, '$1***');
}

export function buildSetupMessage(model: string, config: LiveConnectConfig): Record<string, unknown> {
  const modelName = model.startsWith('models/') ? model : `models/${model}`;
  const generationConfig: Record<string, unknown> = {
    responseModalities: config.responseModalities,
    ...(config.voiceName
      ? {
          speechConfig: {
            voiceConfig: { prebuiltVoiceConfig: { voiceName: config.voiceName } },
          },
        }
      : {}),
  };

  return {
    setup: {
      model: modelName,
      generationConfig,
      ...(config.systemInstruction
        ? { systemInstruction: { parts: [{ text: config.systemInstruction }] } }
        : {}),
      ...(config.tools.length > 0 ? { tools: config.tools } : {}),
      sessionResumption: config.resumptionHandle ? { handle: config.resumptionHandle } : {},
      ...(config.contextWindowCompression
        ? { contextWindowCompression: { slidingWindow: {} } }
        : {}),
    },
  };
}

export function buildTextMessage(text: string): Record<string, unknown> {
  return {
    clientContent: {
      turns: [{ role: 'user', parts: [{ text }] }],
      turnComplete: true,
    },
  };
}

export function buildAudioMessage(bytes: Uint8Array, mimeType: string): Record<string, unknown> {
  return {
    realtimeInput: {
      audio: { data: Buffer.from(bytes).toString('base64'), mimeType },
    },
  };
}

export function buildToolResponseMessage(
  results: readonly ToolInvocationResult[],
): Record<string, unknown> {
  return {
    toolResponse: {
      functionResponses: results.map((result) => ({
        id: result.invocationId,
        name: result.name,
        response: result.response,
      })),
    },
  };
}

/**
 * Reduces a server message to an {@link UpstreamEvent}. Returns null for
 * messages with nothing the proxy forwards (setup acknowledgements, goAway,
 * generation-complete markers).
 */
export function toUpstreamEvent(message: LiveServerMessage): UpstreamEvent | null {
  const content = message.serverContent;
  const audioChunks: Buffer[] = [];
  let text = '';

  for (const part of content?.modelTurn?.parts ?? []) {
    if (part.thought) {
      continue;
    }
    if (part.inlineData && part.inlineData.data.length > 0) {
      audioChunks.push(Buffer.from(part.inlineData.data, 'base64'));
    }
    if (part.text) {
      text += part.text;
    }
  }

  const toolCalls = (message.toolCall?.functionCalls ?? []).map((call) => ({
    id: call.id ?? randomUUID(),
    name: call.name,
    args: call.args ?? {},
  }));

  const update = message.sessionResumptionUpdate;
  const resumptionUpdate =
    update && update.resumable !== false && update.newHandle ? update.newHandle : undefined;

  const interrupted = content?.interrupted === true;
  const turnComplete = content?.turnComplete === true;

  const event: UpstreamEvent = {
    interrupted,
    turnComplete,
    ...(audioChunks.length > 0 ? { audioData: new Uint8Array(Buffer.concat(audioChunks)) } : {}),
    ...(text ? { textDelta: text } : {}),
    ...(toolCalls.length > 0 ? { toolCalls } : {}),
    ...(resumptionUpdate ? { resumptionUpdate } : {}),
  };

  const hasPayload =
    interrupted ||
    turnComplete ||
    event.audioData !== undefined ||
    event.textDelta !== undefined ||
    event.toolCalls !== undefined ||
    event.resumptionUpdate !== undefined;
  return hasPayload ? event : null;
}

import { DEFAULT_SYSTEM_INSTRUCTION, type AppConfig, type ResponseModality } from './appConfig';
import type { EnvConfig } from './envConfig';

export interface SessionLimits {
  maxMessagesPerMinute: number;
  maxAudioBytesPerMinute: number;
  maxToolCallsPerMinute: number;
}

/**
 * Everything a ClientSession needs to open and drive its upstream, resolved
 * once at startup from the environment and the app config.
 */
export interface SessionSettings {
  model: string;
  responseModalities: ResponseModality[];
  systemInstruction?: string;
  voiceName?: string;
  googleSearch: boolean;
  contextWindowCompression: boolean;
  audioInputMimeType: string;
  toolTimeoutMs: number;
  /** Standard tools to register; undefined registers all of them. */
  toolAllowlist?: string[];
  limits: SessionLimits;
}

export function buildSessionSettings(env: EnvConfig, app: AppConfig): SessionSettings {
  const systemInstruction = app.systemInstruction ?? DEFAULT_SYSTEM_INSTRUCTION;
  return {
    model: env.model,
    responseModalities: [...app.responseModalities],
    systemInstruction,
    ...(app.voiceName ? { voiceName: app.voiceName } : {}),
    googleSearch: app.googleSearch,
    contextWindowCompression: app.contextWindowCompression,
    audioInputMimeType: env.audioInputMimeType,
    toolTimeoutMs: env.toolTimeoutMs,
    ...(app.tools.allowlist ? { toolAllowlist: [...app.tools.allowlist] } : {}),
    limits: {
      maxMessagesPerMinute: env.maxMessagesPerMinute,
      maxAudioBytesPerMinute: env.maxAudioBytesPerMinute,
      maxToolCallsPerMinute: env.maxToolCallsPerMinute,
    },
  };
}

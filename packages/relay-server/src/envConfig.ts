export interface EnvConfig {
  port: number;
  host: string;
  /**
   * Path on which downstream clients open their WebSocket session.
   */
  liveWsPath: string;
  /**
   * Google API key used for the upstream Live connection.
   */
  apiKey?: string;
  /**
   * Upstream model name without the `models/` prefix.
   */
  model: string;
  apiVersion: string;
  liveBaseUrl: string;
  upstreamSetupTimeoutMs: number;
  toolTimeoutMs: number;
  /**
   * Mime type attached to client audio forwarded upstream.
   */
  audioInputMimeType: string;
  /**
   * Per-session rate limits (sliding 1-minute window).
   * Values <= 0 effectively disable the corresponding limit.
   */
  maxMessagesPerMinute: number;
  maxAudioBytesPerMinute: number;
  maxToolCallsPerMinute: number;
  debugHttpRequests: boolean;
  /**
   * Optional JSON app config (system instruction, voice, tool allowlist).
   */
  appConfigPath?: string;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_LIVE_WS_PATH = '/ws/live';
export const DEFAULT_MODEL = 'gemini-2.5-flash-native-audio-preview-12-2025';
export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;
export const DEFAULT_UPSTREAM_SETUP_TIMEOUT_MS = 15_000;

function readTrimmed(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = readTrimmed(env, name);
  const parsed = raw !== undefined ? Number(raw) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : fallback;
}

function readLimit(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = readTrimmed(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? Math.floor(parsed) : fallback;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const port = readPositiveInt(env, 'PORT', DEFAULT_PORT);
  const host = readTrimmed(env, 'HOST') ?? '0.0.0.0';

  const wsPathEnv = readTrimmed(env, 'LIVE_WS_PATH') ?? DEFAULT_LIVE_WS_PATH;
  const liveWsPath = wsPathEnv.startsWith('/') ? wsPathEnv : `/${wsPathEnv}`;

  const apiKey = readTrimmed(env, 'GOOGLE_API_KEY');

  const modelEnv = readTrimmed(env, 'GEMINI_MODEL') ?? DEFAULT_MODEL;
  const model = modelEnv.startsWith('models/') ? modelEnv.slice('models/'.length) : modelEnv;

  const apiVersion = readTrimmed(env, 'GEMINI_API_VERSION') ?? 'v1beta';
  const liveBaseUrl = (
    readTrimmed(env, 'GEMINI_LIVE_BASE_URL') ?? 'wss://generativelanguage.googleapis.com'
  ).replace(/\/+$/, '');

  const upstreamSetupTimeoutMs = readPositiveInt(
    env,
    'UPSTREAM_SETUP_TIMEOUT_MS',
    DEFAULT_UPSTREAM_SETUP_TIMEOUT_MS,
  );
  const toolTimeoutMs = readPositiveInt(env, 'TOOL_TIMEOUT_MS', DEFAULT_TOOL_TIMEOUT_MS);

  const audioInputMimeType = readTrimmed(env, 'AUDIO_INPUT_MIME_TYPE') ?? 'audio/pcm;rate=16000';

  const maxMessagesPerMinute = readLimit(env, 'MAX_MESSAGES_PER_MINUTE', 60);
  const maxAudioBytesPerMinute = readLimit(env, 'MAX_AUDIO_BYTES_PER_MINUTE', 5_000_000);
  const maxToolCallsPerMinute = readLimit(env, 'MAX_TOOL_CALLS_PER_MINUTE', 30);

  const debugHttpRequestsEnv = env['DEBUG_HTTP_REQUESTS'];
  const debugHttpRequests = debugHttpRequestsEnv === 'true' || debugHttpRequestsEnv === '1';

  const appConfigPath = readTrimmed(env, 'APP_CONFIG_PATH');

  return {
    port,
    host,
    liveWsPath,
    ...(apiKey ? { apiKey } : {}),
    model,
    apiVersion,
    liveBaseUrl,
    upstreamSetupTimeoutMs,
    toolTimeoutMs,
    audioInputMimeType,
    maxMessagesPerMinute,
    maxAudioBytesPerMinute,
    maxToolCallsPerMinute,
    debugHttpRequests,
    ...(appConfigPath ? { appConfigPath } : {}),
  };
}

export function upstreamConfigured(config: EnvConfig): boolean {
  return typeof config.apiKey === 'string' && config.apiKey.length > 0;
}

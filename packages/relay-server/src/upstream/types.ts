import type { ResponseModality } from '../appConfig';
import type { ToolDeclarationGroup, ToolInvocation, ToolInvocationResult } from '../tools/types';

/**
 * One message from the upstream model, reduced to the parts the proxy acts on.
 */
export interface UpstreamEvent {
  audioData?: Uint8Array;
  textDelta?: string;
  toolCalls?: ToolInvocation[];
  interrupted: boolean;
  turnComplete: boolean;
  /** New resumption handle to present on the next connect. */
  resumptionUpdate?: string;
}

export type UpstreamTool = ToolDeclarationGroup | { googleSearch: Record<string, never> };

export interface LiveConnectConfig {
  responseModalities: ResponseModality[];
  systemInstruction?: string;
  voiceName?: string;
  tools: UpstreamTool[];
  contextWindowCompression?: boolean;
  resumptionHandle?: string;
}

export interface LiveStream {
  readonly events: AsyncIterable<UpstreamEvent>;
  sendText(text: string): Promise<void>;
  sendAudio(bytes: Uint8Array, mimeType: string): Promise<void>;
  sendToolResult(results: readonly ToolInvocationResult[]): Promise<void>;
  /**
   * Closes the connection. Iteration over `events` ends once this is called.
   */
  close(): Promise<void>;
}

export interface LiveClient {
  open(model: string, config: LiveConnectConfig): Promise<LiveStream>;
}

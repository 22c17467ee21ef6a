import type { ToolResponsePayload } from '@live-relay/shared';

/**
 * JSON Schema describing a tool's parameters. Kept loose so declarations can
 * be forwarded upstream as-is.
 */
export type ToolParameterSchema = Record<string, unknown>;

export interface ToolDeclaration {
  name: string;
  description: string;
  parameters?: ToolParameterSchema;
}

/**
 * Declaration collection in the shape the upstream session setup expects.
 */
export interface ToolDeclarationGroup {
  functionDeclarations: ToolDeclaration[];
}

export interface ToolContext {
  /**
   * Aborted when the invocation times out. Handlers that do I/O pass it on
   * (for example to fetch) so abandoned work stops.
   */
  signal: AbortSignal;
  sessionId?: string;
}

export type ToolArgs = Record<string, unknown>;

export type ToolHandler = (args: ToolArgs, ctx: ToolContext) => unknown;

export interface ToolRegistration {
  declaration: ToolDeclaration;
  handler: ToolHandler;
}

/**
 * One function call requested by the upstream model.
 */
export interface ToolInvocation {
  id: string;
  name: string;
  args: ToolArgs;
}

export interface ToolInvocationResult {
  /** Echoes the upstream call id. */
  invocationId: string;
  name: string;
  response: ToolResponsePayload;
}

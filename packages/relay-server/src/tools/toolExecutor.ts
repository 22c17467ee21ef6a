import type { ToolResponsePayload } from '@live-relay/shared';

import { describeError, type Logger } from '../logger';
import type {
  ToolDeclaration,
  ToolDeclarationGroup,
  ToolHandler,
  ToolInvocation,
  ToolInvocationResult,
  ToolParameterSchema,
  ToolRegistration,
} from './types';

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface ToolExecutorOptions {
  timeoutMs?: number;
  sessionId?: string;
  logger?: Logger;
}

class ToolTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Function execution timed out after ${formatSeconds(timeoutMs)}s`);
    this.name = 'ToolTimeoutError';
  }
}

function formatSeconds(ms: number): string {
  return String(Number((ms / 1000).toFixed(3)));
}

/**
 * Name-keyed tool registry that runs upstream function calls under a timeout
 * and always produces a result envelope, never an exception.
 */
export class ToolExecutor {
  private readonly tools = new Map<string, ToolRegistration>();
  private readonly timeoutMs: number;
  private readonly sessionId: string | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: ToolExecutorOptions = {}) {
    this.timeoutMs =
      options.timeoutMs !== undefined && options.timeoutMs > 0
        ? options.timeoutMs
        : DEFAULT_TOOL_TIMEOUT_MS;
    this.sessionId = options.sessionId;
    this.logger = options.logger;
  }

  /**
   * Registers a handler under `name`, replacing any earlier registration.
   */
  registerTool(
    name: string,
    description: string,
    parameterSchema: ToolParameterSchema | undefined,
    handler: ToolHandler,
  ): ToolDeclaration {
    const declaration: ToolDeclaration = {
      name,
      description,
      ...(parameterSchema ? { parameters: parameterSchema } : {}),
    };
    if (this.tools.has(name)) {
      this.logger?.debug?.(`Replacing tool registration: ${name}`);
    }
    this.tools.set(name, { declaration, handler });
    return declaration;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  getDeclarations(): ToolDeclarationGroup[] {
    return [
      {
        functionDeclarations: Array.from(this.tools.values(), (tool) => tool.declaration),
      },
    ];
  }

  async execute(invocation: ToolInvocation): Promise<ToolInvocationResult> {
    const response = await this.run(invocation);
    return { invocationId: invocation.id, name: invocation.name, response };
  }

  /**
   * Runs all invocations concurrently and returns their results in input
   * order. `onResult` fires as each one settles.
   */
  async executeMany(
    invocations: readonly ToolInvocation[],
    onResult?: (result: ToolInvocationResult) => void,
  ): Promise<ToolInvocationResult[]> {
    return Promise.all(
      invocations.map(async (invocation) => {
        const result = await this.execute(invocation);
        if (onResult) {
          try {
            onResult(result);
          } catch (err) {
            this.logger?.warn(`onResult callback failed for ${invocation.name}: ${describeError(err)}`);
          }
        }
        return result;
      }),
    );
  }

  private async run(invocation: ToolInvocation): Promise<ToolResponsePayload> {
    const tool = this.tools.get(invocation.name);
    if (!tool) {
      this.logger?.warn(`Unknown function requested: ${invocation.name}`);
      return { error: `Unknown function: ${invocation.name}` };
    }

    const controller = new AbortController();
    const timeout = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
        once: true,
      });
    });
    const timer = setTimeout(() => {
      controller.abort(new ToolTimeoutError(this.timeoutMs));
    }, this.timeoutMs);

    const ctx = {
      signal: controller.signal,
      ...(this.sessionId ? { sessionId: this.sessionId } : {}),
    };
    const started = Date.now();

    try {
      const result: unknown = await Promise.race([
        Promise.resolve().then(() => tool.handler(invocation.args, ctx)),
        timeout,
      ]);
      this.logger?.debug?.(`${invocation.name} completed in ${Date.now() - started}ms`);
      return { result: result === undefined ? null : result };
    } catch (err) {
      if (err instanceof ToolTimeoutError) {
        this.logger?.warn(`${invocation.name} timed out after ${this.timeoutMs}ms`);
        return { error: err.message };
      }
      this.logger?.warn(`${invocation.name} failed: ${describeError(err)}`);
      return { error: `Function execution failed: ${describeError(err)}` };
    } finally {
      clearTimeout(timer);
    }
  }
}

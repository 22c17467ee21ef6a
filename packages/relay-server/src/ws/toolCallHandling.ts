import type { ToolResponsePayload } from '@live-relay/shared';

import { describeError, type Logger } from '../logger';
import type { RateLimiter } from '../rateLimit';
import type { ToolExecutor } from '../tools/toolExecutor';
import type { ToolInvocation, ToolInvocationResult } from '../tools/types';
import type { WsTransport } from './wsTransport';

export interface HandleUpstreamToolCallsOptions {
  invocations: readonly ToolInvocation[];
  executor: ToolExecutor;
  transport: WsTransport;
  toolCallRateLimiter?: RateLimiter;
  maxToolCallsPerMinute: number;
  /** True once the owning session has been torn down. */
  isClosed: () => boolean;
  sendToolResult: (results: readonly ToolInvocationResult[]) => Promise<void>;
  logger?: Logger;
}

/**
 * Runs one upstream tool-call batch: announces it downstream, executes the
 * calls concurrently, reports each result as it completes and returns the
 * whole batch upstream in call order.
 *
 * Returns the number of invocations processed, including rate-limited ones.
 */
export async function handleUpstreamToolCalls(
  options: HandleUpstreamToolCallsOptions,
): Promise<number> {
  const {
    invocations,
    executor,
    transport,
    toolCallRateLimiter,
    maxToolCallsPerMinute,
    isClosed,
    sendToolResult,
    logger,
  } = options;

  if (invocations.length === 0) {
    return 0;
  }

  transport.sendJson({
    type: 'tool_call_start',
    tools: invocations.map((invocation) => ({ name: invocation.name, args: invocation.args })),
  });

  const sendResult = (result: ToolInvocationResult): void => {
    if (isClosed()) {
      return;
    }
    transport.sendJson({ type: 'tool_result', tool: result.name, result: result.response });
  };

  // Slots are positional; ids are not guaranteed unique within a batch.
  const slots: Array<ToolInvocationResult | undefined> = [];
  const allowed: ToolInvocation[] = [];
  for (const invocation of invocations) {
    const rateLimited = toolCallRateLimiter ? toolCallRateLimiter.check(1) : { allowed: true };
    if (rateLimited.allowed) {
      allowed.push(invocation);
      slots.push(undefined);
      continue;
    }
    const response: ToolResponsePayload = {
      error: `Tool call rate limit exceeded (max ${maxToolCallsPerMinute} per minute)`,
    };
    logger?.warn(`Rate limited tool call ${invocation.name} (${invocation.id})`);
    const result: ToolInvocationResult = {
      invocationId: invocation.id,
      name: invocation.name,
      response,
    };
    slots.push(result);
    sendResult(result);
  }

  const executed = await executor.executeMany(allowed, sendResult);

  const results: ToolInvocationResult[] = [];
  let next = 0;
  for (const slot of slots) {
    const result = slot ?? executed[next++];
    if (result) {
      results.push(result);
    }
  }

  if (isClosed()) {
    logger?.debug?.(`Discarding ${results.length} tool result(s) for a closed session`);
    return invocations.length;
  }

  try {
    await sendToolResult(results);
  } catch (err) {
    const message = describeError(err);
    logger?.error(`Failed to return tool results upstream: ${message}`);
    if (!isClosed()) {
      transport.sendJson({ type: 'error', error: `Failed to send tool results: ${message}` });
    }
  }
  return invocations.length;
}

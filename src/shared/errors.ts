export type DispatchErrorCode =
  | 'agent_unavailable'
  | 'agent_timeout'
  | 'agent_malformed_output'
  | 'agent_exited'
  | 'agent_canceled'
  | 'channel_delivery_failed'
  | 'capacity_exceeded';

export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly code: DispatchErrorCode,
    public readonly context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'DispatchError';
  }
}

/** The agent process could not be started or reached. */
export class AgentUnavailableError extends DispatchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'agent_unavailable', context);
    this.name = 'AgentUnavailableError';
  }
}

export class AgentTimeoutError extends DispatchError {
  constructor(public readonly timeoutMs: number, context?: Record<string, unknown>) {
    super(`agent did not answer within ${timeoutMs}ms`, 'agent_timeout', { ...context, timeoutMs });
    this.name = 'AgentTimeoutError';
  }
}

export class AgentMalformedOutputError extends DispatchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'agent_malformed_output', context);
    this.name = 'AgentMalformedOutputError';
  }
}

/** Non-zero exit, or the agent reported an error result. */
export class AgentExitedError extends DispatchError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    context?: Record<string, unknown>,
  ) {
    super(message, 'agent_exited', { ...context, exitCode });
    this.name = 'AgentExitedError';
  }
}

export class AgentCanceledError extends DispatchError {
  constructor(reason = 'invocation canceled', context?: Record<string, unknown>) {
    super(reason, 'agent_canceled', context);
    this.name = 'AgentCanceledError';
  }
}

export class ChannelDeliveryFailedError extends DispatchError {
  constructor(
    public readonly channelId: string,
    cause: unknown,
  ) {
    super(
      `delivery to ${channelId} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'channel_delivery_failed',
      { channelId },
    );
    this.name = 'ChannelDeliveryFailedError';
  }
}

/** Retry-later signal: global cap reached and the wait list is full. */
export class CapacityExceededError extends DispatchError {
  constructor(
    public readonly retryAfterMs: number,
    context?: Record<string, unknown>,
  ) {
    super('too many invocations in flight, retry later', 'capacity_exceeded', { ...context, retryAfterMs });
    this.name = 'CapacityExceededError';
  }
}

export type AgentError =
  | AgentUnavailableError
  | AgentTimeoutError
  | AgentMalformedOutputError
  | AgentExitedError
  | AgentCanceledError;

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

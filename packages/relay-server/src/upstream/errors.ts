import type { SessionState } from '@live-relay/shared';

export class NotConnectedError extends Error {
  constructor(message = 'Session not connected') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

export class UpstreamClosedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UpstreamClosedError';
  }
}

export class InvalidStateTransitionError extends Error {
  constructor(
    readonly from: SessionState,
    readonly to: SessionState,
  ) {
    super(`Invalid session state transition: ${from} -> ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

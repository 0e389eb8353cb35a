/**
 * Error types raised by the flow engine itself.
 *
 * Failures thrown by an agent's plan/run are never wrapped in these; they
 * reach the caller of runAsync exactly as the agent threw them.
 */

export type FlowErrorCode = 'EMPTY_FLOW' | 'INVALID_ACTION' | 'INVALID_CONFIG';

export class FlowError extends Error {
  code: FlowErrorCode;
  isOperational: boolean;

  constructor(message: string, code: FlowErrorCode) {
    super(message);
    this.name = 'FlowError';
    this.code = code;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class EmptyFlowError extends FlowError {
  constructor(flowName: string) {
    super(`Flow "${flowName}" has no start node; nothing was executed`, 'EMPTY_FLOW');
    this.name = 'EmptyFlowError';
  }
}

export class InvalidActionError extends FlowError {
  readonly received: unknown;

  constructor(received: unknown) {
    super(
      `Action metadata must be a string, received ${typeof received}`,
      'INVALID_ACTION',
    );
    this.name = 'InvalidActionError';
    this.received = received;
  }
}

export class InvalidConfigError extends FlowError {
  constructor(key: string, value: string) {
    super(`Invalid value "${value}" for ${key}`, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
  }
}

export function isFlowError(error: unknown): error is FlowError {
  return error instanceof FlowError;
}

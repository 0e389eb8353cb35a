import { InvalidActionError } from '../errors/flowErrors';
import { Action, KnownAction, Metadata } from '../types/flowTypes';

export const DEFAULT_ACTION = 'default' satisfies KnownAction;

export const ACTIONS = {
  default: 'default',
  success: 'success',
  failure: 'failure',
} as const satisfies Record<KnownAction, KnownAction>;

export function isKnownAction(action: string): action is KnownAction {
  return Object.values(ACTIONS).some((known) => known === action);
}

/**
 * Routing key for a node's output: metadata.action verbatim, or the
 * default label when the node did not set one.
 */
export function deriveAction(metadata?: Metadata): Action {
  const action = metadata?.action;
  if (action === undefined || action === null) {
    return DEFAULT_ACTION;
  }
  if (typeof action !== 'string') {
    throw new InvalidActionError(action);
  }
  return action;
}

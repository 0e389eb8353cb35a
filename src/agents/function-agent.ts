import { AgentNode } from './base-agent';
import { AgentInput, AgentOutput, PlanResult } from '../types/flowTypes';

export interface FunctionAgentHandlers<R> {
  /** Defaults to a plan that forwards the input's tools and parameters. */
  plan?: (input: AgentInput) => PlanResult | Promise<PlanResult>;
  run: (planResult: PlanResult) => AgentOutput<R> | Promise<AgentOutput<R>>;
}

/**
 * Agent assembled from plain handlers instead of a subclass.
 */
export class FunctionAgent<R = unknown> extends AgentNode<R> {
  private readonly handlers: FunctionAgentHandlers<R>;

  constructor(name: string, handlers: FunctionAgentHandlers<R>) {
    super(name);
    this.handlers = handlers;
  }

  plan(input: AgentInput): PlanResult | Promise<PlanResult> {
    if (this.handlers.plan) {
      return this.handlers.plan(input);
    }
    return {
      plan: `${this.name}: ${input.query}`,
      toolsToUse: input.tools ?? [],
      parameters: input.parameters ?? {},
      metadata: {
        query: input.query,
        ...(input.previous ? { previous: input.previous } : {}),
      },
    };
  }

  async run(planResult: PlanResult): Promise<AgentOutput<R>> {
    return this.handlers.run(planResult);
  }
}

export function createAgent<R>(
  name: string,
  handlers: FunctionAgentHandlers<R>,
): FunctionAgent<R> {
  return new FunctionAgent(name, handlers);
}

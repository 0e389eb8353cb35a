/**
 * Agent Node
 *
 * Leaf agents extend this class and implement the two-phase contract:
 * `plan` turns the input into execution parameters, `run` carries the
 * plan out and may perform I/O.
 */

import { BaseNode } from './base-node';
import { ContextStore } from '../services/context/contextStore';
import { AgentInput, AgentOutput, PlanResult } from '../types/flowTypes';
import logger from '../utils/logger';

export abstract class AgentNode<R = unknown> extends BaseNode {
  abstract plan(input: AgentInput): PlanResult | Promise<PlanResult>;

  abstract run(planResult: PlanResult): Promise<AgentOutput<R>>;

  /**
   * Merge parameters into the input, plan, then run. Errors from either
   * phase propagate untouched.
   */
  async execute(context: ContextStore, input: AgentInput): Promise<AgentOutput<R>> {
    const planResult = await this.plan(this.withParams(context, input));
    logger.debug(`${this.name} planned: ${planResult.plan}`);
    return this.run(planResult);
  }
}

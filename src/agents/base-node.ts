/**
 * Base Node
 *
 * Everything that can sit in a flow graph extends this class: leaf agents
 * and whole orchestrators alike. It owns the node's name, its parameter
 * bag and its outgoing successor map.
 */

import { DEFAULT_ACTION } from '../orchestrator/actions';
import { ContextStore } from '../services/context/contextStore';
import { Action, AgentInput, AgentOutput, Params } from '../types/flowTypes';

export abstract class BaseNode {
  readonly name: string;
  protected params: Params = {};
  private readonly successors: Map<Action, BaseNode> = new Map();

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Run this node once against the shared context.
   */
  abstract execute(context: ContextStore, input: AgentInput): Promise<AgentOutput>;

  setParams(params: Params): void {
    this.params = { ...params };
  }

  getParams(): Params {
    return { ...this.params };
  }

  /**
   * Register `node` as the successor for `action`, replacing any previous
   * entry for that label. Returns `node` so calls can be chained.
   */
  next<T extends BaseNode>(node: T, action: Action = DEFAULT_ACTION): T {
    this.successors.set(action, node);
    return node;
  }

  onDefault<T extends BaseNode>(node: T): T {
    return this.next(node, DEFAULT_ACTION);
  }

  on<T extends BaseNode>(action: Action, node: T): T {
    return this.next(node, action);
  }

  when(action: Action): ConditionalTransition {
    return new ConditionalTransition(this, action);
  }

  /**
   * Exact label first, then the default label. `undefined` ends the flow.
   */
  getNextNode(action: Action): BaseNode | undefined {
    return this.successors.get(action) ?? this.successors.get(DEFAULT_ACTION);
  }

  getSuccessors(): ReadonlyMap<Action, BaseNode> {
    return new Map(this.successors);
  }

  /**
   * Input as this node sees it. Precedence, lowest first: flow-level params
   * from the context, the input's own parameters, this node's params.
   */
  protected withParams(context: ContextStore, input: AgentInput): AgentInput {
    return {
      ...input,
      parameters: {
        ...context.getFlowParams(),
        ...input.parameters,
        ...this.params,
      },
    };
  }
}

/**
 * Binder returned by `node.when(label)`; `to(target)` completes the edge.
 */
export class ConditionalTransition {
  constructor(
    private readonly source: BaseNode,
    private readonly action: Action,
  ) {}

  to<T extends BaseNode>(target: T): T {
    return this.source.next(target, this.action);
  }
}

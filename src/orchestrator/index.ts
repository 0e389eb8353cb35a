/**
 * Flow Orchestrator
 *
 * Walks a graph of nodes from its start node, routing on the action each
 * node emits, until no successor resolves. An orchestrator is itself a
 * node, so a whole flow can be registered as a successor of another.
 *
 * No cycle detection and no hop limit: a graph that always routes back
 * into itself runs until the caller abandons it.
 */

import { BaseNode } from '../agents/base-node';
import { InputMode, loadInputMode } from '../config/flowConfig';
import { EmptyFlowError } from '../errors/flowErrors';
import { ContextStore } from '../services/context/contextStore';
import { AgentInput, AgentOutput } from '../types/flowTypes';
import logger from '../utils/logger';
import { deriveAction } from './actions';

export interface FlowOrchestratorOptions {
  /**
   * `original` hands every node the flow's input; `chained` also sets
   * `previous` to the preceding node's output. Defaults to FLOW_INPUT_MODE.
   */
  inputMode?: InputMode;
}

export class FlowOrchestrator extends BaseNode {
  private startNode?: BaseNode;
  readonly inputMode: InputMode;

  constructor(name = 'FlowOrchestrator', options: FlowOrchestratorOptions = {}) {
    super(name);
    this.inputMode = options.inputMode ?? loadInputMode();
  }

  /**
   * Set the start node. Returns it so the graph can be built from there.
   */
  start<T extends BaseNode>(node: T): T {
    this.startNode = node;
    return node;
  }

  getStartNode(): BaseNode | undefined {
    return this.startNode;
  }

  /**
   * Run as a step of an enclosing flow. Inner steps are recorded into the
   * same context as they happen; the enclosing flow then records this
   * flow's step and routes on the last inner output.
   */
  async execute(context: ContextStore, input: AgentInput): Promise<AgentOutput> {
    return this.runAsync(context, input);
  }

  async runAsync(context: ContextStore, input: AgentInput): Promise<AgentOutput> {
    // The cursor is local to this call; nodes are never written to.
    let current: BaseNode | undefined = this.startNode;
    if (!current) {
      throw new EmptyFlowError(this.name);
    }

    const flowInput = this.withParams(context, input);
    let output: AgentOutput | undefined;
    let steps = 0;

    logger.info(`Flow ${this.name} started at ${current.name}`);

    while (current) {
      const node: BaseNode = current;
      const stepInput: AgentInput =
        this.inputMode === 'chained' && output ? { ...flowInput, previous: output } : flowInput;

      const started = Date.now();
      try {
        output = await node.execute(context, stepInput);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Flow ${this.name} failed at ${node.name}: ${message}`);
        throw error;
      }

      const action = deriveAction(output.metadata);
      context.recordFlowStep(node.name, action, output.result, output.metadata);
      steps += 1;
      logger.debug(
        `Flow ${this.name}: ${node.name} -> ${action} (${Date.now() - started}ms)`,
      );

      current = node.getNextNode(action);
    }

    if (!output) {
      throw new EmptyFlowError(this.name);
    }

    logger.info(`Flow ${this.name} completed after ${steps} step(s)`);
    return output;
  }
}

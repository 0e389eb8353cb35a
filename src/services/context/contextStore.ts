/**
 * Context Store
 * Run-scoped execution record shared by every node of one flow invocation.
 *
 * Not safe for two concurrently running flows; allocate one store per
 * invocation.
 */

import {
  Action,
  FlowRecord,
  FlowSummary,
  Metadata,
  Params,
} from '../../types/flowTypes';

/**
 * Deep copy for history entries. Values structuredClone rejects, such as
 * functions, are kept by reference.
 */
function snapshot<T>(value: T): T {
  try {
    return structuredClone(value);
  } catch (error) {
    if (error instanceof Error && error.name === 'DataCloneError') {
      return value;
    }
    throw error;
  }
}

export class ContextStore {
  private flowHistory: FlowRecord[] = [];
  private branchDecisions: Action[] = [];
  private currentAgent?: string;
  private flowParams: Params;

  constructor(flowParams: Params = {}) {
    this.flowParams = { ...flowParams };
  }

  /**
   * Append one executed step. Never rejects a name or action.
   */
  recordFlowStep(
    agentName: string,
    action: Action,
    result: unknown,
    metadata: Metadata = {},
  ): FlowRecord {
    const record: FlowRecord = Object.freeze({
      step: this.flowHistory.length,
      agentName,
      action,
      result: snapshot(result),
      metadata: Object.freeze(snapshot({ ...metadata })),
      recordedAt: new Date().toISOString(),
    });

    this.flowHistory.push(record);
    this.branchDecisions.push(action);
    this.currentAgent = agentName;
    return record;
  }

  getFlowSummary(): FlowSummary {
    // Map keeps first-visit order
    const visits = new Map<string, number>();
    for (const record of this.flowHistory) {
      visits.set(record.agentName, (visits.get(record.agentName) ?? 0) + 1);
    }

    return {
      totalSteps: this.flowHistory.length,
      currentAgent: this.currentAgent,
      branchDecisions: [...this.branchDecisions],
      agentsVisited: [...visits.keys()],
      visitCounts: Object.fromEntries(visits),
    };
  }

  getHistory(): readonly FlowRecord[] {
    return [...this.flowHistory];
  }

  getLastRecord(): FlowRecord | undefined {
    return this.flowHistory[this.flowHistory.length - 1];
  }

  getCurrentAgent(): string | undefined {
    return this.currentAgent;
  }

  /**
   * Clear run state. Flow-level params survive.
   */
  resetFlow(): void {
    this.flowHistory = [];
    this.branchDecisions = [];
    this.currentAgent = undefined;
  }

  setFlowParams(params: Params): void {
    this.flowParams = { ...params };
  }

  getFlowParams(): Params {
    return { ...this.flowParams };
  }
}

/**
 * Type definitions for agent flows
 */

export type Params = Record<string, unknown>;
export type Metadata = Record<string, unknown>;

/**
 * Action labels the engine and bundled agents know about. Any other
 * string is still a valid routing key.
 */
export type KnownAction = 'default' | 'success' | 'failure';
export type Action = KnownAction | (string & {});

export interface AgentInput {
  query: string;
  context?: Record<string, unknown>;
  tools?: string[];
  parameters?: Params;
  /** Output of the preceding node, set only when a flow chains inputs. */
  previous?: AgentOutput;
}

export interface PlanResult {
  plan: string;
  toolsToUse: string[];
  parameters: Params;
  metadata?: Metadata;
}

export interface AgentOutput<R = unknown> {
  result: R;
  plan?: string;
  toolsUsed?: string[];
  metadata?: Metadata;
}

export interface FlowRecord {
  readonly step: number;
  readonly agentName: string;
  readonly action: Action;
  readonly result: unknown;
  readonly metadata: Readonly<Metadata>;
  readonly recordedAt: string;
}

export interface FlowSummary {
  totalSteps: number;
  currentAgent?: string;
  branchDecisions: Action[];
  agentsVisited: string[];
  visitCounts: Record<string, number>;
}

/**
 * Keyword Router Agent
 *
 * Picks a routing action by scanning the query for keywords. Rules are
 * checked in insertion order and the first keyword found wins.
 */

import { AgentNode } from '../base-agent';
import { DEFAULT_ACTION } from '../../orchestrator/actions';
import { Action, AgentInput, AgentOutput, PlanResult } from '../../types/flowTypes';

export interface KeywordRule {
  keyword: string;
  action: Action;
}

export interface KeywordRouterResult {
  query: string;
  matchedKeyword?: string;
}

export class KeywordRouterAgent extends AgentNode<KeywordRouterResult> {
  private readonly rules: KeywordRule[];
  private readonly fallbackAction: Action;

  constructor(name: string, rules: KeywordRule[], fallbackAction: Action = DEFAULT_ACTION) {
    super(name);
    this.rules = rules.map((rule) => ({ ...rule, keyword: rule.keyword.toLowerCase() }));
    this.fallbackAction = fallbackAction;
  }

  plan(input: AgentInput): PlanResult {
    const query = input.query.toLowerCase();
    const matched = this.rules.find((rule) => query.includes(rule.keyword));
    const action = matched?.action ?? this.fallbackAction;

    return {
      plan: matched
        ? `Route "${matched.keyword}" to ${action}`
        : `No keyword matched; route to ${action}`,
      toolsToUse: [],
      parameters: input.parameters ?? {},
      metadata: {
        query: input.query,
        action,
        ...(matched ? { matchedKeyword: matched.keyword } : {}),
      },
    };
  }

  async run(planResult: PlanResult): Promise<AgentOutput<KeywordRouterResult>> {
    const metadata = planResult.metadata ?? {};
    const query = typeof metadata.query === 'string' ? metadata.query : '';
    const matchedKeyword =
      typeof metadata.matchedKeyword === 'string' ? metadata.matchedKeyword : undefined;

    return {
      result: { query, matchedKeyword },
      plan: planResult.plan,
      toolsUsed: [],
      metadata: {
        agent_type: 'KeywordRouterAgent',
        action: metadata.action ?? this.fallbackAction,
      },
    };
  }
}

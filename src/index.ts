/**
 * Agent flow engine - public entry point
 *
 * Compose agents into graphs, route between them on emitted actions and
 * inspect the recorded history through a ContextStore.
 */

export { BaseNode, ConditionalTransition } from './agents/base-node';
export { AgentNode } from './agents/base-agent';
export { FunctionAgent, createAgent } from './agents/function-agent';
export type { FunctionAgentHandlers } from './agents/function-agent';
export { KeywordRouterAgent } from './agents/keyword-router';
export type { KeywordRule, KeywordRouterResult } from './agents/keyword-router';
export { FlowOrchestrator } from './orchestrator';
export type { FlowOrchestratorOptions } from './orchestrator';
export { ACTIONS, DEFAULT_ACTION, deriveAction, isKnownAction } from './orchestrator/actions';
export { ContextStore } from './services/context/contextStore';
export { FLOW_CONFIG, loadFlowConfig, loadInputMode, loadLogConfig } from './config/flowConfig';
export type {
  FlowConfig,
  InputMode,
  LoadFlowConfigOptions,
  LogConfig,
  LogLevel,
} from './config/flowConfig';
export {
  EmptyFlowError,
  FlowError,
  InvalidActionError,
  InvalidConfigError,
  isFlowError,
} from './errors/flowErrors';
export type { FlowErrorCode } from './errors/flowErrors';
export type * from './types/flowTypes';
export { default as logger } from './utils/logger';

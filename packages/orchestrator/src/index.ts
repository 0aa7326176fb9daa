export { Orchestrator, DEFAULT_SYSTEM_PROMPT } from './orchestrator'
export type { HandleMessageOptions, HandleMessageResult, OrchestratorConfig } from './orchestrator'

// Engine
export { ReactEngine, APOLOGY_RESPONSE, REACT_LOOP_AGENT_TYPE, SUMMARY_PROMPT } from './engines/react'
export type { ReactEngineConfig, ReactLoopResult, RunOptions, ToolCallRecord } from './engines/react'

// Dispatch
export { ToolDispatcher } from './dispatch/dispatcher'
export type { DispatchOptions, ToolDispatcherConfig, ToolResult } from './dispatch/dispatcher'
export { ToolPolicy } from './dispatch/policy'
export type { AgentToolRules, ToolPolicyConfig } from './dispatch/policy'
export { APPROVAL_OPTIONS, buildApprovalRequest } from './dispatch/approval'
export type { ApprovalRequest, BuildApprovalOptions } from './dispatch/approval'

export { summarizeArgs, withTimeout } from './utils'

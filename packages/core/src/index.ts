// Types
export * from './types'

// Agents
export { BaseAgent, parseApprovalResponse } from './agent/agent'
export type { ApprovalDecision, BaseAgentOptions } from './agent/agent'
export { AGENT_STATUSES, assertNever, canTransition, isAgentStatus, isTerminal, isWaiting } from './agent/status'
export { AgentRegistry, computeSchemaVersion } from './agent/registry'
export type { AgentRegistration, RiskLevel } from './agent/registry'

// Tools
export { ToolRegistry, defineTool } from './tool/registry'

// Middleware
export { MiddlewarePipeline } from './middleware/pipeline'

// Event
export { EventEmitter } from './event/emitter'

// Context window
export { ContextManager, FORCE_TRIM_KEEP, TRUNCATION_MARKER, contentText, keepRecent } from './context/manager'
export type { ContextBudget } from './context/manager'
export { SYNTHETIC_TOOL_RESULT, repairToolPairing } from './context/repair'
export type { RepairReport } from './context/repair'

// Configuration
export {
    CooldownConfigSchema,
    ReactLoopConfigSchema,
    RoutingRuleSchema,
    SessionConfigSchema,
    parseReactLoopConfig,
    parseSessionConfig,
} from './config'
export type { CooldownConfig, ReactLoopConfig, RoutingRule, SessionConfig } from './config'

// Errors
export {
    AgentTypeNotFoundError,
    AllCandidatesExhaustedError,
    CheckpointError,
    CheckpointParentMissingError,
    ContextOverflowError,
    InvalidTransitionError,
    MiddlewareError,
    ToolTimeoutError,
    classifyFailure,
    errorMessage,
    extractStatusCode,
    isContextOverflow,
} from './errors'
export type { FailureReason, FallbackAttempt } from './errors'

// Logging
export { silentLogger } from './logger'
export type { LogLevel, LogMeta, Logger } from './logger'

// Run context
export { addUsage, createRunContext, emptyUsage } from './context/factory'
export type { CreateRunContextOptions } from './context/factory'

export { ProviderRegistry } from './registry'
export { FallbackClient, candidateKey } from './fallback'
export type { CooldownState, FallbackClientConfig, ModelCandidate } from './fallback'
export { DEFAULT_ROUTING_RULES, ModelRouter, extractJsonObject, parseClassifierOutput } from './router'
export type { ClassifierOutput, ModelRouterConfig, RoutingDecision } from './router'

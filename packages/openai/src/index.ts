export { OpenAIProvider, openai } from './provider'
export type { OpenAIProviderConfig } from './provider'
export { extractToolCalls, extractUsage, parseToolArguments, toOpenAIMessages, toOpenAITools } from './convert'

// Types
export * from './types'

// Errors
export * from './errors'

// Messages
export { createMessage, formatMessage } from './messages/message'
export type { MessageFields } from './messages/message'
export {
    AgentResponseSchema,
    MessageWireSchema,
    ToolCallSchema,
    fromWire,
    toAgentResponse,
    toWire,
} from './messages/schema'
export type { MessageWire } from './messages/schema'

// Response normalization
export { normalizeResponse, stripPreamble, extractFencedBlock, extractJsonObject } from './response/normalize'
export { coerceScalar, defaultStrategies, functionCallsStrategy, xmlToolCallStrategy } from './response/strategies'
export type { ResponseStrategy } from './response/strategies'
export { DEFAULT_TOOL_REASONING, toAgentResponseJson } from './response/canonical'
export type { CanonicalResponseInput } from './response/canonical'

// Tools
export { Tool, createTool, defineTool, formatValidationError, stringifyResult } from './tool/tool'
export type { AnyToolDefinition, NoDependencies, ToolDefinition } from './tool/tool'

// Observers
export { ObserverBus } from './observer/bus'

// Agent
export { Agent, MAX_TURNS_MARKER } from './agent/agent'
export { DEFAULT_SYSTEM_PROMPT, renderSystemPrompt, renderToolDescriptions } from './agent/prompt'
export { createAgent } from './factory/agent'

// Checkpoints
export {
    CheckpointFileSchema,
    deserializeCheckpoint,
    readCheckpoint,
    serializeCheckpoint,
    writeCheckpoint,
} from './checkpoint/checkpoint'
export type { CheckpointFile } from './checkpoint/checkpoint'

// Config
export { DEFAULT_BASE_URL, loadConfig } from './config/config'
export type { AppConfig } from './config/config'

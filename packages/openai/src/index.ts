export {
    CONTENT_FILTER_PLACEHOLDER,
    NATIVE_TOOL_REASONING,
    OpenAIProvider,
    createProvider,
    mapProviderError,
    openai,
    toOpenAIMessages,
} from './provider'
export type { CompletionsClient, OpenAIProviderConfig } from './provider'

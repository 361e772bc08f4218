import type { Message, MessageRole } from '../types'

export type MessageFields = Omit<Message, 'role' | 'content' | 'timestamp'>

export function createMessage(role: MessageRole, content: string, fields: MessageFields = {}): Message {
    return { ...fields, role, content, timestamp: Date.now() }
}

function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max - 3)}...` : text
}

/**
 * One-line human readable form, e.g.
 * `Assistant [ERROR: parse_error] [calls: call_1]: {"reasoning"...`
 */
export function formatMessage(message: Message): string {
    let prefix = message.role.charAt(0).toUpperCase() + message.role.slice(1)

    if (message.errorCode) prefix += ` [ERROR: ${message.errorCode}]`

    if (message.role === 'assistant' && message.toolCalls?.length) {
        prefix += ` [calls: ${message.toolCalls.map((tc) => tc.id).join(', ')}]`
    }

    if (message.role === 'tool') {
        prefix += ` [${message.name ?? 'unknown'}#${message.toolCallId ?? '?'}]`
    }

    return `${prefix}: ${truncate(message.content, 100)}`
}

import { defaultStrategies } from './strategies'
import type { ResponseStrategy } from './strategies'

const PREAMBLES = [
    /^\s*Assistant:\s*/i,
    /^\s*Here\s+(?:is|are)\s+(?:the\s+)?(?:JSON|response|result)s?:?\s*/i,
    /^\s*Response:\s*/i,
    /^\s*Output:\s*/i,
]

const FENCED_BLOCK = /```(?:json)?[^\S\n]*\n?([\s\S]*?)\n?\s*```/i

/** Removes chatty lead-ins such as `Here is the JSON:` from the start. */
export function stripPreamble(text: string): string {
    return PREAMBLES.reduce((acc, pattern) => acc.replace(pattern, ''), text)
}

/** Inner content of the first ``` / ```json block, or the text unchanged. */
export function extractFencedBlock(text: string): string {
    const match = FENCED_BLOCK.exec(text)
    return match?.[1] ?? text
}

/**
 * Cuts the first balanced `{...}` object out of `text`, ignoring braces
 * inside double-quoted strings. Unbalanced input yields everything from the
 * first `{`; input without `{` is returned unchanged.
 */
export function extractJsonObject(text: string): string {
    const start = text.indexOf('{')
    if (start === -1) return text

    let depth = 0
    let inString = false
    let escaped = false

    for (let i = start; i < text.length; i++) {
        const char = text[i]

        if (escaped) {
            escaped = false
            continue
        }
        if (char === '\\') {
            escaped = true
            continue
        }
        if (char === '"') {
            inString = !inString
            continue
        }
        if (inString) continue

        if (char === '{') {
            depth++
        } else if (char === '}') {
            depth--
            if (depth === 0) return text.slice(start, i + 1)
        }
    }

    return text.slice(start)
}

/**
 * Turns raw model output into canonical structured-response JSON.
 *
 * Tool-call dialects are tried first, in order, and the first match wins.
 * Otherwise the text is cleaned of preambles, code fences and trailing chatter.
 * Text that already opens with `{` is never searched for a fence, so fences
 * quoted inside string values survive.
 * Unrecognised text passes through; the caller's JSON parse then fails and
 * that becomes a recoverable parse error. Never throws.
 */
export function normalizeResponse(
    raw: string,
    strategies: readonly ResponseStrategy[] = defaultStrategies,
): string {
    for (const strategy of strategies) {
        const converted = strategy.apply(raw)
        if (converted !== undefined) return converted
    }

    const text = stripPreamble(raw)
    const unfenced = text.trimStart().startsWith('{') ? text : extractFencedBlock(text)
    return extractJsonObject(unfenced)
}

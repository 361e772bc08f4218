import { z } from 'zod'
import type { AgentTool, Message, ToolSchema } from '../types'
import { ErrorCode } from '../types'
import { createMessage } from '../messages/message'

// ─── Definition ──────────────────────────────────────────────────────────────

export type NoDependencies = Record<string, never>

/**
 * A tool as authored: a zod input schema bound to an action.
 *
 * `dependencies` names the resources the action needs injected at
 * construction time (tables, clients, root directories). They are never
 * shown to the model.
 */
export interface ToolDefinition<TSchema extends z.ZodType = z.ZodType, TDeps extends object = NoDependencies> {
    /** Name the model calls the tool by */
    name: string
    /** One line shown to the model */
    description: string
    input: TSchema
    dependencies?: readonly (keyof TDeps & string)[]
    execute(args: z.output<TSchema>, deps: TDeps): unknown
}

/**
 * Helper to define a tool with full type inference.
 *
 * @example
 * ```ts
 * const echo = defineTool({
 *   name: 'echo',
 *   description: 'Repeats the given text',
 *   input: z.object({ text: z.string() }),
 *   execute: ({ text }) => text,
 * })
 * ```
 */
export function defineTool<TSchema extends z.ZodType, TDeps extends object = NoDependencies>(
    definition: ToolDefinition<TSchema, TDeps>,
): ToolDefinition<TSchema, TDeps> {
    return definition
}

// ─── Runtime ─────────────────────────────────────────────────────────────────

/** A definition with its type parameters erased, as the runtime holds it. */
export interface AnyToolDefinition {
    name: string
    description: string
    input: z.ZodType
    dependencies?: readonly string[]
    execute(args: unknown, deps: object): unknown
}

/**
 * Binds a definition to its dependencies. `run()` never rejects: invalid
 * arguments, missing dependencies and thrown errors all come back as tool
 * messages tagged with an error code so the model can read and react.
 */
export class Tool implements AgentTool {
    readonly name: string
    readonly description: string
    readonly schema: ToolSchema

    constructor(
        private readonly definition: AnyToolDefinition,
        private readonly dependencies: object = {},
    ) {
        this.name = definition.name
        this.description = definition.description
        this.schema = {
            name: definition.name,
            description: definition.description,
            parameters: toJsonSchema(definition.input),
        }
    }

    async run(rawArgs: unknown): Promise<Message> {
        const parsed = this.definition.input.safeParse(rawArgs)
        if (!parsed.success) {
            return this.failure(ErrorCode.VALIDATION_ERROR, formatValidationError(this.name, parsed.error, rawArgs))
        }

        const mismatch = this.dependencyMismatch()
        if (mismatch) return this.failure(ErrorCode.EXECUTION_ERROR, mismatch)

        try {
            const result = await this.definition.execute(parsed.data, this.dependencies)
            return createMessage('tool', stringifyResult(result), { name: this.name })
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err)
            return this.failure(ErrorCode.EXECUTION_ERROR, `Tool execution error: ${message}`)
        }
    }

    /** Prompt block listing name, description and argument schema. */
    renderSchema(): string {
        const args = JSON.stringify(this.schema.parameters, null, 2)
        return `\n---\n\nTool Name: ${this.name}\nTool Description: ${this.description}\nTool Arguments: ${args}\n`
    }

    private dependencyMismatch(): string | undefined {
        const declared = this.definition.dependencies ?? []
        const provided = Object.keys(this.dependencies)

        const missing = declared.filter((key) => !provided.includes(key))
        const unexpected = provided.filter((key) => !declared.includes(key))
        if (missing.length === 0 && unexpected.length === 0) return undefined

        const problems: string[] = []
        if (missing.length > 0) problems.push(`missing [${missing.join(', ')}]`)
        if (unexpected.length > 0) problems.push(`unexpected [${unexpected.join(', ')}]`)
        return `Tool '${this.name}' dependency mismatch: ${problems.join(', ')}. Provided: [${provided.join(', ')}]`
    }

    private failure(errorCode: ErrorCode, content: string): Message {
        return createMessage('tool', content, { name: this.name, errorCode })
    }
}

export function createTool<TSchema extends z.ZodType>(definition: ToolDefinition<TSchema>): Tool
export function createTool<TSchema extends z.ZodType, TDeps extends object>(
    definition: ToolDefinition<TSchema, TDeps>,
    dependencies: TDeps,
): Tool
export function createTool(definition: AnyToolDefinition, dependencies: object = {}): Tool {
    return new Tool(definition, dependencies)
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function toJsonSchema(input: z.ZodType): Record<string, unknown> {
    return Object.fromEntries(Object.entries(z.toJSONSchema(input, { io: 'input' })).filter(([key]) => key !== '$schema'))
}

/** Strings pass through; everything else is rendered as JSON. */
export function stringifyResult(value: unknown): string {
    if (typeof value === 'string') return value
    if (value === undefined) return ''
    return JSON.stringify(value) ?? String(value)
}

function hasKey(value: unknown, key: PropertyKey): boolean {
    return typeof value === 'object' && value !== null && key in value
}

/**
 * One line per invalid field, e.g.
 * `- Field 'operation': invalid value. Accepted values: 'add', 'subtract'`
 */
export function formatValidationError(toolName: string, error: z.ZodError, rawArgs: unknown): string {
    const lines = error.issues.map((issue) => {
        const field = issue.path.length > 0 ? issue.path.map(String).join('.') : 'arguments'
        const top = issue.path[0]

        if (issue.code === 'invalid_value') {
            const accepted = issue.values.map((v) => `'${String(v)}'`).join(', ')
            return `- Field '${field}': invalid value. Accepted values: ${accepted}`
        }
        if (issue.code === 'invalid_type' && top !== undefined && !hasKey(rawArgs, top)) {
            return `- Field '${field}': Field required`
        }
        return `- Field '${field}': ${issue.message}`
    })

    return `Invalid arguments for tool '${toolName}':\n${lines.join('\n')}`
}

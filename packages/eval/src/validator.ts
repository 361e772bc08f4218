import { z } from 'zod'
import type { Message, Result, ToolCall } from '@turnloop/core'
import { getGroundTruth, isTestFile } from './ground-truth'
import type { FileTree, TargetPredicate } from './ground-truth'
import { extractNumbers, normalizePath, parseListing } from './listing'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TraceValidatorOptions {
    /**
     * The first directory the task asks the agent to list.
     * @default 'framework'
     */
    initialPath?: string
    /** @default 'list_directory' */
    listTool?: string
    /** @default 'calculator' */
    computeTool?: string
    /**
     * Directory names never required (cache artifacts).
     * @default ['__pycache__']
     */
    skipDirectories?: readonly string[]
    /** @default isTestFile */
    isTarget?: TargetPredicate
}

export type Violation =
    | {
        type: 'invalid_argument'
        tool: string
        arg: string
        value: number
        turn: number
        /** Sorted sample of what was valid when the call was made */
        validAtTime: number[]
        message: string
    }
    | { type: 'unknown_tool'; tool: string; turn: number; message: string }

export type Warning =
    | { type: 'extra_exploration'; path: string; turn: number; message: string }
    | { type: 'unmatched_result'; toolCallId: string; message: string }

export type CheckName =
    | 'used_calculator'
    | 'correct_answer'
    | 'used_only_valid_values'
    | 'used_correct_test_files'
    | 'explored_required_paths'

export interface CheckResult {
    name: CheckName
    passed: boolean
    message: string
    details: Record<string, unknown>
}

export interface TraceMetrics {
    totalToolCalls: number
    toolCalls: Record<string, number>
    assistantTurns: number
    totalMessages: number
}

export interface ValidationReport {
    summary: { passed: number; total: number; allPassed: boolean }
    groundTruth: { expectedAnswer: number; targetCount: number; requiredPaths: string[] }
    metrics: TraceMetrics
    checks: CheckResult[]
    finalAnswer: number | null
    violations: readonly Violation[]
    warnings: readonly Warning[]
}

const VALID_SAMPLE_SIZE = 20

// ─── State machine ───────────────────────────────────────────────────────────

/**
 * Walks a trace in order, tracking which listings are still owed and which
 * numbers the agent has legitimately seen.
 *
 * Results are batched by turn: whatever a turn's tool calls return becomes
 * usable when the next assistant turn begins, never by sibling calls of the
 * same turn.
 */
export class TraceValidator {
    readonly violations: Violation[] = []
    readonly warnings: Warning[] = []

    private readonly listTool: string
    private readonly computeTool: string
    private readonly skipDirectories: ReadonlySet<string>
    private readonly isTarget: TargetPredicate

    private readonly required: string[]
    private readonly explored = new Set<string>()
    private readonly valid = new Set<number>()
    private pending: number[] = []
    private readonly fileSizesSeen = new Set<number>()
    private readonly targetSizesSeen = new Set<number>()
    private readonly computed = new Set<number>()
    private readonly nonTargetSizesUsed = new Set<number>()
    private readonly callCounts: Record<string, number> = {}
    private currentTurn = 0

    constructor(options: TraceValidatorOptions = {}) {
        this.listTool = options.listTool ?? 'list_directory'
        this.computeTool = options.computeTool ?? 'calculator'
        this.skipDirectories = new Set(options.skipDirectories ?? ['__pycache__'])
        this.isTarget = options.isTarget ?? isTestFile
        this.required = [normalizePath(options.initialPath ?? 'framework')]
    }

    get requiredCalls(): readonly string[] {
        return this.required
    }

    get exploredPaths(): ReadonlySet<string> {
        return this.explored
    }

    get validValues(): ReadonlySet<number> {
        return this.valid
    }

    get seenTargetSizes(): ReadonlySet<number> {
        return this.targetSizesSeen
    }

    /** Listed sizes of non-target files passed straight to the compute tool */
    get summedNonTargetSizes(): ReadonlySet<number> {
        return this.nonTargetSizesUsed
    }

    get computeCalls(): number {
        return this.callCounts[this.computeTool] ?? 0
    }

    /** Results from earlier turns become valid from here on. */
    beginTurn(turn: number): void {
        this.currentTurn = turn
        this.flush()
    }

    /** End of trace: the last turn's results count for the final answer. */
    finish(): void {
        this.flush()
    }

    validateCall(call: ToolCall, turn: number = this.currentTurn): boolean {
        this.callCounts[call.tool] = (this.callCounts[call.tool] ?? 0) + 1

        if (call.tool === this.listTool) return this.validateListing(call, turn)
        if (call.tool === this.computeTool) return this.validateComputation(call, turn)

        this.violations.push({
            type: 'unknown_tool',
            tool: call.tool,
            turn,
            message: `Turn ${turn} called unknown tool '${call.tool}'`,
        })
        return false
    }

    processResult(call: ToolCall, result: Message): void {
        if (result.errorCode) return

        if (call.tool === this.listTool) {
            this.processListing(call, result.content)
        } else if (call.tool === this.computeTool) {
            const text = result.content.trim()
            const value = Number(text)
            if (text !== '' && Number.isFinite(value)) {
                this.pending.push(value)
                this.computed.add(value)
            }
        }
    }

    noteUnmatchedResult(result: Message): void {
        this.warnings.push({
            type: 'unmatched_result',
            toolCallId: result.toolCallId ?? '',
            message: `Tool result '${result.toolCallId ?? ''}' answers no earlier call`,
        })
    }

    private flush(): void {
        this.pending.forEach((v) => this.valid.add(v))
        this.pending = []
    }

    private validateListing(call: ToolCall, turn: number): boolean {
        const path = pathArg(call)
        this.explored.add(path)

        const index = this.required.indexOf(path)
        if (index !== -1) {
            this.required.splice(index, 1)
            return true
        }

        this.warnings.push({
            type: 'extra_exploration',
            path,
            turn,
            message: `Listed '${path}' but not required for task`,
        })
        return true
    }

    private validateComputation(call: ToolCall, turn: number): boolean {
        let ok = true
        for (const [arg, value] of Object.entries(call.args)) {
            if (typeof value !== 'number') continue

            if (this.isNonTargetSize(value)) this.nonTargetSizesUsed.add(value)
            if (this.valid.has(value)) continue

            ok = false
            this.violations.push({
                type: 'invalid_argument',
                tool: call.tool,
                arg,
                value,
                turn,
                validAtTime: [...this.valid].sort((a, b) => a - b).slice(0, VALID_SAMPLE_SIZE),
                message: `${call.tool} arg '${arg}=${value}' not from known values`,
            })
        }
        return ok
    }

    // A size shared with a target file or a computed total is ambiguous and not counted.
    private isNonTargetSize(value: number): boolean {
        return this.fileSizesSeen.has(value) && !this.targetSizesSeen.has(value) && !this.computed.has(value)
    }

    private processListing(call: ToolCall, content: string): void {
        const base = pathArg(call)
        const listing = parseListing(content)

        for (const name of listing.directories) {
            if (this.skipDirectories.has(name)) continue
            const child = base ? `${base}/${name}` : name
            if (!this.required.includes(child) && !this.explored.has(child)) this.required.push(child)
        }

        for (const file of listing.files) {
            this.pending.push(file.size)
            this.fileSizesSeen.add(file.size)
            if (this.isTarget(base ? `${base}/${file.name}` : file.name)) this.targetSizesSeen.add(file.size)
        }
    }
}

function pathArg(call: ToolCall): string {
    const path = call.args['path']
    return normalizePath(typeof path === 'string' ? path : '')
}

// ─── Final answer ────────────────────────────────────────────────────────────

const FinishedReplySchema = z.object({ is_finished: z.literal(true), result: z.string() })

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text)
    } catch {
        return undefined
    }
}

/**
 * First number of the run's returned value. Without one, looks back over the
 * last three assistant turns for a finished reply's result or, for non-JSON
 * replies, the last number in the text.
 */
export function extractFinalAnswer(
    messages: readonly Message[],
    finalResult?: Pick<Result, 'value'> | null,
): number | null {
    const fromResult = extractNumbers(finalResult?.value ?? '')[0]
    if (fromResult !== undefined) return fromResult

    const recent = messages.filter((m) => m.role === 'assistant' && !m.errorCode).slice(-3).reverse()
    for (const message of recent) {
        const json = parseJson(message.content)
        if (json === undefined) {
            const last = extractNumbers(message.content).at(-1)
            if (last !== undefined) return last
            continue
        }

        const finished = FinishedReplySchema.safeParse(json)
        if (!finished.success) continue
        const first = extractNumbers(finished.data.result)[0]
        if (first !== undefined) return first
    }

    return null
}

// ─── Report ──────────────────────────────────────────────────────────────────

export interface ValidateTraceOptions extends TraceValidatorOptions {
    filesystem: FileTree
    /** What `agent.run()` returned */
    finalResult?: Pick<Result, 'value'> | null
}

export function computeMetrics(messages: readonly Message[]): TraceMetrics {
    const toolCalls: Record<string, number> = {}
    let totalToolCalls = 0
    let assistantTurns = 0

    for (const message of messages) {
        if (message.role !== 'assistant') continue
        assistantTurns++
        for (const call of message.toolCalls ?? []) {
            toolCalls[call.tool] = (toolCalls[call.tool] ?? 0) + 1
            totalToolCalls++
        }
    }

    return { totalToolCalls, toolCalls, assistantTurns, totalMessages: messages.length }
}

function sorted(values: Iterable<number>): number[] {
    return [...values].sort((a, b) => a - b)
}

/**
 * Replays `messages` through a `TraceValidator` and grades the run against
 * the ground truth of `filesystem`.
 *
 * @example
 * ```ts
 * const report = validateTrace(agent.messages, { filesystem, finalResult: result })
 * if (!report.summary.allPassed) console.log(formatReport(report))
 * ```
 */
export function validateTrace(messages: readonly Message[], options: ValidateTraceOptions): ValidationReport {
    const computeTool = options.computeTool ?? 'calculator'
    const truth = getGroundTruth(options.filesystem, options.isTarget)
    const validator = new TraceValidator(options)
    const calls = new Map<string, ToolCall>()

    let turn = 0
    for (const message of messages) {
        if (message.role === 'assistant') {
            turn++
            validator.beginTurn(turn)
            for (const call of message.toolCalls ?? []) {
                calls.set(call.id, call)
                validator.validateCall(call, turn)
            }
        } else if (message.role === 'tool') {
            const call = message.toolCallId ? calls.get(message.toolCallId) : undefined
            if (call) {
                validator.processResult(call, message)
            } else {
                validator.noteUnmatchedResult(message)
            }
        }
    }
    validator.finish()

    const finalAnswer = extractFinalAnswer(messages, options.finalResult)

    const checks: CheckResult[] = [
        checkUsedCalculator(validator, computeTool),
        checkCorrectAnswer(finalAnswer, truth.expectedAnswer, validator.validValues),
        checkValidValues(validator.violations, computeTool),
        checkTargetFiles(truth.targetSizes, validator.seenTargetSizes, validator.summedNonTargetSizes),
        checkExploredPaths(truth.requiredPaths, validator.exploredPaths, validator.requiredCalls),
    ]
    const passed = checks.filter((c) => c.passed).length

    return {
        summary: { passed, total: checks.length, allPassed: passed === checks.length },
        groundTruth: {
            expectedAnswer: truth.expectedAnswer,
            targetCount: truth.targetCount,
            requiredPaths: truth.requiredPaths,
        },
        metrics: computeMetrics(messages),
        checks,
        finalAnswer,
        violations: validator.violations,
        warnings: validator.warnings,
    }
}

// ─── Checks ──────────────────────────────────────────────────────────────────

function checkUsedCalculator(validator: TraceValidator, computeTool: string): CheckResult {
    const count = validator.computeCalls
    return {
        name: 'used_calculator',
        passed: count > 0,
        message: count > 0 ? `Agent used ${computeTool} ${count} time(s)` : `Agent did not use ${computeTool} tool`,
        details: { calls: count },
    }
}

function checkCorrectAnswer(answer: number | null, expected: number, valid: ReadonlySet<number>): CheckResult {
    const details = { expected, actual: answer }

    if (answer === null) {
        return { name: 'correct_answer', passed: false, message: 'No final answer found', details }
    }
    if (answer !== expected) {
        return {
            name: 'correct_answer',
            passed: false,
            message: `Final answer is wrong: expected ${expected}, got ${answer}`,
            details,
        }
    }
    if (!valid.has(answer)) {
        return {
            name: 'correct_answer',
            passed: false,
            message: `Final answer ${answer} does not appear in any tool result`,
            details,
        }
    }
    return { name: 'correct_answer', passed: true, message: `Correct answer: ${expected}`, details }
}

function checkValidValues(violations: readonly Violation[], computeTool: string): CheckResult {
    const invalid = violations.filter((v) => v.type === 'invalid_argument')
    if (invalid.length > 0) {
        return {
            name: 'used_only_valid_values',
            passed: false,
            message: `Found ${invalid.length} invalid value(s) used in ${computeTool}`,
            details: { invalidUses: invalid },
        }
    }
    return {
        name: 'used_only_valid_values',
        passed: true,
        message: `All ${computeTool} values came from listings or earlier results`,
        details: {},
    }
}

function checkTargetFiles(
    expected: ReadonlySet<number>,
    seen: ReadonlySet<number>,
    summedNonTargets: ReadonlySet<number>,
): CheckResult {
    const missing = sorted([...expected].filter((s) => !seen.has(s)))
    const extra = sorted([...seen].filter((s) => !expected.has(s)))
    const nonTest = sorted(summedNonTargets)

    if (missing.length === 0 && extra.length === 0 && nonTest.length === 0) {
        return {
            name: 'used_correct_test_files',
            passed: true,
            message: `Correctly found all ${expected.size} test file sizes`,
            details: { found: seen.size },
        }
    }

    const issues: string[] = []
    if (missing.length > 0) issues.push(`never found ${missing.length} test file(s)`)
    if (extra.length > 0) issues.push(`found ${extra.length} unexpected test file(s)`)
    if (nonTest.length > 0) issues.push(`summed ${nonTest.length} non-test file(s)`)

    return {
        name: 'used_correct_test_files',
        passed: false,
        message: `File filtering error: ${issues.join(', ')}`,
        details: {
            expectedCount: expected.size,
            foundCount: seen.size,
            missingSizes: missing,
            extraSizes: extra,
            nonTestSizes: nonTest,
        },
    }
}

function checkExploredPaths(
    requiredPaths: readonly string[],
    explored: ReadonlySet<string>,
    outstanding: readonly string[],
): CheckResult {
    const missing = [...new Set([...requiredPaths.filter((p) => !explored.has(p)), ...outstanding])].sort()

    if (missing.length > 0) {
        return {
            name: 'explored_required_paths',
            passed: false,
            message: `Did not explore ${missing.length} required path(s)`,
            details: { explored: [...explored].sort(), required: requiredPaths, missing },
        }
    }
    return {
        name: 'explored_required_paths',
        passed: true,
        message: `Explored all ${requiredPaths.length} required paths`,
        details: { explored: explored.size },
    }
}

import { Agent } from '@turnloop/core'
import type { AgentObserver, Logger, Message, ModelProvider, Result } from '@turnloop/core'
import { calculator } from '@turnloop/tools'
import type { FileTree } from './ground-truth'
import { createMockListDirectoryTool, loadFilesystem, loadPrompt } from './mock-tools'
import { validateTrace } from './validator'
import type { ValidationReport } from './validator'

export interface EvaluationOptions {
    provider: ModelProvider
    /**
     * Scenario name under `scenarios/`, a path to a JSON file, or a tree.
     * @default 'basic'
     */
    filesystem?: string | FileTree
    /**
     * Prompt name under `prompts/` or a path to a text file.
     * @default 'find_test_files'
     */
    prompt?: string
    /** @default 15 */
    maxTurns?: number
    observers?: AgentObserver[]
    logger?: Logger
    /** Save a checkpoint here if the run throws */
    autoCheckpoint?: string
}

export interface EvaluationOutcome {
    result: Result
    report: ValidationReport
    messages: readonly Message[]
}

/**
 * Runs an agent with a mock `list_directory` and the calculator against a
 * scenario, then validates the trace it produced.
 *
 * @example
 * ```ts
 * const { report } = await runEvaluation({ provider: createProvider(loadConfig()) })
 * console.log(formatReport(report))
 * ```
 */
export async function runEvaluation(options: EvaluationOptions): Promise<EvaluationOutcome> {
    const filesystem =
        typeof options.filesystem === 'object' ? options.filesystem : await loadFilesystem(options.filesystem ?? 'basic')
    const prompt = await loadPrompt(options.prompt ?? 'find_test_files')

    const agent = new Agent({
        provider: options.provider,
        tools: [createMockListDirectoryTool(filesystem), calculator()],
        observers: options.observers,
        maxTurns: options.maxTurns ?? 15,
        logger: options.logger,
    })

    const result = await agent.run({ input: prompt, autoCheckpoint: options.autoCheckpoint })
    const report = validateTrace(agent.messages, { filesystem, finalResult: result })

    return { result, report, messages: agent.messages }
}

/** Human-readable report, one line per check. */
export function formatReport(report: ValidationReport): string {
    const lines = [
        `Validation: ${report.summary.passed}/${report.summary.total} checks passed`,
        `Expected answer: ${report.groundTruth.expectedAnswer} (${report.groundTruth.targetCount} files)`,
        `Final answer: ${report.finalAnswer ?? 'none'}`,
        `Tool calls: ${report.metrics.totalToolCalls} over ${report.metrics.assistantTurns} turns`,
        '',
        ...report.checks.map((c) => `${c.passed ? '✓' : '✗'} ${c.name}: ${c.message}`),
    ]

    if (report.violations.length > 0) {
        lines.push('', 'Violations:', ...report.violations.map((v) => `  - ${v.message}`))
    }
    if (report.warnings.length > 0) {
        lines.push('', 'Warnings:', ...report.warnings.map((w) => `  - ${w.message}`))
    }

    return lines.join('\n')
}

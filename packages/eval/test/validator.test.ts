import { describe, expect, it } from 'vitest'
import type { Message, ToolCall } from '@turnloop/core'
import { TraceValidator, extractFinalAnswer, validateTrace } from '../src'
import type { FileTree } from '../src'
import { add, list } from './helpers/trace'

const tree: FileTree = {
    framework: {
        'core.py': 500,
        __pycache__: { 'core.pyc': 900 },
        tests: { 'test_a.py': 100, 'test_b.py': 200, 'util.py': 40 },
    },
}

function result(call: ToolCall, content: string): Message {
    return { role: 'tool', content, timestamp: 0, name: call.tool, toolCallId: call.id }
}

function assistant(calls: ToolCall[] | null, content = '{}'): Message {
    return { role: 'assistant', content, timestamp: 0, toolCalls: calls ?? undefined }
}

const FRAMEWORK_LISTING = [
    "Contents of 'framework':",
    '  __pycache__/ (directory, 1 items)',
    '  core.py (file, 500 bytes)',
    '  tests/ (directory, 3 items)',
].join('\n')

const TESTS_LISTING = [
    "Contents of 'framework/tests':",
    '  test_a.py (file, 100 bytes)',
    '  test_b.py (file, 200 bytes)',
    '  util.py (file, 40 bytes)',
].join('\n')

describe('TraceValidator', () => {
    it('should only accept results from earlier turns', () => {
        const validator = new TraceValidator()
        const listing = list('l1', 'framework')

        validator.beginTurn(1)
        validator.validateCall(listing)
        validator.processResult(listing, result(listing, FRAMEWORK_LISTING))

        expect(validator.validateCall(add('c1', 500, 500))).toBe(false)
        expect(validator.violations[0]).toMatchObject({ type: 'invalid_argument', value: 500, turn: 1, validAtTime: [] })

        validator.beginTurn(2)
        expect(validator.validateCall(add('c2', 500, 500))).toBe(true)
        expect(validator.validValues.has(500)).toBe(true)
    })

    it('should queue discovered directories and skip caches', () => {
        const validator = new TraceValidator()
        const listing = list('l1', './framework/')

        validator.beginTurn(1)
        validator.validateCall(listing)
        validator.processResult(listing, result(listing, FRAMEWORK_LISTING))

        expect(validator.requiredCalls).toEqual(['framework/tests'])
        expect(validator.exploredPaths.has('framework')).toBe(true)
    })

    it('should check off a required path given with a leading slash', () => {
        const validator = new TraceValidator()
        validator.beginTurn(1)
        validator.validateCall(list('l1', '/framework'))

        expect(validator.requiredCalls).toEqual([])
        expect(validator.warnings).toEqual([])
    })

    it('should warn about listings nobody asked for', () => {
        const validator = new TraceValidator()
        validator.beginTurn(1)
        validator.validateCall(list('l1', 'framework/__pycache__'))

        expect(validator.warnings).toEqual([
            {
                type: 'extra_exploration',
                path: 'framework/__pycache__',
                turn: 1,
                message: "Listed 'framework/__pycache__' but not required for task",
            },
        ])
        expect(validator.requiredCalls).toEqual(['framework'])
    })

    it('should flag tools outside the task', () => {
        const validator = new TraceValidator()
        validator.beginTurn(3)

        expect(validator.validateCall({ id: 'r1', tool: 'read_file', args: { path: 'x' } })).toBe(false)
        expect(validator.violations[0]).toEqual({
            type: 'unknown_tool',
            tool: 'read_file',
            turn: 3,
            message: "Turn 3 called unknown tool 'read_file'",
        })
    })

    it('should ignore results tagged with an error code', () => {
        const validator = new TraceValidator()
        const listing = list('l1', 'framework')

        validator.beginTurn(1)
        validator.validateCall(listing)
        validator.processResult(listing, { ...result(listing, FRAMEWORK_LISTING), errorCode: 'execution_error' })
        validator.finish()

        expect(validator.validValues.size).toBe(0)
        expect(validator.requiredCalls).toEqual([])
    })

    it('should make the last turn results valid on finish', () => {
        const validator = new TraceValidator()
        const sum = add('c1', 1, 2)
        validator.beginTurn(1)
        validator.processResult(sum, result(sum, '3'))
        validator.finish()

        expect(validator.validValues.has(3)).toBe(true)
    })
})

describe('validateTrace', () => {
    const listFramework = list('l1', 'framework')
    const listTests = list('l2', 'framework/tests')
    const sum = add('c1', 100, 200)

    const trace: Message[] = [
        { role: 'system', content: 'sys', timestamp: 0 },
        { role: 'user', content: 'task', timestamp: 0 },
        assistant([listFramework]),
        result(listFramework, FRAMEWORK_LISTING),
        assistant([listTests]),
        result(listTests, TESTS_LISTING),
        assistant([sum]),
        result(sum, '300'),
        assistant(null, '{"reasoning":"done","tool_calls":null,"result":"300","is_finished":true}'),
    ]

    it('should grade a small correct trace', () => {
        const report = validateTrace(trace, { filesystem: tree })

        expect(report.summary.allPassed).toBe(true)
        expect(report.finalAnswer).toBe(300)
        expect(report.groundTruth).toEqual({
            expectedAnswer: 300,
            targetCount: 2,
            requiredPaths: ['framework', 'framework/tests'],
        })
    })

    it('should notice a non-test file in the sum', () => {
        const wrongSum = add('c1', 100, 40)
        const wrong = [
            ...trace.slice(0, 6),
            assistant([wrongSum]),
            result(wrongSum, '140'),
            assistant(null, '{"reasoning":"done","tool_calls":null,"result":"140","is_finished":true}'),
        ]

        const report = validateTrace(wrong, { filesystem: tree })
        const files = report.checks.find((c) => c.name === 'used_correct_test_files')

        expect(files?.passed).toBe(false)
        expect(files?.message).toBe('File filtering error: summed 1 non-test file(s)')
        expect(files?.details).toMatchObject({ missingSizes: [], extraSizes: [], nonTestSizes: [40] })
    })

    it('should not mistake a running total for a non-test file', () => {
        const flat: FileTree = {
            framework: { 'helpers.py': 300, 'test_a.py': 100, 'test_b.py': 200, 'test_c.py': 50 },
        }
        const listing = list('l1', 'framework')
        const first = add('c1', 100, 200)
        const second = add('c2', 300, 50)
        const run: Message[] = [
            assistant([listing]),
            result(
                listing,
                [
                    "Contents of 'framework':",
                    '  helpers.py (file, 300 bytes)',
                    '  test_a.py (file, 100 bytes)',
                    '  test_b.py (file, 200 bytes)',
                    '  test_c.py (file, 50 bytes)',
                ].join('\n'),
            ),
            assistant([first]),
            result(first, '300'),
            assistant([second]),
            result(second, '350'),
            assistant(null, '{"reasoning":"done","tool_calls":null,"result":"350","is_finished":true}'),
        ]

        const report = validateTrace(run, { filesystem: flat })

        expect(report.checks.find((c) => c.name === 'used_correct_test_files')).toMatchObject({
            passed: true,
            message: 'Correctly found all 3 test file sizes',
        })
        expect(report.summary).toEqual({ passed: 5, total: 5, allPassed: true })
    })

    it('should report test files that were never listed', () => {
        const report = validateTrace(trace.slice(0, 4), { filesystem: tree })
        const files = report.checks.find((c) => c.name === 'used_correct_test_files')

        expect(files?.message).toBe('File filtering error: never found 2 test file(s)')
        expect(files?.details).toMatchObject({ missingSizes: [100, 200], extraSizes: [], nonTestSizes: [] })
    })

    it('should require every directory on the way to a target', () => {
        const report = validateTrace(trace.slice(0, 4), { filesystem: tree })
        const explored = report.checks.find((c) => c.name === 'explored_required_paths')

        expect(explored?.passed).toBe(false)
        expect(explored?.message).toBe('Did not explore 1 required path(s)')
        expect(explored?.details).toMatchObject({ missing: ['framework/tests'] })
    })

    it('should reject a correct-looking answer no tool produced', () => {
        const guessed = [
            ...trace.slice(0, 6),
            assistant(null, '{"reasoning":"done","tool_calls":null,"result":"300","is_finished":true}'),
        ]

        const report = validateTrace(guessed, { filesystem: tree })
        const answer = report.checks.find((c) => c.name === 'correct_answer')

        expect(answer?.passed).toBe(false)
        expect(answer?.message).toBe('Final answer 300 does not appear in any tool result')
        expect(report.checks.find((c) => c.name === 'used_calculator')?.message).toBe('Agent did not use calculator tool')
    })

    it('should warn about results that answer no call', () => {
        const orphan: Message = { role: 'tool', content: '5', timestamp: 0, toolCallId: 'ghost' }
        const report = validateTrace([...trace, orphan], { filesystem: tree })

        expect(report.warnings).toEqual([
            { type: 'unmatched_result', toolCallId: 'ghost', message: "Tool result 'ghost' answers no earlier call" },
        ])
    })

    it('should prefer the run result over message text', () => {
        const report = validateTrace(trace, { filesystem: tree, finalResult: { value: 'Total: 300 bytes' } })
        expect(report.finalAnswer).toBe(300)
    })
})

describe('extractFinalAnswer', () => {
    it('should read the first number of the returned value', () => {
        expect(extractFinalAnswer([], { value: 'The total is 71,831 bytes across 14 files' })).toBe(71831)
    })

    it('should fall back to the last finished reply', () => {
        const messages = [assistant(null, '{"reasoning":"r","tool_calls":null,"result":"Total: 500","is_finished":true}')]
        expect(extractFinalAnswer(messages, { value: null })).toBe(500)
    })

    it('should take the last number of a plain-text reply', () => {
        expect(extractFinalAnswer([assistant(null, 'So 12 plus 30 makes 42')])).toBe(42)
    })

    it('should skip unfinished replies and error turns', () => {
        const messages: Message[] = [
            assistant(null, '{"reasoning":"sum 3 files","tool_calls":null,"result":null,"is_finished":false}'),
            { role: 'assistant', content: 'Invalid response format: 99', timestamp: 0, errorCode: 'parse_error' },
        ]
        expect(extractFinalAnswer(messages)).toBeNull()
    })

    it('should only look at the last three assistant turns', () => {
        const messages = [
            assistant(null, 'Answer 7'),
            assistant(null, '{"reasoning":"a","tool_calls":null,"result":null,"is_finished":false}'),
            assistant(null, '{"reasoning":"b","tool_calls":null,"result":null,"is_finished":false}'),
            assistant(null, '{"reasoning":"c","tool_calls":null,"result":null,"is_finished":false}'),
        ]
        expect(extractFinalAnswer(messages)).toBeNull()
        expect(extractFinalAnswer(messages.slice(0, 3))).toBe(7)
    })
})

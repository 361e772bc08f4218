import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
    Agent,
    AuthError,
    MAX_TURNS_MARKER,
    createAgent,
    createMessage,
    readCheckpoint,
} from '../../src'
import type { AgentObserver, ModelProvider, ObserverHook } from '../../src'
import { ScriptedProvider, addTool, failingTool, reply, silentLogger } from '../helpers/scripted'

function addCall(id: string, x: number, y: number) {
    return { id, tool: 'add', args: { x, y } }
}

function recorder() {
    const hooks: ObserverHook[] = []
    const observer: AgentObserver = {
        onTurnStart: () => void hooks.push('onTurnStart'),
        onLlmResponse: () => void hooks.push('onLlmResponse'),
        onToolExecution: () => void hooks.push('onToolExecution'),
        onFinish: () => void hooks.push('onFinish'),
        onError: () => void hooks.push('onError'),
    }
    return { hooks, observer }
}

describe('Agent', () => {
    it('should finish on the first turn when the model answers directly', async () => {
        const provider = new ScriptedProvider([reply({ result: '42', is_finished: true })])
        const agent = new Agent({ provider, logger: silentLogger() })

        const result = await agent.run('What is the answer?')

        expect(result).toMatchObject({ value: '42', status: 'success', error: null })
        expect(result.metadata).toMatchObject({ turns: 1, tokens: 15 })
        expect(agent.turnCount).toBe(1)
        expect(agent.tokensUsed).toBe(15)
        expect(agent.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant'])
        expect(agent.messages[1]?.content).toBe('What is the answer?')
    })

    it('should run tools and feed their results into the next turn', async () => {
        const provider = new ScriptedProvider([
            reply({ tool_calls: [addCall('call_1', 2, 3)] }),
            reply({ result: '5', is_finished: true }),
        ])
        const agent = new Agent({ provider, tools: [addTool()], logger: silentLogger() })

        const result = await agent.run('Add 2 and 3')

        expect(result.value).toBe('5')
        expect(agent.turnCount).toBe(2)
        expect(agent.tokensUsed).toBe(30)
        expect(agent.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool', 'assistant'])

        const toolMessage = agent.messages[3]
        expect(toolMessage).toMatchObject({ role: 'tool', content: '5', name: 'add', toolCallId: 'call_1' })
        expect(toolMessage?.errorCode).toBeUndefined()

        expect(provider.calls[1]).toHaveLength(4)
        expect(provider.calls[1]?.[3]?.content).toBe('5')
    })

    it('should keep the reasoning and finish flag in assistant metadata', async () => {
        const provider = new ScriptedProvider([reply({ reasoning: 'easy one', result: 'ok', is_finished: true })])
        const agent = new Agent({ provider, logger: silentLogger() })

        await agent.run('hi')

        expect(agent.messages[2]?.metadata).toMatchObject({ reasoning: 'easy one', is_finished: true })
        expect(agent.messages[2]?.tokensIn).toBe(10)
        expect(agent.messages[2]?.tokensOut).toBe(5)
    })

    it('should treat a finished reply without result as an empty answer', async () => {
        const provider = new ScriptedProvider([reply({ is_finished: true })])
        const agent = new Agent({ provider, logger: silentLogger() })

        const result = await agent.run('hi')

        expect(result.value).toBe('')
        expect(result.status).toBe('success')
    })

    it('should stop after maxTurns with the max-turns marker', async () => {
        const provider = new ScriptedProvider([reply({}), reply({})])
        const onError = vi.fn()
        const agent = new Agent({ provider, maxTurns: 2, observers: [{ onError }], logger: silentLogger() })

        const result = await agent.run('never done')

        expect(result).toMatchObject({
            value: MAX_TURNS_MARKER,
            status: 'max_turns_reached',
            error: 'Agent did not finish within 2 turns',
        })
        expect(agent.turnCount).toBe(2)
        expect(onError).toHaveBeenCalledWith({ turn: 2, error: 'Max turns reached' })
    })

    it('should reject a maxTurns that is not a positive integer', () => {
        const provider = new ScriptedProvider([])
        expect(() => new Agent({ provider, maxTurns: 0 })).toThrow(RangeError)
        expect(() => new Agent({ provider, maxTurns: 1.5 })).toThrow('maxTurns must be a positive integer')
    })

    // ─── Recoverable errors ──────────────────────────────────────────────────

    it('should record unparsable output as a parse error and keep going', async () => {
        const provider = new ScriptedProvider([
            createMessage('assistant', 'not json at all', { tokensIn: 3, tokensOut: 2 }),
            reply({ result: 'ok', is_finished: true }),
        ])
        const onError = vi.fn()
        const agent = new Agent({ provider, observers: [{ onError }], logger: silentLogger() })

        const result = await agent.run('hi')

        expect(result.value).toBe('ok')
        expect(agent.turnCount).toBe(2)
        expect(agent.tokensUsed).toBe(20)

        const failed = agent.messages[2]
        expect(failed?.errorCode).toBe('parse_error')
        expect(failed?.content.startsWith('Invalid response format: SyntaxError')).toBe(true)
        expect(failed?.content.endsWith('Please respond with valid JSON matching the required schema.')).toBe(true)
        expect(failed?.metadata).toMatchObject({ raw_response: 'not json at all' })
        expect(onError).toHaveBeenCalledWith({ turn: 1, error: 'Semantic error: parse_error', rawResponse: 'not json at all' })
    })

    it('should record JSON that misses required fields as a parse error', async () => {
        const provider = new ScriptedProvider([
            createMessage('assistant', '{"reasoning": "forgot the rest"}'),
            reply({ result: 'ok', is_finished: true }),
        ])
        const agent = new Agent({ provider, logger: silentLogger() })

        await agent.run('hi')

        expect(agent.messages[2]?.errorCode).toBe('parse_error')
        expect(agent.messages[2]?.content).toContain('schema validation failed')
        expect(agent.messages[2]?.content).toContain('is_finished')
    })

    it('should append the response shape to empty-response errors', async () => {
        const provider = new ScriptedProvider([
            createMessage('assistant', 'API call succeeded but returned empty content.', { errorCode: 'empty_response' }),
            reply({ result: 'ok', is_finished: true }),
        ])
        const agent = new Agent({ provider, logger: silentLogger() })

        await agent.run('hi')

        const failed = agent.messages[2]
        expect(failed?.errorCode).toBe('empty_response')
        expect(failed?.content.startsWith('API call succeeded but returned empty content.\n\nRespond with a JSON object')).toBe(true)
    })

    it('should pass content-filter messages through unchanged', async () => {
        const provider = new ScriptedProvider([
            createMessage('assistant', 'Content was blocked by safety filters', { errorCode: 'content_filter' }),
            reply({ result: 'ok', is_finished: true }),
        ])
        const agent = new Agent({ provider, logger: silentLogger() })

        await agent.run('hi')

        expect(agent.messages[2]).toMatchObject({
            errorCode: 'content_filter',
            content: 'Content was blocked by safety filters',
        })
    })

    it('should turn a failing tool into an error-coded tool message', async () => {
        const provider = new ScriptedProvider([
            reply({ tool_calls: [{ id: 'call_1', tool: 'explode', args: {} }] }),
            reply({ result: 'gave up', is_finished: true }),
        ])
        const onError = vi.fn()
        const agent = new Agent({ provider, tools: [failingTool()], observers: [{ onError }], logger: silentLogger() })

        const result = await agent.run('try it')

        expect(result.status).toBe('success')
        expect(agent.messages[3]).toMatchObject({
            role: 'tool',
            errorCode: 'execution_error',
            content: 'Tool execution error: disk on fire',
            toolCallId: 'call_1',
        })
        expect(onError).toHaveBeenCalledWith({ turn: 1, error: 'Tool execution error: disk on fire' })
    })

    it('should let the model recover from a failing tool with another one', async () => {
        const provider = new ScriptedProvider([
            reply({ tool_calls: [{ id: 'call_1', tool: 'explode', args: {} }] }),
            reply({ tool_calls: [addCall('call_2', 2, 3)] }),
            reply({ result: '5', is_finished: true }),
        ])
        const agent = new Agent({ provider, tools: [failingTool(), addTool()], logger: silentLogger() })

        const result = await agent.run('add 2 and 3')

        expect(result).toMatchObject({ value: '5', status: 'success', error: null })
        expect(agent.messages.map((m) => m.role)).toEqual([
            'system',
            'user',
            'assistant',
            'tool',
            'assistant',
            'tool',
            'assistant',
        ])
        expect(agent.messages[3]).toMatchObject({ toolCallId: 'call_1', errorCode: 'execution_error' })
        expect(agent.messages[5]).toMatchObject({ toolCallId: 'call_2', content: '5' })
        expect(agent.messages[5]?.errorCode).toBeUndefined()
    })

    it('should answer a call to an unknown tool with the available names', async () => {
        const provider = new ScriptedProvider([
            reply({ tool_calls: [{ id: 'call_1', tool: 'multiply', args: { x: 2, y: 3 } }] }),
            reply({ result: 'no', is_finished: true }),
        ])
        const agent = new Agent({ provider, tools: [addTool(), failingTool()], logger: silentLogger() })

        await agent.run('multiply')

        expect(agent.messages[3]).toMatchObject({
            role: 'tool',
            name: 'multiply',
            toolCallId: 'call_1',
            errorCode: 'execution_error',
            content: "Tool 'multiply' not found. Available: [add, explode]",
        })
    })

    // ─── Tool call ids ───────────────────────────────────────────────────────

    it('should replace duplicate and empty tool call ids', async () => {
        const provider = new ScriptedProvider([
            reply({ tool_calls: [addCall('call_1', 1, 1), addCall('call_1', 2, 2)] }),
            reply({ tool_calls: [addCall('call_1', 3, 3), addCall('', 4, 4)] }),
            reply({ result: 'done', is_finished: true }),
        ])
        const agent = new Agent({ provider, tools: [addTool()], logger: silentLogger() })

        await agent.run('add things')

        const ids = agent.messages.filter((m) => m.role === 'tool').map((m) => [m.toolCallId, m.content])
        expect(ids).toEqual([
            ['call_1', '2'],
            ['call_1_1', '4'],
            ['call_2_1', '6'],
            ['call_2_2', '8'],
        ])
    })

    it('should pair every tool message with an earlier call of the same id', async () => {
        const provider = new ScriptedProvider([
            reply({ tool_calls: [addCall('a', 1, 2), addCall('b', 3, 4)] }),
            reply({ tool_calls: [addCall('c', 3, 7)] }),
            reply({ result: '10', is_finished: true }),
        ])
        const agent = new Agent({ provider, tools: [addTool()], logger: silentLogger() })

        await agent.run('sum')

        const seen = new Set<string>()
        for (const message of agent.messages) {
            message.toolCalls?.forEach((tc) => seen.add(tc.id))
            if (message.role === 'tool') {
                expect(seen.has(message.toolCallId ?? '')).toBe(true)
            }
        }
        expect(seen.size).toBe(3)
    })

    // ─── Observers ───────────────────────────────────────────────────────────

    it('should notify observers in turn order', async () => {
        const provider = new ScriptedProvider([
            reply({ tool_calls: [addCall('call_1', 2, 3)] }),
            reply({ result: '5', is_finished: true }),
        ])
        const { hooks, observer } = recorder()
        const onFinish = vi.fn()
        const agent = new Agent({ provider, tools: [addTool()], observers: [observer], logger: silentLogger() })
        agent.observe({ onFinish })

        await agent.run('Add 2 and 3')

        expect(hooks).toEqual([
            'onTurnStart',
            'onLlmResponse',
            'onToolExecution',
            'onTurnStart',
            'onLlmResponse',
            'onFinish',
        ])
        const event = onFinish.mock.calls[0]?.[0]
        expect(event?.finalResult.content).toBe('5')
        expect(event?.allMessages).toHaveLength(5)
    })

    it('should keep running when an observer throws', async () => {
        const provider = new ScriptedProvider([reply({ result: 'fine', is_finished: true })])
        const logger = silentLogger()
        const agent = new Agent({
            provider,
            logger,
            observers: [
                {
                    onTurnStart: () => {
                        throw new Error('observer broke')
                    },
                },
            ],
        })

        const result = await agent.run('hi')

        expect(result.value).toBe('fine')
        expect(logger.warn).toHaveBeenCalledWith('Observer 0 failed in onTurnStart', { error: 'observer broke' })
    })

    // ─── Run lifecycle ───────────────────────────────────────────────────────

    it('should start fresh on each run unless reset is false', async () => {
        const provider = new ScriptedProvider([
            reply({ result: 'one', is_finished: true }),
            reply({ result: 'two', is_finished: true }),
            reply({ result: 'three', is_finished: true }),
        ])
        const agent = new Agent({ provider, logger: silentLogger() })

        await agent.run('first')
        await agent.run('second')
        expect(agent.messages).toHaveLength(3)
        expect(agent.turnCount).toBe(1)
        expect(agent.tokensUsed).toBe(15)

        await agent.run({ input: 'third', reset: false })
        expect(agent.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user', 'assistant'])
        expect(agent.turnCount).toBe(2)
        expect(agent.tokensUsed).toBe(30)
    })

    it('should reject a second run while one is in progress', async () => {
        let open: () => void = () => undefined
        const gate = new Promise<void>((resolve) => {
            open = resolve
        })
        const provider: ModelProvider = {
            name: 'gated',
            async call() {
                await gate
                return reply({ result: 'done', is_finished: true })
            },
        }
        const agent = new Agent({ provider, logger: silentLogger() })

        const first = agent.run('hi')
        await expect(agent.run('again')).rejects.toThrow('[Agent] run() called while a previous run is still in progress')

        open()
        await expect(first).resolves.toMatchObject({ value: 'done' })
        await expect(agent.run({ input: 'later', reset: true })).resolves.toMatchObject({ value: 'done' })
    })

    it('should propagate provider errors to the caller', async () => {
        const provider = new ScriptedProvider([new AuthError('Authentication failed')])
        const agent = new Agent({ provider, logger: silentLogger() })

        await expect(agent.run('hi')).rejects.toBeInstanceOf(AuthError)
    })

    it('should render the tools into the system message', async () => {
        const provider = new ScriptedProvider([reply({ result: 'ok', is_finished: true })])
        const agent = new Agent({ provider, tools: [addTool()], logger: silentLogger() })

        await agent.run('hi')

        const system = agent.messages[0]?.content ?? ''
        expect(system).toBe(agent.renderSystemPrompt())
        expect(system).toContain('Tool Name: add')
        expect(system).not.toContain('{tools}')
        expect(system).not.toContain('{response_format}')
    })

    it('should use a custom system prompt template', async () => {
        const provider = new ScriptedProvider([reply({ result: 'ok', is_finished: true })])
        const agent = new Agent({ provider, systemPrompt: 'Be brief. {tools}', logger: silentLogger() })

        await agent.run('hi')

        expect(agent.messages[0]?.content).toBe('Be brief. No tools available\n')
    })
})

describe('Agent checkpoints', () => {
    let dir: string

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'turnloop-agent-'))
    })

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true })
    })

    it('should save a checkpoint when the run throws and resume from it', async () => {
        const path = join(dir, 'crash', 'state.json')
        const crashing = new ScriptedProvider([
            reply({ tool_calls: [addCall('call_1', 2, 3)] }),
            new AuthError('Authentication failed'),
        ])
        const logger = silentLogger()
        const agent = new Agent({ provider: crashing, tools: [addTool()], logger })

        await expect(agent.run({ input: 'Add 2 and 3', autoCheckpoint: path })).rejects.toBeInstanceOf(AuthError)
        expect(logger.info).toHaveBeenCalledWith(`[Agent] Saved checkpoint to ${path} after failure`)

        const saved = await readCheckpoint(path)
        expect(saved.turnCount).toBe(2)
        expect(saved.tokensUsed).toBe(15)
        expect(saved.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool'])

        const resumed = new Agent({
            provider: new ScriptedProvider([reply({ result: '5', is_finished: true })]),
            tools: [addTool()],
            logger: silentLogger(),
        })
        const result = await resumed.run({ input: 'Please continue', checkpoint: path })

        expect(result.value).toBe('5')
        expect(resumed.turnCount).toBe(3)
        expect(resumed.tokensUsed).toBe(30)
        expect(resumed.messages.map((m) => m.role)).toEqual([
            'system',
            'user',
            'assistant',
            'tool',
            'user',
            'assistant',
        ])
    })

    it('should save and load checkpoints explicitly', async () => {
        const path = join(dir, 'manual.json')
        const agent = new Agent({
            provider: new ScriptedProvider([reply({ result: 'ok', is_finished: true })]),
            logger: silentLogger(),
        })
        await agent.run('hi')
        await agent.saveCheckpoint(path)

        const other = new Agent({ provider: new ScriptedProvider([]), logger: silentLogger() })
        await other.loadCheckpoint(path)

        expect(other.messages).toEqual(agent.messages)
        expect(other.turnCount).toBe(1)
        expect(other.tokensUsed).toBe(15)
    })
})

describe('createAgent factory', () => {
    const provider = new ScriptedProvider([])

    it('should take maxTurns from settings when the config has none', () => {
        expect(createAgent({ provider }, { maxTurns: 3 }).maxTurns).toBe(3)
    })

    it('should prefer an explicit maxTurns', () => {
        expect(createAgent({ provider, maxTurns: 5 }, { maxTurns: 3 }).maxTurns).toBe(5)
    })

    it('should default to 10 turns', () => {
        expect(createAgent({ provider }).maxTurns).toBe(10)
    })
})

/**
 * turnloop: Weather Example
 *
 * Tools get their data injected at construction time; the model only ever
 * sees the `city` argument.
 */

import 'dotenv/config'

import { Agent, loadConfig } from '@turnloop/core'
import type { AgentObserver } from '@turnloop/core'
import { createProvider } from '@turnloop/openai'
import { weather } from '@turnloop/tools'

const config = loadConfig()

const table = {
    'Argentina/Buenos Aires': 24,
    'Japan/Tokyo': 17,
    'Romania/Bucharest': 11,
}

// ─── Observers ────────────────────────────────────────────────────────────────

const printer: AgentObserver = {
    onTurnStart: ({ turn }) => console.log(`[turn ${turn}]`),
    onToolExecution: ({ toolName, result }) => console.log(`  ${toolName} → ${result.content}`),
    onError: ({ error }) => console.log(`  error: ${error}`),
}

const agent = new Agent({
    provider: createProvider(config),
    tools: [weather(table)],
    observers: [printer],
    maxTurns: config.maxTurns,
})

async function main() {
    const result = await agent.run('Is it warmer in Buenos Aires or in Tokyo right now?')
    console.log('\n' + (result.value ?? result.error))
}

main().catch(console.error)

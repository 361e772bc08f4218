/**
 * turnloop: Calculator Example
 *
 * Reads OPENROUTER_MODEL and OPENROUTER_API_KEY from the environment
 * (or a .env file) and asks the model to do arithmetic through a tool.
 */

import 'dotenv/config'

import { createAgent, loadConfig } from '@turnloop/core'
import { createProvider } from '@turnloop/openai'
import { createLogger, createLoggingObserver } from '@turnloop/logger'
import { calculator } from '@turnloop/tools'

// ─── 1. Configuration ─────────────────────────────────────────────────────────

const config = loadConfig()
const logger = createLogger({ level: 'debug', prefix: '[calculator-agent]' })

// ─── 2. Agent ─────────────────────────────────────────────────────────────────

const agent = createAgent(
    {
        provider: createProvider(config),
        tools: [calculator()],
        logger,
    },
    config,
).observe(createLoggingObserver({ logger }))

// ─── 3. Run ───────────────────────────────────────────────────────────────────

async function main() {
    const result = await agent.run('What is (1234 + 5678) * 3? Use the calculator for every step.')

    console.log('\nFinal response:')
    console.log(result.value)
    console.log('\nStatus:', result.status)
    console.log('Turns taken:', agent.turnCount)
    console.log('Tokens used:', agent.tokensUsed)
}

main().catch(console.error)

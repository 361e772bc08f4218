/**
 * turnloop: Filesystem Example
 *
 * Lets the model explore a directory (default: the current one) with the
 * sandboxed filesystem tools. A checkpoint is written if the run fails, and
 * passing `--resume` continues from it.
 */

import 'dotenv/config'

import { join } from 'node:path'
import { CheckpointNotFoundError, createAgent, loadConfig } from '@turnloop/core'
import { createProvider } from '@turnloop/openai'
import { createLogger, createLoggingObserver } from '@turnloop/logger'
import { filesystemTools } from '@turnloop/tools'

const config = loadConfig()
const logger = createLogger({ level: 'info', prefix: '[file-navigator]' })

const root = process.argv[2] ?? process.cwd()
const resume = process.argv.includes('--resume')
const checkpoint = join(root, '.turnloop', 'checkpoint.json')

const agent = createAgent(
    {
        provider: createProvider(config),
        tools: filesystemTools(root),
        observers: [createLoggingObserver({ logger })],
        logger,
    },
    config,
)

async function main() {
    const result = await agent.run({
        input: 'Which file in this directory has the most lines? Answer with its path and line count.',
        autoCheckpoint: checkpoint,
        ...(resume ? { checkpoint } : {}),
    })

    console.log('\nFinal response:')
    console.log(result.value)
}

main().catch((err: unknown) => {
    if (err instanceof CheckpointNotFoundError) {
        console.error(`Nothing to resume: ${err.path}`)
        return
    }
    console.error(err)
})

/**
 * turnloop: Evaluation Example
 *
 * Runs the "sum the test file sizes" task against a mock filesystem and
 * prints the validation report. Exits non-zero when any check fails.
 * Pass a scenario name or a path to a JSON tree as the first argument.
 */

import 'dotenv/config'

import { loadConfig } from '@turnloop/core'
import { createProvider } from '@turnloop/openai'
import { createLogger, createLoggingObserver } from '@turnloop/logger'
import { formatReport, runEvaluation } from '@turnloop/eval'

const config = loadConfig()
const logger = createLogger({ level: 'debug', prefix: '[eval]' })

async function main() {
    const { result, report } = await runEvaluation({
        provider: createProvider(config),
        filesystem: process.argv[2] ?? 'basic',
        maxTurns: 15,
        observers: [createLoggingObserver({ logger })],
        logger,
    })

    console.log(`\nAgent result (${result.status}): ${result.value}`)
    console.log(formatReport(report))
    process.exitCode = report.summary.allPassed ? 0 : 1
}

main().catch(console.error)

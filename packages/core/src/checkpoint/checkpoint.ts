import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import type { CheckpointState } from '../types'
import { CheckpointNotFoundError } from '../errors'
import { MessageWireSchema, fromWire, toWire } from '../messages/schema'

// ─── File format ─────────────────────────────────────────────────────────────

export const CheckpointFileSchema = z.object({
    messages: z.array(MessageWireSchema),
    turn_count: z.number().int().nonnegative(),
    tokens_used: z.number().int().nonnegative(),
})

export type CheckpointFile = z.infer<typeof CheckpointFileSchema>

export function serializeCheckpoint(state: CheckpointState): CheckpointFile {
    return {
        messages: state.messages.map(toWire),
        turn_count: state.turnCount,
        tokens_used: state.tokensUsed,
    }
}

export function deserializeCheckpoint(file: CheckpointFile): CheckpointState {
    return {
        messages: file.messages.map(fromWire),
        turnCount: file.turn_count,
        tokensUsed: file.tokens_used,
    }
}

// ─── Disk I/O ────────────────────────────────────────────────────────────────

/**
 * Writes `state` as pretty-printed JSON, creating parent directories.
 * Overwrites without locking: concurrent writers to one path are the
 * caller's problem.
 */
export async function writeCheckpoint(path: string, state: CheckpointState): Promise<void> {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, JSON.stringify(serializeCheckpoint(state), null, 2), 'utf-8')
}

/**
 * @throws {CheckpointNotFoundError} when nothing exists at `path`
 * @throws {z.ZodError} when the file is not a checkpoint
 */
export async function readCheckpoint(path: string): Promise<CheckpointState> {
    let raw: string
    try {
        raw = await readFile(path, 'utf-8')
    } catch (err) {
        if (isMissingFile(err)) throw new CheckpointNotFoundError(path, { cause: err })
        throw err
    }

    return deserializeCheckpoint(CheckpointFileSchema.parse(JSON.parse(raw)))
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

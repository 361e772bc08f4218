import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { createTool, defineTool } from '@turnloop/core'
import type { Tool } from '@turnloop/core'
import { formatListing } from '@turnloop/tools'
import type { ListingEntry } from '@turnloop/tools'
import { FileTreeSchema } from './ground-truth'
import type { FileTree } from './ground-truth'
import { normalizePath } from './listing'

// ─── Mock list_directory ─────────────────────────────────────────────────────

export interface MockFilesystemDependencies {
    filesystem: FileTree
}

export const MockListDirectoryInput = z.object({
    path: z.string().describe('Directory path to list'),
    show_hidden: z.boolean().optional().describe('Accepted for compatibility; the mock has no hidden files'),
})

function lookup(tree: FileTree, path: string): number | FileTree | undefined {
    let node: number | FileTree = tree
    for (const part of normalizePath(path).split('/').filter(Boolean)) {
        if (typeof node === 'number') return undefined
        const next: number | FileTree | undefined = node[part]
        if (next === undefined) return undefined
        node = next
    }
    return node
}

function toEntries(dir: FileTree): ListingEntry[] {
    return Object.entries(dir).map(([name, value]): ListingEntry =>
        typeof value === 'number'
            ? { kind: 'file', name, size: value }
            : { kind: 'directory', name, items: Object.keys(value).length },
    )
}

function mockListDirectoryDefinition(name: string) {
    return defineTool<typeof MockListDirectoryInput, MockFilesystemDependencies>({
        name,
        description: 'List contents of a directory with file sizes and item counts',
        input: MockListDirectoryInput,
        dependencies: ['filesystem'],
        execute({ path }, { filesystem }) {
            const node = lookup(filesystem, path)
            if (node === undefined) throw new Error(`Path '${path}' not found`)
            if (typeof node === 'number') throw new Error(`'${path}' is not a directory`)
            return formatListing(path, toEntries(node))
        },
    })
}

/**
 * `list_directory` answered from an in-memory tree, printing the same
 * listing format as the real filesystem tool.
 */
export function createMockListDirectoryTool(filesystem: FileTree, name = 'list_directory'): Tool {
    return createTool(mockListDirectoryDefinition(name), { filesystem })
}

// ─── Scenario files ──────────────────────────────────────────────────────────

function resolveAsset(name: string, directory: string, extension: string): string {
    if (name.includes('/') || name.endsWith(extension)) return name
    return fileURLToPath(new URL(`../${directory}/${name}${extension}`, import.meta.url))
}

/** Loads `scenarios/<name>.json`, or the file at `name` when given a path. */
export async function loadFilesystem(name: string): Promise<FileTree> {
    const raw: unknown = JSON.parse(await readFile(resolveAsset(name, 'scenarios', '.json'), 'utf-8'))
    return FileTreeSchema.parse(raw)
}

/** Loads `prompts/<name>.txt`, or the file at `name` when given a path. */
export async function loadPrompt(name: string): Promise<string> {
    const text = await readFile(resolveAsset(name, 'prompts', '.txt'), 'utf-8')
    return text.trim()
}

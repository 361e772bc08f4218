import { open, readFile, readdir, stat } from 'node:fs/promises'
import { extname, isAbsolute, relative, resolve, sep } from 'node:path'
import { z } from 'zod'
import { createTool, defineTool } from '@turnloop/core'
import type { Tool } from '@turnloop/core'
import { formatListing } from './listing'
import type { ListingEntry } from './listing'

export interface FilesystemDependencies {
    /** Every path the model passes is resolved inside this directory */
    rootDirectory: string
}

interface SandboxedPath {
    target: string
    display: string
}

export function resolveInRoot(rootDirectory: string, path: string): SandboxedPath {
    const root = resolve(rootDirectory)
    const target = resolve(root, path)
    const rel = relative(root, target)

    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
        throw new Error('Access denied - path outside allowed directory')
    }
    return { target, display: rel === '' ? '.' : rel.split(sep).join('/') }
}

async function statOrThrow(sandboxed: SandboxedPath) {
    try {
        return await stat(sandboxed.target)
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            throw new Error(`Path '${sandboxed.display}' does not exist`, { cause: err })
        }
        throw err
    }
}

// ─── list_directory ──────────────────────────────────────────────────────────

export const ListDirectoryInput = z.object({
    path: z.string().describe('Directory path to list, relative to the root'),
    show_hidden: z.boolean().default(false).describe('Whether to show hidden files (starting with .)'),
})

export const listDirectoryDefinition = defineTool<typeof ListDirectoryInput, FilesystemDependencies>({
    name: 'list_directory',
    description: 'List contents of a directory with file sizes and item counts',
    input: ListDirectoryInput,
    dependencies: ['rootDirectory'],
    async execute({ path, show_hidden }, { rootDirectory }) {
        const dir = resolveInRoot(rootDirectory, path)
        const info = await statOrThrow(dir)
        if (!info.isDirectory()) throw new Error(`Path '${dir.display}' is not a directory`)

        const entries: ListingEntry[] = []
        for (const dirent of await readdir(dir.target, { withFileTypes: true })) {
            if (!show_hidden && dirent.name.startsWith('.')) continue

            const full = resolve(dir.target, dirent.name)
            if (dirent.isFile()) {
                entries.push({ kind: 'file', name: dirent.name, size: (await stat(full)).size })
            } else if (dirent.isDirectory()) {
                entries.push({ kind: 'directory', name: dirent.name, items: (await readdir(full)).length })
            }
        }

        return formatListing(dir.display, entries)
    },
})

// ─── read_file ───────────────────────────────────────────────────────────────

export const ReadFileInput = z.object({
    path: z.string().describe('File path to read, relative to the root'),
    start_line: z.number().int().positive().optional().describe('First line to read (1-indexed)'),
    end_line: z.number().int().positive().optional().describe('Last line to read (inclusive)'),
})

const BINARY_SNIFF_BYTES = 1024

async function looksBinary(path: string): Promise<boolean> {
    const handle = await open(path, 'r')
    try {
        const buffer = Buffer.alloc(BINARY_SNIFF_BYTES)
        const { bytesRead } = await handle.read(buffer, 0, BINARY_SNIFF_BYTES, 0)
        return buffer.subarray(0, bytesRead).includes(0)
    } finally {
        await handle.close()
    }
}

function splitLines(text: string): string[] {
    if (text === '') return []
    const lines = text.split('\n')
    if (lines[lines.length - 1] === '') lines.pop()
    return lines
}

export const readFileDefinition = defineTool<typeof ReadFileInput, FilesystemDependencies>({
    name: 'read_file',
    description: 'Read file contents with line numbers, optionally limited to a line range',
    input: ReadFileInput,
    dependencies: ['rootDirectory'],
    async execute({ path, start_line, end_line }, { rootDirectory }) {
        const file = resolveInRoot(rootDirectory, path)
        const info = await statOrThrow(file)
        if (!info.isFile()) throw new Error(`Path '${file.display}' is not a file`)
        if (await looksBinary(file.target)) throw new Error(`File '${file.display}' appears to be binary`)

        const lines = splitLines(await readFile(file.target, 'utf-8'))
        const total = lines.length

        const start = (start_line ?? 1) - 1
        const end = Math.min(end_line ?? total, total)
        if (start >= total) {
            throw new Error(`start_line ${start + 1} out of range (file has ${total} lines)`)
        }

        const numbered = lines
            .slice(start, end)
            .map((line, i) => `${String(start + i + 1).padStart(4)} | ${line.trimEnd()}`)

        const range = start_line !== undefined || end_line !== undefined
            ? `[Lines ${start + 1}-${end} of ${total}]`
            : `[${total} lines total]`

        return `File: ${file.display} ${range}\n${numbered.join('\n')}`
    },
})

// ─── get_file_info ───────────────────────────────────────────────────────────

export const GetFileInfoInput = z.object({
    path: z.string().describe('Path to a file or directory, relative to the root'),
})

export const getFileInfoDefinition = defineTool<typeof GetFileInfoInput, FilesystemDependencies>({
    name: 'get_file_info',
    description: 'Get metadata about a file or directory',
    input: GetFileInfoInput,
    dependencies: ['rootDirectory'],
    async execute({ path }, { rootDirectory }) {
        const entry = resolveInRoot(rootDirectory, path)
        const info = await statOrThrow(entry)

        const lines = [`Path: ${entry.display}`, `Type: ${info.isDirectory() ? 'directory' : 'file'}`]

        if (info.isFile()) {
            lines.push(`Size: ${info.size.toLocaleString('en-US')} bytes`)
            if (!(await looksBinary(entry.target))) {
                lines.push(`Lines: ${splitLines(await readFile(entry.target, 'utf-8')).length}`)
            }
            const extension = extname(entry.target)
            if (extension) lines.push(`Extension: ${extension}`)
        } else if (info.isDirectory()) {
            lines.push(`Items: ${(await readdir(entry.target)).length}`)
        }

        lines.push(`Modified: ${info.mtime.toISOString()}`)
        return lines.join('\n')
    },
})

/** The three filesystem tools bound to one sandbox root. */
export function filesystemTools(rootDirectory: string): Tool[] {
    const deps: FilesystemDependencies = { rootDirectory }
    return [
        createTool(listDirectoryDefinition, deps),
        createTool(readFileDefinition, deps),
        createTool(getFileInfoDefinition, deps),
    ]
}

import { z } from 'zod'

/** Directory tree: leaves are file sizes in bytes, inner nodes are directories. */
export type FileTree = { [name: string]: number | FileTree }

export const FileTreeSchema: z.ZodType<FileTree> = z.lazy(() =>
    z.record(z.string(), z.union([z.number().int().nonnegative(), FileTreeSchema])),
)

export type TargetPredicate = (path: string) => boolean

/** `test_*.py` anywhere in the tree */
export const isTestFile: TargetPredicate = (path) => {
    const name = path.split('/').pop() ?? path
    return name.startsWith('test_') && name.endsWith('.py')
}

export interface GroundTruth {
    /** Every file, keyed by slash-separated path */
    allFiles: Record<string, number>
    targetFiles: Record<string, number>
    targetSizes: ReadonlySet<number>
    /** Every directory on the way to a target file, sorted */
    requiredPaths: string[]
    expectedAnswer: number
    targetCount: number
}

export function listFiles(tree: FileTree, prefix = ''): Record<string, number> {
    const files: Record<string, number> = {}
    for (const [name, value] of Object.entries(tree)) {
        const path = prefix ? `${prefix}/${name}` : name
        if (typeof value === 'number') {
            files[path] = value
        } else {
            Object.assign(files, listFiles(value, path))
        }
    }
    return files
}

export function computeRequiredPaths(filePaths: readonly string[]): string[] {
    const directories = new Set<string>()
    for (const filePath of filePaths) {
        const parts = filePath.split('/')
        for (let i = 1; i < parts.length; i++) {
            directories.add(parts.slice(0, i).join('/'))
        }
    }
    return [...directories].sort()
}

export function getGroundTruth(tree: FileTree, isTarget: TargetPredicate = isTestFile): GroundTruth {
    const allFiles = listFiles(tree)
    const targetFiles = Object.fromEntries(Object.entries(allFiles).filter(([path]) => isTarget(path)))
    const sizes = Object.values(targetFiles)

    return {
        allFiles,
        targetFiles,
        targetSizes: new Set(sizes),
        requiredPaths: computeRequiredPaths(Object.keys(targetFiles)),
        expectedAnswer: sizes.reduce((sum, size) => sum + size, 0),
        targetCount: sizes.length,
    }
}

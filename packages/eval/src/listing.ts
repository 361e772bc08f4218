const DIRECTORY_LINE = /^\s*([^/\s]+)\/\s+\(directory/
const FILE_LINE = /^\s*(\S+)\s+\(file,\s+([\d,]+)\s+bytes\)/

export interface ParsedListing {
    directories: string[]
    files: { name: string; size: number }[]
}

/**
 * Reads the lines a listing tool prints:
 * `name/ (directory, N items)` and `name (file, 1,234 bytes)`.
 * Anything else (headers, errors) is ignored.
 */
export function parseListing(text: string): ParsedListing {
    const listing: ParsedListing = { directories: [], files: [] }

    for (const line of text.split('\n')) {
        const dir = DIRECTORY_LINE.exec(line)
        if (dir?.[1]) {
            listing.directories.push(dir[1])
            continue
        }

        const file = FILE_LINE.exec(line)
        if (file?.[1] && file[2]) {
            listing.files.push({ name: file[1], size: Number.parseInt(file[2].replaceAll(',', ''), 10) })
        }
    }

    return listing
}

/** `./a/b/`, `/a/b` and `a//b` all become `a/b` */
export function normalizePath(path: string): string {
    return path
        .replace(/^(?:\.?\/)+/, '')
        .replace(/\/{2,}/g, '/')
        .replace(/\/+$/, '')
}

const NUMBER = /\d[\d,]*/g

/** Every integer in `text`, commas as thousands separators. */
export function extractNumbers(text: string): number[] {
    return [...text.matchAll(NUMBER)].map((m) => Number.parseInt(m[0].replaceAll(',', ''), 10))
}

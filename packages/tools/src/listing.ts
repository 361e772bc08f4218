export type ListingEntry =
    | { kind: 'file'; name: string; size: number }
    | { kind: 'directory'; name: string; items: number }

const numberFormat = new Intl.NumberFormat('en-US')

/** `name (file, 1,234 bytes)` or `name/ (directory, 3 items)` */
export function formatListingEntry(entry: ListingEntry): string {
    if (entry.kind === 'file') return `${entry.name} (file, ${numberFormat.format(entry.size)} bytes)`
    return `${entry.name}/ (directory, ${entry.items} items)`
}

export function compareNames(a: { name: string }, b: { name: string }): number {
    if (a.name < b.name) return -1
    if (a.name > b.name) return 1
    return 0
}

/**
 * Directory listing as shown to the model: a header line followed by one
 * indented line per entry, sorted by name.
 */
export function formatListing(displayPath: string, entries: readonly ListingEntry[]): string {
    if (entries.length === 0) return `Directory '${displayPath}' is empty`

    const lines = [...entries].sort(compareNames).map((e) => `  ${formatListingEntry(e)}`)
    return `Contents of '${displayPath}':\n${lines.join('\n')}`
}

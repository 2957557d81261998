import pc from 'picocolors'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    task: (name: string) => pc.cyan(name),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export type Cell = string | number | null

/** Plain-text, left-aligned table; numbers are right-aligned. */
export function renderTable(headers: string[], rows: Cell[][]): string {
    const text = rows.map((row) => row.map((cell) => (cell === null ? '' : String(cell))))
    const widths = headers.map((header, col) => Math.max(header.length, ...text.map((row) => (row[col] ?? '').length)))
    const numeric = headers.map((_, col) => rows.length > 0 && rows.every((row) => typeof row[col] === 'number'))

    const line = (cells: string[], alignNumbers: boolean) =>
        cells
            .map((cell, col) => {
                const width = widths[col] ?? cell.length
                return alignNumbers && numeric[col] ? cell.padStart(width) : cell.padEnd(width)
            })
            .join('  ')
            .trimEnd()

    return [
        line(headers, false),
        widths.map((width) => '-'.repeat(width)).join('  '),
        ...text.map((row) => line(row, true)),
    ].join('\n')
}

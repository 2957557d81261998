/** Code-point ordering, independent of the host locale. */
export function compareText(a: string, b: string): number {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}

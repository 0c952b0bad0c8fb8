/**
 * A1 notation helpers for Google Sheets ranges.
 *
 * Ranges are modelled as typed objects so the engine (and the in-memory fake)
 * never parse range strings; only the Google client renders them to A1.
 */

/** Rectangular range on a tab. Rows are 1-based, columns 0-based, both inclusive. */
export interface CellRange {
    tab: string;
    startRow: number;
    /** Open-ended (to the last row with data) when omitted */
    endRow?: number;
    startColumn: number;
    endColumn: number;
}

/** Top-left cell of a write */
export interface CellAnchor {
    tab: string;
    row: number;
    column: number;
}

/**
 * 0 → A, 25 → Z, 26 → AA, 701 → ZZ
 */
export function columnLetter(index: number): string {
    if (!Number.isInteger(index) || index < 0) {
        throw new RangeError(`Invalid column index: ${index}`);
    }
    let n = index + 1;
    let letters = '';
    while (n > 0) {
        const rem = (n - 1) % 26;
        letters = String.fromCharCode(65 + rem) + letters;
        n = Math.floor((n - 1) / 26);
    }
    return letters;
}

/**
 * Quote a tab title for use in a range. Embedded single quotes are doubled.
 */
export function quoteTabName(title: string): string {
    return `'${title.replace(/'/g, "''")}'`;
}

export function toA1Notation(range: CellRange): string {
    const start = `${columnLetter(range.startColumn)}${range.startRow}`;
    const end = `${columnLetter(range.endColumn)}${range.endRow ?? ''}`;
    return `${quoteTabName(range.tab)}!${start}:${end}`;
}

export function anchorToA1(anchor: CellAnchor): string {
    return `${quoteTabName(anchor.tab)}!${columnLetter(anchor.column)}${anchor.row}`;
}

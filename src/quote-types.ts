/**
 * Shared record types for the quote database reader.
 */

export interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

export interface TimeOfDay {
    hour: number;
    minute: number;
}

/** Which index file produced a symbol entry. */
export type IndexKind = 'standard' | 'extended' | 'crossref';

export type DataFileExtension = '.DAT' | '.MWD';

/**
 * One instrument as described by an index record.
 *
 * The catalog builds its own frozen copies when it merges indexes, so an
 * entry handed out by a catalog never changes.
 */
export interface SymbolMetadata {
    /** Correlates the entry with `F<n>.DAT` / `F<n>.MWD` / `F<n>.DOP`. 0 marks an unused slot. */
    readonly fileNumber: number;
    readonly symbolCode: string;
    readonly displayName: string;
    /** Columns per data record. 0 when the index does not declare it (cross-reference). */
    readonly declaredFieldCount: number;
    /** Record length byte of the standard index; null for the other variants. */
    readonly recordLength: number | null;
    readonly timeFrame: string;
    readonly firstDate: CalendarDate | null;
    readonly lastDate: CalendarDate | null;
    readonly dataFileExtension: DataFileExtension;
    readonly source: IndexKind;
}

export type ColumnLayoutSource = 'sidecar' | 'default';

/**
 * Column tokens of one data file in on-disk order. Unknown tokens stay in
 * place so that byte offsets of the following columns are preserved.
 */
export interface ColumnLayout {
    readonly tokens: readonly string[];
    readonly source: ColumnLayoutSource;
}

export type DecodedValue = string | number;

/** One stored tick keyed by `Symbol` plus each recognized column's display name. */
export type DecodedRecord = Record<string, DecodedValue>;

export interface DataFileHeader {
    maxRecords: number;
    lastRecord: number;
    /** Number of stored ticks (`lastRecord - 1`, never negative). */
    recordCount: number;
    /** Offset of the first tick. */
    dataOffset: number;
}

export type SymbolReadResult =
    | { ok: true; symbol: SymbolMetadata; records: DecodedRecord[] }
    | { ok: false; symbol: SymbolMetadata; error: Error };

export interface SymbolFailure {
    symbol: SymbolMetadata;
    error: Error;
}

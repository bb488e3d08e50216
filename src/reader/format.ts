import type { DataFileExtension, IndexKind } from '../quote-types.js';

export const STANDARD_INDEX_FILE = 'MASTER';
export const EXTENDED_INDEX_FILE = 'EMASTER';
export const CROSSREF_INDEX_FILE = 'XMASTER';

export const SIDECAR_EXTENSION = '.DOP';

/** Column set assumed when a data file has no sidecar. */
export const DEFAULT_COLUMN_LAYOUT: readonly string[] = ['DATE', 'OPEN', 'HIGH', 'LOW', 'CLOSE', 'VOL', 'OI'];

// Data file header: [max_records (u16)] [last_record (u16)] then padding.
export const DATA_HEADER_SIZE = 4;

/**
 * Where a value lives inside one index record. Offsets are relative to the
 * start of the record, i.e. `(i + 1) * stride`.
 */
export type IndexField =
    | { type: 'u8'; offset: number }
    | { type: 'u16'; offset: number }
    | { type: 'char'; offset: number }
    | { type: 'text'; offset: number; width: number }
    | { type: 'symbol'; offset: number; width: number; normalize: boolean }
    | { type: 'mbfDate'; offset: number }
    | { type: 'intDate'; offset: number };

export interface IndexLayout {
    readonly kind: IndexKind;
    readonly fileName: string;
    /** Record size; record 0 is the header. */
    readonly stride: number;
    /** Offset of the u16 record count within the header. */
    readonly countOffset: number;
    /** Offset of the u16 highest file number, where the header carries one. */
    readonly lastFileNumberOffset: number | null;
    readonly dataFileExtension: DataFileExtension;
    /** When set, a zero file number ends decoding of that record. */
    readonly placeholderShortCircuit: boolean;
    readonly fields: {
        readonly fileNumber: IndexField;
        readonly symbolCode: IndexField;
        readonly displayName: IndexField;
        readonly timeFrame: IndexField;
        readonly firstDate: IndexField;
        readonly lastDate: IndexField;
        readonly declaredFieldCount: IndexField | null;
        readonly recordLength: IndexField | null;
    };
}

// Record (53 bytes):
// [file_no u8] [2] [rec_len u8] [fields u8] [2] [name 16] [2]
// [first_date mbf] [last_date mbf] [time_frame c] [2] [symbol 14] [3]
export const STANDARD_INDEX: IndexLayout = {
    kind: 'standard',
    fileName: STANDARD_INDEX_FILE,
    stride: 53,
    countOffset: 0,
    lastFileNumberOffset: null,
    dataFileExtension: '.DAT',
    placeholderShortCircuit: false,
    fields: {
        fileNumber: { type: 'u8', offset: 0 },
        recordLength: { type: 'u8', offset: 3 },
        declaredFieldCount: { type: 'u8', offset: 4 },
        displayName: { type: 'text', offset: 7, width: 16 },
        firstDate: { type: 'mbfDate', offset: 25 },
        lastDate: { type: 'mbfDate', offset: 29 },
        timeFrame: { type: 'char', offset: 33 },
        symbolCode: { type: 'symbol', offset: 36, width: 14, normalize: true },
    },
};

// Record (192 bytes):
// [2] [file_no u8] [3] [fields u8] [4] [symbol 14] [7] [name 16] [12]
// [time_frame c] [3] [first_date mbf] [4] [last_date mbf] [...]
export const EXTENDED_INDEX: IndexLayout = {
    kind: 'extended',
    fileName: EXTENDED_INDEX_FILE,
    stride: 192,
    countOffset: 0,
    lastFileNumberOffset: 2,
    dataFileExtension: '.DAT',
    placeholderShortCircuit: true,
    fields: {
        fileNumber: { type: 'u8', offset: 2 },
        declaredFieldCount: { type: 'u8', offset: 6 },
        symbolCode: { type: 'symbol', offset: 11, width: 14, normalize: true },
        displayName: { type: 'text', offset: 32, width: 16 },
        timeFrame: { type: 'char', offset: 60 },
        firstDate: { type: 'mbfDate', offset: 64 },
        lastDate: { type: 'mbfDate', offset: 72 },
        recordLength: null,
    },
};

// Record (150 bytes):
// [1] [symbol 14] [1] [name 45] [1] [time_frame c] [2] [file_no u16] [41]
// [first_date u32] [4] [last_date u32] [...]
export const CROSSREF_INDEX: IndexLayout = {
    kind: 'crossref',
    fileName: CROSSREF_INDEX_FILE,
    stride: 150,
    countOffset: 10,
    lastFileNumberOffset: null,
    dataFileExtension: '.MWD',
    placeholderShortCircuit: false,
    fields: {
        symbolCode: { type: 'symbol', offset: 1, width: 14, normalize: false },
        displayName: { type: 'text', offset: 16, width: 45 },
        timeFrame: { type: 'char', offset: 62 },
        fileNumber: { type: 'u16', offset: 65 },
        firstDate: { type: 'intDate', offset: 108 },
        lastDate: { type: 'intDate', offset: 116 },
        declaredFieldCount: null,
        recordLength: null,
    },
};

export function dataFileName(fileNumber: number, extension: DataFileExtension): string {
    return `F${fileNumber}${extension}`;
}

export function sidecarFileName(fileNumber: number): string {
    return `F${fileNumber}${SIDECAR_EXTENSION}`;
}

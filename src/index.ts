/**
 * Legacy quote database reader - Public API
 *
 * @module mbf-quote-reader
 */

import { Catalog } from './reader/catalog.js';
import type { DecodedRecord } from './quote-types.js';
import type { ReaderOptions } from './reader/types.js';

export type {
    CalendarDate, TimeOfDay, IndexKind, DataFileExtension, SymbolMetadata, ColumnLayout, ColumnLayoutSource,
    DecodedValue, DecodedRecord, DataFileHeader, SymbolReadResult, SymbolFailure,
} from './quote-types.js';
export type { ReaderOptions, QuoteLogger } from './reader/types.js';
export { DEFAULT_READER_OPTIONS } from './reader/types.js';
export { QuoteReaderError, StructuralFormatError, DecodeError, ConfigurationError } from './reader/errors.js';

export {
    MBF_SIZE, decodeMbf, decodeMbfAt, decodeMbfDate, decodeMbfTime, decodeIntDate, packedToDate,
    isValidCalendarDate, formatDate, formatTime,
} from './reader/mbf.js';
export { ColumnRegistry, UNRECOGNIZED_COLUMN_WIDTH, slotWidth } from './reader/columns.js';
export type { KnownColumn, ColumnSlot, ColumnRegistryOptions } from './reader/columns.js';
export { normalizeSymbolName, trimPadding } from './reader/symbol-name.js';
export {
    STANDARD_INDEX, EXTENDED_INDEX, CROSSREF_INDEX, DEFAULT_COLUMN_LAYOUT,
    dataFileName, sidecarFileName,
} from './reader/format.js';
export type { IndexLayout, IndexField } from './reader/format.js';
export { IndexFile } from './reader/index-file.js';
export type { IndexHeader } from './reader/index-file.js';
export { ColumnLayoutResolver, parseColumnDefinitions } from './reader/column-layout.js';
export { DataFileReader, recordWidth } from './reader/data-file.js';
export { Catalog, describeSymbol } from './reader/catalog.js';
export type { SelectionResult } from './reader/catalog.js';

export const Quotes = {
    /**
     * Loads the index files of a quote directory.
     */
    open: (directory: string, options?: ReaderOptions): Catalog => Catalog.build(directory, options),

    /**
     * Decodes every symbol of `directory`, or only `symbols` when given.
     * Symbols that fail to decode are logged and skipped.
     */
    read: (directory: string, symbols?: string[], options?: ReaderOptions): DecodedRecord[] => {
        const catalog = Catalog.build(directory, options);
        const all = symbols === undefined || symbols.length === 0;
        return catalog.readSelected(all, symbols ?? []).records;
    },
};

export default Quotes;

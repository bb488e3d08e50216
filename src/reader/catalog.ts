import type {
    DecodedRecord, SymbolFailure, SymbolMetadata, SymbolReadResult,
} from '../quote-types.js';
import { ColumnLayoutResolver } from './column-layout.js';
import { ColumnRegistry } from './columns.js';
import { DataFileReader } from './data-file.js';
import { ConfigurationError, QuoteReaderError } from './errors.js';
import { CROSSREF_INDEX, EXTENDED_INDEX, STANDARD_INDEX, type IndexLayout } from './format.js';
import { IndexFile } from './index-file.js';
import { formatDate } from './mbf.js';
import { resolveReaderOptions, type QuoteLogger, type ReaderOptions } from './types.js';

export interface SelectionResult {
    records: DecodedRecord[];
    failures: SymbolFailure[];
}

function toError(e: unknown): Error {
    return e instanceof Error ? e : new QuoteReaderError(String(e), e);
}

export function describeSymbol(symbol: SymbolMetadata): string {
    const first = symbol.firstDate ? formatDate(symbol.firstDate) : '-';
    const last = symbol.lastDate ? formatDate(symbol.lastDate) : '-';
    return `symbol: ${symbol.symbolCode}, name: ${symbol.displayName}, file number: ${symbol.fileNumber}, ` +
        `start: ${first}, end: ${last}, frame: ${symbol.timeFrame}`;
}

/**
 * Symbol table of one quote directory.
 *
 * MASTER decides which file numbers exist, EMASTER may supply longer display
 * names, XMASTER is kept on the side and never merged.
 */
export class Catalog {
    private readonly entries: ReadonlyMap<number, SymbolMetadata>;
    private readonly crossRefEntries: readonly SymbolMetadata[];
    private readonly logger: QuoteLogger | null;
    private readonly resolver: ColumnLayoutResolver;
    private readonly reader: DataFileReader;

    private constructor(
        public readonly directory: string,
        entries: Map<number, SymbolMetadata>,
        crossRef: SymbolMetadata[],
        public readonly registry: ColumnRegistry,
        logger: QuoteLogger | null
    ) {
        this.entries = entries;
        this.crossRefEntries = crossRef;
        this.logger = logger;
        this.resolver = new ColumnLayoutResolver(directory);
        this.reader = new DataFileReader(directory, registry);
    }

    /**
     * Loads the index files of `directory`.
     *
     * @throws ConfigurationError when EMASTER is missing or unreadable, or an option is invalid.
     */
    static build(directory: string, options: ReaderOptions = {}): Catalog {
        const opts = resolveReaderOptions(options);
        const logger = opts.logger;
        const registry = new ColumnRegistry({ precision: opts.precision });

        const table = new Map<number, SymbolMetadata>();

        const standard = Catalog.loadOptional(directory, STANDARD_INDEX, opts, logger);
        for (const s of standard ?? []) {
            if (s.fileNumber > 0) table.set(s.fileNumber, Object.freeze({ ...s }));
        }

        const extended = Catalog.loadMandatory(directory, EXTENDED_INDEX, opts);
        for (const s of extended) {
            if (s.fileNumber === 0) continue;
            const existing = table.get(s.fileNumber);
            if (existing) {
                if (s.displayName.length > 0) {
                    table.set(s.fileNumber, Object.freeze({ ...existing, displayName: s.displayName }));
                }
            } else if (standard === null) {
                table.set(s.fileNumber, Object.freeze({ ...s }));
            }
        }

        const crossRef = (Catalog.loadOptional(directory, CROSSREF_INDEX, opts, logger) ?? [])
            .filter(s => s.fileNumber > 0)
            .map(s => Object.freeze({ ...s }));

        logger?.info?.(`Number of available symbols: ${table.size}`);
        return new Catalog(directory, table, crossRef, registry, logger);
    }

    /** Null when the file is absent or unreadable; the reason goes to the logger. */
    private static loadOptional(
        directory: string,
        layout: IndexLayout,
        options: ReaderOptions,
        logger: QuoteLogger | null
    ): SymbolMetadata[] | null {
        try {
            const records = IndexFile.withIndex(directory, layout, options, index => index?.readAll() ?? null);
            if (records === null) logger?.warn?.(`No ${layout.fileName} file in directory ${directory}`);
            return records;
        } catch (e) {
            if (e instanceof ConfigurationError) throw e;
            logger?.error?.(`Error while reading ${layout.fileName} in ${directory}: ${toError(e).message}`);
            return null;
        }
    }

    private static loadMandatory(directory: string, layout: IndexLayout, options: ReaderOptions): SymbolMetadata[] {
        let records: SymbolMetadata[] | null;
        try {
            records = IndexFile.withIndex(directory, layout, options, index => index?.readAll() ?? null);
        } catch (e) {
            if (e instanceof ConfigurationError) throw e;
            throw new ConfigurationError(`Cannot read ${layout.fileName} in ${directory}: ${toError(e).message}`, e);
        }
        if (records === null) {
            throw new ConfigurationError(`No ${layout.fileName} file in directory ${directory}`);
        }
        return records;
    }

    get size(): number {
        return this.entries.size;
    }

    /** A copy of the table; the entries themselves are frozen. */
    table(): ReadonlyMap<number, SymbolMetadata> {
        return new Map(this.entries);
    }

    symbols(): SymbolMetadata[] {
        return [...this.entries.values()];
    }

    get(fileNumber: number): SymbolMetadata | undefined {
        return this.entries.get(fileNumber);
    }

    /** Entries of XMASTER, independent of the main table. */
    crossReference(): readonly SymbolMetadata[] {
        return [...this.crossRefEntries];
    }

    selectSymbols(all: boolean, codes: Iterable<string> = []): SymbolMetadata[] {
        if (all) return this.symbols();
        const wanted = new Set(codes);
        return this.symbols().filter(s => wanted.has(s.symbolCode));
    }

    /**
     * Decodes one symbol completely. Failures are logged and returned, never thrown.
     */
    readSymbol(symbol: SymbolMetadata): SymbolReadResult {
        try {
            const layout = this.resolver.resolve(symbol);
            const records = [...this.reader.readRecords(symbol, layout)];
            return { ok: true, symbol, records };
        } catch (e) {
            const error = toError(e);
            this.logger?.error?.(
                `Error while converting symbol ${symbol.symbolCode} (file ${symbol.fileNumber}): ${error.message}`
            );
            return { ok: false, symbol, error };
        }
    }

    /** Records of every selected symbol, in table order; failed symbols contribute none. */
    *streamSelected(all: boolean, codes: Iterable<string> = []): Generator<DecodedRecord> {
        for (const symbol of this.selectSymbols(all, codes)) {
            const result = this.readSymbol(symbol);
            if (result.ok) yield* result.records;
        }
    }

    readSelected(all: boolean, codes: Iterable<string> = []): SelectionResult {
        const records: DecodedRecord[] = [];
        const failures: SymbolFailure[] = [];
        for (const symbol of this.selectSymbols(all, codes)) {
            const result = this.readSymbol(symbol);
            if (result.ok) {
                records.push(...result.records);
            } else {
                failures.push({ symbol: result.symbol, error: result.error });
            }
        }
        return { records, failures };
    }

    describe(): string[] {
        return this.symbols().map(describeSymbol);
    }
}

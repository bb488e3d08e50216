import * as path from 'node:path';
import { TextDecoder } from 'node:util';
import type { CalendarDate, SymbolMetadata } from '../quote-types.js';
import { BinaryFile } from './binary-file.js';
import { ConfigurationError, DecodeError, StructuralFormatError } from './errors.js';
import type { IndexField, IndexLayout } from './format.js';
import { decodeIntDate, decodeMbfDate } from './mbf.js';
import { decodeText, normalizeSymbolName, trimPadding } from './symbol-name.js';
import { DEFAULT_READER_OPTIONS, type ReaderOptions } from './types.js';

export interface IndexHeader {
    recordCount: number;
    /** Highest file number in use; only the extended index records it. */
    lastFileNumber: number | null;
}

const SYMBOL_ENCODING = 'latin1';

export function createTextDecoder(label: string): TextDecoder {
    try {
        return new TextDecoder(label);
    } catch (e) {
        throw new ConfigurationError(`Unsupported text encoding: ${label}`, e);
    }
}

function fieldWidth(field: IndexField): number {
    switch (field.type) {
        case 'u8':
        case 'char':
            return 1;
        case 'u16':
            return 2;
        case 'text':
        case 'symbol':
            return field.width;
        case 'mbfDate':
        case 'intDate':
            return 4;
    }
}

/** Bytes of a record that the layout actually reads. */
export function recordExtent(layout: IndexLayout): number {
    let end = 0;
    for (const field of Object.values(layout.fields)) {
        if (field) end = Math.max(end, field.offset + fieldWidth(field));
    }
    return end;
}

/**
 * Reader for one index file, driven entirely by its IndexLayout.
 *
 * Opened -> readRecordAt()* -> close(). Use `IndexFile.withIndex` to get the
 * close for free.
 */
export class IndexFile {
    readonly recordCount: number;
    readonly lastFileNumber: number | null;
    private readonly nameDecoder: TextDecoder;
    private readonly symbolDecoder: TextDecoder;

    private constructor(
        public readonly layout: IndexLayout,
        private readonly file: BinaryFile,
        encoding: string
    ) {
        this.nameDecoder = createTextDecoder(encoding);
        this.symbolDecoder = createTextDecoder(SYMBOL_ENCODING);

        this.recordCount = file.readUint16At(layout.countOffset);
        this.lastFileNumber = layout.lastFileNumberOffset === null
            ? null
            : file.readUint16At(layout.lastFileNumberOffset);

        if (this.recordCount > 0) {
            const required = this.recordCount * layout.stride + recordExtent(layout);
            if (required > file.size) {
                throw new StructuralFormatError(
                    `${layout.fileName} declares ${this.recordCount} records (${required} bytes) but holds ${file.size} bytes`,
                    file.path
                );
            }
        }
    }

    /**
     * Opens `<directory>/<layout.fileName>`. Returns null when the file does not exist.
     */
    static openIfPresent(directory: string, layout: IndexLayout, options: ReaderOptions = {}): IndexFile | null {
        const file = BinaryFile.openIfPresent(path.join(directory, layout.fileName));
        if (!file) return null;
        try {
            return new IndexFile(layout, file, options.encoding ?? DEFAULT_READER_OPTIONS.encoding);
        } catch (e) {
            file.close();
            throw e;
        }
    }

    /**
     * Runs `fn` against the index (or null when absent) and releases the file afterwards.
     */
    static withIndex<T>(
        directory: string,
        layout: IndexLayout,
        options: ReaderOptions,
        fn: (index: IndexFile | null) => T
    ): T {
        const index = IndexFile.openIfPresent(directory, layout, options);
        try {
            return fn(index);
        } finally {
            index?.close();
        }
    }

    /** Reads every record of `<directory>/<layout.fileName>`; an absent file yields none. */
    static readAll(directory: string, layout: IndexLayout, options: ReaderOptions = {}): SymbolMetadata[] {
        return IndexFile.withIndex(directory, layout, options, index => index ? index.readAll() : []);
    }

    get path(): string {
        return this.file.path;
    }

    get isOpen(): boolean {
        return this.file.isOpen;
    }

    header(): IndexHeader {
        return { recordCount: this.recordCount, lastFileNumber: this.lastFileNumber };
    }

    readRecordAt(i: number): SymbolMetadata {
        if (!Number.isInteger(i) || i < 0 || i >= this.recordCount) {
            throw new RangeError(`Record ${i} out of range (0..${this.recordCount - 1})`);
        }
        const { fields } = this.layout;
        const record = this.file.readAt((i + 1) * this.layout.stride, recordExtent(this.layout));

        const fileNumber = this.readNumber(record, fields.fileNumber);
        if (fileNumber === 0 && this.layout.placeholderShortCircuit) {
            return this.placeholder();
        }

        return {
            fileNumber,
            symbolCode: this.readString(record, fields.symbolCode),
            displayName: this.readString(record, fields.displayName),
            declaredFieldCount: fields.declaredFieldCount ? this.readNumber(record, fields.declaredFieldCount) : 0,
            recordLength: fields.recordLength ? this.readNumber(record, fields.recordLength) : null,
            timeFrame: this.readString(record, fields.timeFrame),
            firstDate: this.readDate(record, fields.firstDate),
            lastDate: this.readDate(record, fields.lastDate),
            dataFileExtension: this.layout.dataFileExtension,
            source: this.layout.kind,
        };
    }

    *records(): Generator<SymbolMetadata> {
        for (let i = 0; i < this.recordCount; i++) {
            yield this.readRecordAt(i);
        }
    }

    readAll(): SymbolMetadata[] {
        return [...this.records()];
    }

    close(): void {
        this.file.close();
    }

    private placeholder(): SymbolMetadata {
        return {
            fileNumber: 0,
            symbolCode: '',
            displayName: '',
            declaredFieldCount: 0,
            recordLength: null,
            timeFrame: '',
            firstDate: null,
            lastDate: null,
            dataFileExtension: this.layout.dataFileExtension,
            source: this.layout.kind,
        };
    }

    private readNumber(record: Uint8Array, field: IndexField): number {
        switch (field.type) {
            case 'u8':
                return record[field.offset];
            case 'u16':
                return record[field.offset] | (record[field.offset + 1] << 8);
            default:
                throw new DecodeError(`${this.layout.fileName}: field type ${field.type} is not numeric`);
        }
    }

    private readString(record: Uint8Array, field: IndexField): string {
        switch (field.type) {
            case 'char':
                return trimPadding(String.fromCharCode(record[field.offset]));
            case 'text':
                return decodeText(record.subarray(field.offset, field.offset + field.width), this.nameDecoder);
            case 'symbol': {
                const raw = this.symbolDecoder.decode(record.subarray(field.offset, field.offset + field.width));
                return field.normalize ? normalizeSymbolName(raw) : trimPadding(raw);
            }
            default:
                throw new DecodeError(`${this.layout.fileName}: field type ${field.type} is not text`);
        }
    }

    /** Zeroed and otherwise invalid dates read as null. */
    private readDate(record: Uint8Array, field: IndexField): CalendarDate | null {
        if (field.type !== 'mbfDate' && field.type !== 'intDate') {
            throw new DecodeError(`${this.layout.fileName}: field type ${field.type} is not a date`);
        }
        const decode = field.type === 'mbfDate' ? decodeMbfDate : decodeIntDate;
        try {
            return decode(record, field.offset);
        } catch (e) {
            if (e instanceof DecodeError) return null;
            throw e;
        }
    }
}

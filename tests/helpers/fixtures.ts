import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { SymbolMetadata } from '../../src/quote-types.js';

/**
 * Test-only inverse of decodeMbf for values exactly representable as float32.
 */
export function encodeMbf(value: number): Uint8Array {
    const ieee = new Uint8Array(4);
    new DataView(ieee.buffer).setFloat32(0, value, true);
    const bits = new DataView(ieee.buffer).getUint32(0, true);
    if ((bits & 0x7fffffff) === 0) return new Uint8Array(4);

    const sign = bits >>> 31;
    const exponent = (bits >>> 23) & 0xff;
    const mantissa = bits & 0x7fffff;
    return new Uint8Array([
        mantissa & 0xff,
        (mantissa >>> 8) & 0xff,
        (sign << 7) | ((mantissa >>> 16) & 0x7f),
        exponent + 2,
    ]);
}

/** `(year - 1900) * 10000 + month * 100 + day`, the packing used by MBF date fields. */
export function packDate(year: number, month: number, day: number): number {
    return (year - 1900) * 10000 + month * 100 + day;
}

class RecordWriter {
    readonly bytes: Uint8Array;
    private readonly view: DataView;

    constructor(size: number) {
        this.bytes = new Uint8Array(size);
        this.view = new DataView(this.bytes.buffer);
    }

    u8(offset: number, value: number): this {
        this.view.setUint8(offset, value);
        return this;
    }

    u16(offset: number, value: number): this {
        this.view.setUint16(offset, value, true);
        return this;
    }

    u32(offset: number, value: number): this {
        this.view.setUint32(offset, value, true);
        return this;
    }

    /** Space-padded latin1 text, cut to `width`. */
    text(offset: number, width: number, value: string): this {
        const padded = value.padEnd(width, ' ').slice(0, width);
        for (let i = 0; i < width; i++) this.bytes[offset + i] = padded.charCodeAt(i) & 0xff;
        return this;
    }

    mbf(offset: number, value: number): this {
        this.bytes.set(encodeMbf(value), offset);
        return this;
    }

    raw(offset: number, data: Uint8Array): this {
        this.bytes.set(data, offset);
        return this;
    }
}

export interface StandardEntry {
    fileNumber: number;
    symbol: string;
    name?: string;
    fields?: number;
    recordLength?: number;
    timeFrame?: string;
    firstDate?: number;
    lastDate?: number;
}

export function buildStandardIndex(entries: StandardEntry[], declaredCount: number = entries.length): Uint8Array {
    const w = new RecordWriter((entries.length + 1) * 53);
    w.u16(0, declaredCount);
    entries.forEach((e, i) => {
        const base = (i + 1) * 53;
        w.u8(base, e.fileNumber)
            .u8(base + 3, e.recordLength ?? (e.fields ?? 7) * 4)
            .u8(base + 4, e.fields ?? 7)
            .text(base + 7, 16, e.name ?? '')
            .mbf(base + 25, e.firstDate ?? 0)
            .mbf(base + 29, e.lastDate ?? 0)
            .text(base + 33, 1, e.timeFrame ?? 'D')
            .text(base + 36, 14, e.symbol);
    });
    return w.bytes;
}

export interface ExtendedEntry {
    fileNumber: number;
    symbol?: string;
    name?: string;
    fields?: number;
    timeFrame?: string;
    firstDate?: number;
    lastDate?: number;
    /** Raw bytes written right after the file number, for placeholder tests. */
    garbage?: Uint8Array;
}

export function buildExtendedIndex(entries: ExtendedEntry[], lastFileNumber: number = 0): Uint8Array {
    const w = new RecordWriter((entries.length + 1) * 192);
    w.u16(0, entries.length).u16(2, lastFileNumber);
    entries.forEach((e, i) => {
        const base = (i + 1) * 192;
        w.u8(base + 2, e.fileNumber);
        if (e.garbage) {
            w.raw(base + 3, e.garbage);
            return;
        }
        w.u8(base + 6, e.fields ?? 7)
            .text(base + 11, 14, e.symbol ?? '')
            .text(base + 32, 16, e.name ?? '')
            .text(base + 60, 1, e.timeFrame ?? 'D')
            .mbf(base + 64, e.firstDate ?? 0)
            .mbf(base + 72, e.lastDate ?? 0);
    });
    return w.bytes;
}

export interface CrossRefEntry {
    fileNumber: number;
    symbol: string;
    name?: string;
    timeFrame?: string;
    /** Plain YYYYMMDD. */
    firstDate?: number;
    lastDate?: number;
}

export function buildCrossRefIndex(entries: CrossRefEntry[], declaredCount: number = entries.length): Uint8Array {
    const w = new RecordWriter((entries.length + 1) * 150);
    w.u16(10, declaredCount);
    entries.forEach((e, i) => {
        const base = (i + 1) * 150;
        w.text(base + 1, 14, e.symbol)
            .text(base + 16, 45, e.name ?? '')
            .text(base + 62, 1, e.timeFrame ?? 'D')
            .u16(base + 65, e.fileNumber)
            .u32(base + 108, e.firstDate ?? 0)
            .u32(base + 116, e.lastDate ?? 0);
    });
    return w.bytes;
}

export interface DataFileSpec {
    fieldCount: number;
    maxRecords?: number;
    /** Defaults to records.length + 1. */
    lastRecord?: number;
    /** One array of 4-byte cells per tick. */
    records: Uint8Array[][];
}

export function buildDataFile(spec: DataFileSpec): Uint8Array {
    const padding = (spec.fieldCount - 1) * 4;
    const cells = spec.records.flat();
    const w = new RecordWriter(4 + padding + cells.length * 4);
    w.u16(0, spec.maxRecords ?? spec.records.length + 1)
        .u16(2, spec.lastRecord ?? spec.records.length + 1);
    cells.forEach((cell, i) => w.raw(4 + padding + i * 4, cell));
    return w.bytes;
}

/** MBF cells for one tick. */
export function mbfCells(...values: number[]): Uint8Array[] {
    return values.map(encodeMbf);
}

export function makeQuoteDir(): string {
    const root = process.env.QUOTE_TEST_SANDBOX ?? os.tmpdir();
    return fs.mkdtempSync(path.join(root, 'quotes-'));
}

export function writeQuoteFile(dir: string, name: string, content: Uint8Array | string): void {
    fs.writeFileSync(path.join(dir, name), content);
}

export function makeSymbol(overrides: Partial<SymbolMetadata> = {}): SymbolMetadata {
    return {
        fileNumber: 7,
        symbolCode: 'ABC',
        displayName: 'ABC CORP',
        declaredFieldCount: 7,
        recordLength: null,
        timeFrame: 'D',
        firstDate: null,
        lastDate: null,
        dataFileExtension: '.DAT',
        source: 'extended',
        ...overrides,
    };
}

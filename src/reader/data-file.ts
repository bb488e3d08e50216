import * as path from 'node:path';
import type { ColumnLayout, DataFileHeader, DecodedRecord, SymbolMetadata } from '../quote-types.js';
import { BinaryFile, isFile } from './binary-file.js';
import { type ColumnRegistry, type ColumnSlot, slotWidth } from './columns.js';
import { DecodeError, StructuralFormatError } from './errors.js';
import { DATA_HEADER_SIZE, dataFileName } from './format.js';

/** Bytes one stored tick occupies under `layout`. */
export function recordWidth(layout: ColumnLayout, registry: ColumnRegistry): number {
    return registry.slotsFor(layout).reduce((sum, slot) => sum + slotWidth(slot), 0);
}

function fieldCountOf(symbol: SymbolMetadata, layout: ColumnLayout): number {
    return symbol.declaredFieldCount > 0 ? symbol.declaredFieldCount : layout.tokens.length;
}

function readHeader(file: BinaryFile, fieldCount: number): DataFileHeader {
    const maxRecords = file.readUint16At(0);
    const lastRecord = file.readUint16At(2);
    return {
        maxRecords,
        lastRecord,
        recordCount: Math.max(0, lastRecord - 1),
        // Padding after the header is (fields - 1) * 4 bytes. Derived from sample
        // files, not from any format description; verify against a wider corpus.
        dataOffset: DATA_HEADER_SIZE + Math.max(0, fieldCount - 1) * 4,
    };
}

function decodeRecord(symbol: SymbolMetadata, slots: ColumnSlot[], bytes: Uint8Array): DecodedRecord {
    const record: DecodedRecord = { Symbol: symbol.symbolCode };
    let pos = 0;
    for (const slot of slots) {
        if (slot.kind === 'known') {
            record[slot.column.name] = slot.column.read(bytes.subarray(pos, pos + slot.column.width));
        }
        pos += slotWidth(slot);
    }
    return record;
}

/**
 * Streams the fixed-width ticks of a symbol's data file.
 */
export class DataFileReader {
    constructor(private readonly directory: string, private readonly registry: ColumnRegistry) { }

    dataFilePath(symbol: SymbolMetadata): string {
        return path.join(this.directory, dataFileName(symbol.fileNumber, symbol.dataFileExtension));
    }

    private existingPath(symbol: SymbolMetadata): string {
        const filePath = this.dataFilePath(symbol);
        if (!isFile(filePath)) {
            throw new StructuralFormatError(
                `Data file for ${symbol.symbolCode} (file ${symbol.fileNumber}) not found: ${filePath}`,
                filePath
            );
        }
        return filePath;
    }

    readHeader(symbol: SymbolMetadata, layout: ColumnLayout): DataFileHeader {
        return BinaryFile.with(this.existingPath(symbol), file => readHeader(file, fieldCountOf(symbol, layout)));
    }

    /**
     * Yields one record per stored tick. The sequence is forward-only; the file
     * is released when iteration completes, fails, or is abandoned via return().
     */
    *readRecords(symbol: SymbolMetadata, layout: ColumnLayout): Generator<DecodedRecord> {
        const slots = this.registry.slotsFor(layout);
        const width = slots.reduce((sum, slot) => sum + slotWidth(slot), 0);
        const file = BinaryFile.open(this.existingPath(symbol));
        try {
            const header = readHeader(file, fieldCountOf(symbol, layout));
            for (let i = 0; i < header.recordCount; i++) {
                const position = header.dataOffset + i * width;
                if (position + width > file.size) {
                    throw new DecodeError(
                        `${file.path}: tick ${i + 1} of ${header.recordCount} runs past end of file (${file.size} bytes)`
                    );
                }
                yield decodeRecord(symbol, slots, file.readAt(position, width));
            }
        } finally {
            file.close();
        }
    }
}

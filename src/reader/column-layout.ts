import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ColumnLayout, SymbolMetadata } from '../quote-types.js';
import { isFile } from './binary-file.js';
import { ConfigurationError, StructuralFormatError } from './errors.js';
import { DEFAULT_COLUMN_LAYOUT, sidecarFileName } from './format.js';

const COLUMN_DEFINITION = /"(.+)",.+/i;

// Every sidecar ends with one entry that is not a column.
const TRAILING_ENTRIES = 1;

/**
 * Extracts column tokens from a sidecar definition file.
 *
 *   "DATE",1,...
 *   "OPEN",2,...
 *   <trailer>
 */
export function parseColumnDefinitions(text: string, source: string = 'sidecar'): string[] {
    const entries = text.split(/\s+/).filter(e => e.length > 0);
    const columns = entries.slice(0, Math.max(0, entries.length - TRAILING_ENTRIES));
    return columns.map((entry, i) => {
        const match = COLUMN_DEFINITION.exec(entry);
        if (!match) {
            throw new StructuralFormatError(`${source}: entry ${i + 1} is not a column definition: ${entry}`, source);
        }
        return match[1];
    });
}

export class ColumnLayoutResolver {
    constructor(private readonly directory: string) { }

    sidecarPath(symbol: SymbolMetadata): string {
        return path.join(this.directory, sidecarFileName(symbol.fileNumber));
    }

    resolve(symbol: SymbolMetadata): ColumnLayout {
        const sidecar = this.sidecarPath(symbol);
        if (!isFile(sidecar)) {
            if (symbol.declaredFieldCount !== DEFAULT_COLUMN_LAYOUT.length) {
                throw new ConfigurationError(
                    `${symbol.symbolCode} (file ${symbol.fileNumber}) has no column definitions and declares ` +
                    `${symbol.declaredFieldCount} fields; the default layout has ${DEFAULT_COLUMN_LAYOUT.length}`
                );
            }
            return { tokens: DEFAULT_COLUMN_LAYOUT, source: 'default' };
        }

        let text: string;
        try {
            text = fs.readFileSync(sidecar, 'latin1');
        } catch (e) {
            throw new StructuralFormatError(`Cannot read ${sidecar}`, sidecar, e);
        }
        const tokens = parseColumnDefinitions(text, sidecar);
        if (symbol.declaredFieldCount > 0 && tokens.length !== symbol.declaredFieldCount) {
            throw new StructuralFormatError(
                `${sidecar} defines ${tokens.length} columns, index declares ${symbol.declaredFieldCount}`,
                sidecar
            );
        }
        return { tokens, source: 'sidecar' };
    }
}

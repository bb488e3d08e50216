import type { ColumnLayout, DecodedValue } from '../quote-types.js';
import { ConfigurationError } from './errors.js';
import { decodeMbf, decodeMbfDate, decodeMbfTime, formatDate, formatTime, MBF_SIZE } from './mbf.js';

/** Width assumed for tokens the registry does not know. */
export const UNRECOGNIZED_COLUMN_WIDTH = 4;

export const MAX_PRECISION = 20;

export interface KnownColumn {
    /** Token as it appears in the sidecar file, e.g. `VOL`. */
    readonly token: string;
    /** Output key, e.g. `Volume`. */
    readonly name: string;
    readonly width: number;
    read(bytes: Uint8Array): DecodedValue;
}

export type ColumnSlot =
    | { kind: 'known'; token: string; column: KnownColumn }
    | { kind: 'unrecognized'; token: string; width: number };

export type ColumnRegistryOptions = {
    /** Digits after the decimal point for price columns. Default 2. */
    precision?: number;
};

function defineColumn<T>(
    token: string,
    name: string,
    decode: (bytes: Uint8Array) => T,
    format: (value: T) => DecodedValue,
): KnownColumn {
    return {
        token,
        name,
        width: MBF_SIZE,
        read: (bytes) => format(decode(bytes)),
    };
}

/**
 * Maps data-file column tokens to their decoders. Precision is fixed when the
 * registry is built and shared by every record it decodes.
 */
export class ColumnRegistry {
    readonly precision: number;
    private readonly columns: ReadonlyMap<string, KnownColumn>;

    constructor(options: ColumnRegistryOptions = {}) {
        const precision = options.precision ?? 2;
        if (!Number.isInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
            throw new ConfigurationError(`Precision must be an integer in 0..${MAX_PRECISION}, got ${precision}`);
        }
        this.precision = precision;

        const price = (value: number): string => value.toFixed(precision);
        const whole = (value: number): number => Math.trunc(value);

        // TIME renders as HHMMSS. Formatting it with the date pattern would give
        // the same value for every time of day.
        const known = [
            defineColumn('DATE', 'Date', decodeMbfDate, formatDate),
            defineColumn('TIME', 'Time', decodeMbfTime, formatTime),
            defineColumn('OPEN', 'Open', decodeMbf, price),
            defineColumn('HIGH', 'High', decodeMbf, price),
            defineColumn('LOW', 'Low', decodeMbf, price),
            defineColumn('CLOSE', 'Close', decodeMbf, price),
            defineColumn('VOL', 'Volume', decodeMbf, whole),
            defineColumn('OI', 'Oi', decodeMbf, whole),
        ];
        this.columns = new Map(known.map((c): [string, KnownColumn] => [c.token, c]));
    }

    isKnown(token: string): boolean {
        return this.columns.has(token);
    }

    get(token: string): KnownColumn | undefined {
        return this.columns.get(token);
    }

    slotFor(token: string): ColumnSlot {
        const column = this.columns.get(token);
        if (column) return { kind: 'known', token, column };
        return { kind: 'unrecognized', token, width: UNRECOGNIZED_COLUMN_WIDTH };
    }

    slotsFor(layout: ColumnLayout): ColumnSlot[] {
        return layout.tokens.map(token => this.slotFor(token));
    }

    /** Header of a decoded record set: `Symbol` followed by every recognized column. */
    outputColumns(layout: ColumnLayout): string[] {
        const names = ['Symbol'];
        for (const slot of this.slotsFor(layout)) {
            if (slot.kind === 'known') names.push(slot.column.name);
        }
        return names;
    }
}

export function slotWidth(slot: ColumnSlot): number {
    return slot.kind === 'known' ? slot.column.width : slot.width;
}

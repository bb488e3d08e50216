import type { CalendarDate, TimeOfDay } from '../quote-types.js';
import { DecodeError } from './errors.js';

/** Bytes of a single MBF value. */
export const MBF_SIZE = 4;

/**
 * Converts a 4-byte Microsoft Binary Format float to a JS number.
 *
 * MBF keeps the exponent in the last byte (bias 129) and the sign in the top bit
 * of the third byte. The low two bytes of mantissa are shared with IEEE-754
 * single precision, so only the high word is rebuilt:
 *
 *   word = b2 | b3 << 8
 *   exp  = (word & 0xff00) - 0x0200      // bias 129 -> 127, still shifted by 8
 *   high = (word & 0x7f) | sign << 15 | exp >> 1
 *
 * A zero high word is 0.0 whatever the low bytes hold.
 */
export function decodeMbf(bytes: Uint8Array): number {
    if (bytes.length < MBF_SIZE) {
        throw new DecodeError(`MBF value needs ${MBF_SIZE} bytes, got ${bytes.length}`);
    }
    return decodeMbfAt(bytes, 0);
}

export function decodeMbfAt(bytes: Uint8Array, offset: number): number {
    if (offset < 0 || offset + MBF_SIZE > bytes.length) {
        throw new DecodeError(`MBF read out of range at offset ${offset} (buffer ${bytes.length} bytes)`);
    }
    const word = bytes[offset + 2] | (bytes[offset + 3] << 8);
    if (word === 0) return 0;

    const exp = (word & 0xff00) - 0x0200;
    let high = (word & 0x7f) | ((word << 8) & 0x8000);
    high |= exp >> 1;

    const ieee = new Uint8Array(MBF_SIZE);
    ieee[0] = bytes[offset];
    ieee[1] = bytes[offset + 1];
    ieee[2] = high & 0xff;
    ieee[3] = (high >> 8) & 0xff;
    return new DataView(ieee.buffer).getFloat32(0, true);
}

export function isValidCalendarDate(date: CalendarDate): boolean {
    const { year, month, day } = date;
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
    if (month < 1 || month > 12 || day < 1) return false;
    return day <= daysInMonth(year, month);
}

function daysInMonth(year: number, month: number): number {
    if (month === 2) {
        const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
        return leap ? 29 : 28;
    }
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Dates are stored as `(year - 1900) * 10000 + month * 100 + day`,
 * so 2021-03-04 is 1210304.
 */
export function packedToDate(value: number): CalendarDate {
    const packed = Math.trunc(value);
    const date: CalendarDate = {
        year: 1900 + Math.floor(packed / 10000),
        month: Math.floor(packed / 100) % 100,
        day: packed % 100,
    };
    if (!isValidCalendarDate(date)) {
        throw new DecodeError(`Packed date ${packed} is not a calendar day`);
    }
    return date;
}

export function decodeMbfDate(bytes: Uint8Array, offset: number = 0): CalendarDate {
    return packedToDate(decodeMbfAt(bytes, offset));
}

/** Times are stored as `HHMM00`. */
export function decodeMbfTime(bytes: Uint8Array, offset: number = 0): TimeOfDay {
    const packed = Math.trunc(decodeMbfAt(bytes, offset));
    const time: TimeOfDay = {
        hour: Math.floor(packed / 10000),
        minute: Math.floor(packed / 100) % 100,
    };
    if (time.hour < 0 || time.hour > 23 || time.minute < 0 || time.minute > 59) {
        throw new DecodeError(`Packed time ${packed} is not a time of day`);
    }
    return time;
}

/**
 * Cross-reference index dates: a plain little-endian uint32 `YYYYMMDD`.
 * No MBF and no 1900 offset.
 */
export function decodeIntDate(bytes: Uint8Array, offset: number = 0): CalendarDate {
    if (offset < 0 || offset + 4 > bytes.length) {
        throw new DecodeError(`Integer date read out of range at offset ${offset} (buffer ${bytes.length} bytes)`);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const packed = view.getUint32(offset, true);
    const date: CalendarDate = {
        year: Math.floor(packed / 10000),
        month: Math.floor(packed / 100) % 100,
        day: packed % 100,
    };
    if (!isValidCalendarDate(date)) {
        throw new DecodeError(`Integer date ${packed} is not a calendar day`);
    }
    return date;
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

export function formatDate(date: CalendarDate): string {
    return `${pad(date.year, 4)}${pad(date.month, 2)}${pad(date.day, 2)}`;
}

export function formatTime(time: TimeOfDay): string {
    return `${pad(time.hour, 2)}${pad(time.minute, 2)}00`;
}

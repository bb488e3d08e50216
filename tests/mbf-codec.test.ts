import {
    decodeMbf, decodeMbfAt, decodeMbfDate, decodeMbfTime, decodeIntDate, packedToDate,
    formatDate, formatTime, DecodeError,
} from '../src/index.js';
import { encodeMbf, packDate } from './helpers/fixtures.js';

function bitsOf(value: number): number {
    const view = new DataView(new ArrayBuffer(4));
    view.setFloat32(0, value, true);
    return view.getUint32(0, true);
}

describe('MBF decoding', () => {
    it('decodes reference vectors', () => {
        expect(decodeMbf(new Uint8Array([0x00, 0x00, 0x00, 0x81]))).toBe(1);
        expect(decodeMbf(new Uint8Array([0x00, 0x00, 0x48, 0x84]))).toBe(12.5);
        expect(decodeMbf(new Uint8Array([0x00, 0x00, 0xc8, 0x84]))).toBe(-12.5);
        expect(decodeMbf(new Uint8Array([0x00, 0x80, 0x48, 0x87]))).toBe(100.25);
    });

    it('returns exactly 0 when the high word is zero', () => {
        const samples = [
            [0x00, 0x00, 0x00, 0x00],
            [0xab, 0xcd, 0x00, 0x00],
            [0xff, 0xff, 0x00, 0x00],
            [0x01, 0x00, 0x00, 0x00],
        ];
        for (const s of samples) {
            expect(Object.is(decodeMbf(new Uint8Array(s)), 0)).toBe(true);
        }
    });

    it('reproduces the float32 bit pattern of encoded values', () => {
        const values = [0.5, 1, 2.75, -3.75, 100.25, 1234.5, 15000, 1210304, 0.15625];
        for (const v of values) {
            const decoded = decodeMbf(encodeMbf(v));
            expect(bitsOf(decoded)).toBe(bitsOf(v));
            expect(decoded).toBe(Math.fround(v));
        }
    });

    it('reads values inside a larger buffer', () => {
        const buf = new Uint8Array(12);
        buf.set(encodeMbf(42.5), 4);
        expect(decodeMbfAt(buf, 4)).toBe(42.5);
        expect(() => decodeMbfAt(buf, 10)).toThrow(DecodeError);
        expect(() => decodeMbf(new Uint8Array(3))).toThrow(DecodeError);
    });
});

describe('packed dates and times', () => {
    it('unpacks (year - 1900) * 10000 + month * 100 + day', () => {
        expect(packedToDate(1210304)).toEqual({ year: 2021, month: 3, day: 4 });
        expect(packedToDate(991231)).toEqual({ year: 1999, month: 12, day: 31 });
        expect(decodeMbfDate(encodeMbf(packDate(2020, 2, 29)))).toEqual({ year: 2020, month: 2, day: 29 });
    });

    it('rejects values that are not calendar days', () => {
        expect(() => packedToDate(0)).toThrow(DecodeError);
        expect(() => packedToDate(1210230)).toThrow(DecodeError);
        expect(() => packedToDate(1211301)).toThrow(DecodeError);
    });

    it('decodes HHMM00 times', () => {
        expect(decodeMbfTime(encodeMbf(93000))).toEqual({ hour: 9, minute: 30 });
        expect(decodeMbfTime(encodeMbf(0))).toEqual({ hour: 0, minute: 0 });
        expect(() => decodeMbfTime(encodeMbf(250000))).toThrow(DecodeError);
    });

    it('decodes cross-reference integer dates without the 1900 offset', () => {
        const bytes = new Uint8Array(4);
        new DataView(bytes.buffer).setUint32(0, 20200115, true);
        expect(decodeIntDate(bytes)).toEqual({ year: 2020, month: 1, day: 15 });
        expect(() => decodeIntDate(new Uint8Array(4))).toThrow(DecodeError);
    });

    it('formats dates and times with zero padding', () => {
        expect(formatDate({ year: 2021, month: 3, day: 4 })).toBe('20210304');
        expect(formatTime({ hour: 9, minute: 5 })).toBe('090500');
    });
});

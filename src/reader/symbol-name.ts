import type { TextDecoder } from 'node:util';

/** Vendor marker: a name starting with `@` carries two characters of noise. */
export const SYMBOL_PREFIX_MARKER = '@';
export const SYMBOL_PREFIX_LENGTH = 2;
/** Everything from this character on is vendor metadata. */
export const SYMBOL_DELIMITER = '#';

/**
 * Fixed-width cleanup: NUL padding and surrounding whitespace.
 */
export function trimPadding(raw: string): string {
    return raw.replace(/\0/g, ' ').trim();
}

/**
 * Symbol-code cleanup for the standard and extended indexes.
 *
 * "@XFW20#A" -> "FW20", "KGHM" -> "KGHM". Whitespace left before the `#`
 * is trimmed too, so "@XAB #1" -> "AB".
 */
export function normalizeSymbolName(raw: string): string {
    let name = trimPadding(raw);
    if (name.startsWith(SYMBOL_PREFIX_MARKER)) {
        name = name.slice(SYMBOL_PREFIX_LENGTH);
    }
    const delimiterAt = name.indexOf(SYMBOL_DELIMITER);
    if (delimiterAt !== -1) {
        name = name.slice(0, delimiterAt);
    }
    return name.trim();
}

export function decodeText(bytes: Uint8Array, decoder: TextDecoder): string {
    return trimPadding(decoder.decode(bytes));
}

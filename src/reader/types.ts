export type QuoteLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type ReaderOptions = {
    /** Digits after the decimal point for OPEN/HIGH/LOW/CLOSE. Default 2. */
    precision?: number;
    /** TextDecoder label used for display names. Default `latin1`. */
    encoding?: string;
    /** Optional logger hook to surface catalog diagnostics without console.* in src/. */
    logger?: QuoteLogger | null;
};

export const DEFAULT_READER_OPTIONS: Required<ReaderOptions> = {
    precision: 2,
    encoding: 'latin1',
    logger: null,
};

export function resolveReaderOptions(options: ReaderOptions = {}): Required<ReaderOptions> {
    return { ...DEFAULT_READER_OPTIONS, ...options };
}

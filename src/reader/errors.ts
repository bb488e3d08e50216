export class QuoteReaderError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'QuoteReaderError';
    }
}

/**
 * A file is missing where it is required, or its size disagrees with the
 * counts it declares.
 */
export class StructuralFormatError extends QuoteReaderError {
    constructor(message: string, public readonly filePath?: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'StructuralFormatError';
    }
}

export class DecodeError extends QuoteReaderError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'DecodeError';
    }
}

export class ConfigurationError extends QuoteReaderError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'ConfigurationError';
    }
}

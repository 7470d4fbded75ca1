/**
 * Base error class for the range remapper library.
 */
export class RangeMapperError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RangeMapperError';
    }
}

/**
 * Thrown when structured input breaks a construction contract (e.g., mismatched rule lengths, overlapping rules).
 */
export class ConfigurationError extends RangeMapperError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when almanac text cannot be read into structured rules.
 */
export class ParseError extends RangeMapperError {
    constructor(message: string, public readonly line: number) {
        super(`Line ${line}: ${message}`);
        this.name = 'ParseError';
    }
}

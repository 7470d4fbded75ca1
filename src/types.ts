/**
 * Identifier of a stage in the translation chain (e.g., 'seed', 'soil').
 */
export type Category = string;

/**
 * A half-open span `[start, end)` of unsigned 64-bit integers.
 * `start <= end` always holds; a zero-length interval contains no values.
 */
export interface Interval {
    readonly start: bigint;
    readonly end: bigint;
}

/**
 * A constant-offset translation: every value in `source` maps to the value at
 * the same position in `target`. Both intervals have the same length.
 */
export interface RangeRule {
    readonly source: Interval;
    readonly target: Interval;
}

/**
 * A number tagged with the category it currently belongs to.
 */
export interface Value {
    category: Category;
    number: bigint;
}

/**
 * A rule as written in an almanac line: `[targetStart, sourceStart, length]`.
 */
export type RuleTriple = readonly [targetStart: bigint, sourceStart: bigint, length: bigint];

/**
 * How the numbers on the seeds line are read.
 */
export enum SeedMode {
    /** Every number is a seed of its own. */
    INDIVIDUAL,
    /** Numbers are consumed as `(start, length)` pairs, each describing a range of seeds. */
    RANGES,
}

/**
 * The rules of one category edge, in input order.
 */
export interface MapDefinition {
    sourceCategory: Category;
    targetCategory: Category;
    rules: RuleTriple[];
}

/**
 * Details of a single hop of a walk through the pipeline, handed to trace callbacks.
 */
export interface HopTrace<T> {
    from: Category;
    to: Category;
    input: T;
    output: T;
}

import { Interval, RangeRule, RuleTriple } from '../types';
import { ConfigurationError } from '../errors';

/**
 * The largest number an interval bound, rule or value may hold.
 */
export const MAX_VALUE = 2n ** 64n - 1n;

export function isValidNumber(value: bigint): boolean {
    return value >= 0n && value <= MAX_VALUE;
}

/**
 * True when both bounds are in range and `start <= end`.
 */
export function isValidInterval(interval: Interval): boolean {
    return isValidNumber(interval.start) && isValidNumber(interval.end) && interval.start <= interval.end;
}

function assertNumber(value: bigint, label: string): void {
    if (!isValidNumber(value)) {
        throw new ConfigurationError(`${label} must be an unsigned 64-bit integer, got ${value}.`);
    }
}

/**
 * Orders intervals by ascending start, for use with `Array.prototype.sort`.
 */
export function compareStarts(a: Interval, b: Interval): number {
    if (a.start < b.start) return -1;
    if (a.start > b.start) return 1;
    return 0;
}

/**
 * Creates a validated, frozen half-open interval `[start, end)`.
 *
 * @throws {ConfigurationError} If either bound is outside the unsigned 64-bit range, or `start > end`.
 */
export function createInterval(start: bigint, end: bigint): Interval {
    assertNumber(start, 'Interval start');
    assertNumber(end, 'Interval end');
    if (start > end) {
        throw new ConfigurationError(`Interval start ${start} is greater than its end ${end}.`);
    }
    return Object.freeze({ start, end });
}

export function intervalLength(interval: Interval): bigint {
    return interval.end - interval.start;
}

export function containsPoint(interval: Interval, n: bigint): boolean {
    return interval.start <= n && n < interval.end;
}

/**
 * Half-open overlap test. Ranges that only touch (`a.end === b.start`) do not overlap,
 * and a zero-length interval overlaps nothing.
 */
export function overlaps(a: Interval, b: Interval): boolean {
    return a.start < a.end && b.start < b.end && a.start < b.end && b.start < a.end;
}

/**
 * Returns the common part of two intervals, or undefined if they do not overlap.
 */
export function intersect(a: Interval, b: Interval): Interval | undefined {
    if (!overlaps(a, b)) {
        return undefined;
    }
    return {
        start: a.start > b.start ? a.start : b.start,
        end: a.end < b.end ? a.end : b.end,
    };
}

/**
 * The constant shift a rule applies to every value of its source interval. May be negative.
 */
export function ruleOffset(rule: RangeRule): bigint {
    return rule.target.start - rule.source.start;
}

/**
 * Narrows a rule to one of its sub-ranges.
 *
 * @param rule - The rule whose offset is applied.
 * @param sub - A range inside `rule.source`.
 * @returns A rule whose source is `sub` and whose target is the image of `sub`,
 * or undefined if `sub` is not contained in the rule's source.
 */
export function subrangeMap(rule: RangeRule, sub: Interval): RangeRule | undefined {
    if (rule.source.start > sub.start || rule.source.end < sub.end) {
        return undefined;
    }
    const targetStart = rule.target.start + (sub.start - rule.source.start);
    return {
        source: { start: sub.start, end: sub.end },
        target: { start: targetStart, end: targetStart + intervalLength(sub) },
    };
}

/**
 * Validates a rule and returns a frozen copy of it.
 *
 * @throws {ConfigurationError} If an interval is malformed or the two sides differ in length.
 */
export function validateRule(rule: RangeRule): RangeRule {
    const source = createInterval(rule.source.start, rule.source.end);
    const target = createInterval(rule.target.start, rule.target.end);
    if (intervalLength(source) !== intervalLength(target)) {
        throw new ConfigurationError(
            `Rule source [${source.start}, ${source.end}) and target [${target.start}, ${target.end}) differ in length.`
        );
    }
    return Object.freeze({ source, target });
}

/**
 * Builds a rule from an almanac triple `[targetStart, sourceStart, length]`.
 */
export function createRule([targetStart, sourceStart, length]: RuleTriple): RangeRule {
    assertNumber(length, 'Rule length');
    return validateRule({
        source: { start: sourceStart, end: sourceStart + length },
        target: { start: targetStart, end: targetStart + length },
    });
}

/**
 * The smallest start across a collection of intervals, or undefined when there are none.
 */
export function minStart(intervals: Iterable<Interval>): bigint | undefined {
    let min: bigint | undefined;
    for (const interval of intervals) {
        if (min === undefined || interval.start < min) {
            min = interval.start;
        }
    }
    return min;
}

import { MAX_VALUE, createInterval, createRule, intersect, intervalLength, containsPoint, isValidInterval, minStart, overlaps, ruleOffset, subrangeMap, validateRule } from '../src/engine/Interval';
import { ConfigurationError } from '../src/errors';
import { RangeRule } from '../src/types';

describe('Interval arithmetic', () => {

    describe('overlaps', () => {
        it('should detect ranges sharing values', () => {
            expect(overlaps({ start: 0n, end: 10n }, { start: 5n, end: 15n })).toBe(true);
            expect(overlaps({ start: 5n, end: 15n }, { start: 0n, end: 10n })).toBe(true);
            expect(overlaps({ start: 0n, end: 10n }, { start: 2n, end: 3n })).toBe(true);
        });

        it('should not treat touching ranges as overlapping', () => {
            expect(overlaps({ start: 0n, end: 10n }, { start: 10n, end: 20n })).toBe(false);
            expect(overlaps({ start: 10n, end: 20n }, { start: 0n, end: 10n })).toBe(false);
        });

        it('should never report an overlap for a zero-length interval', () => {
            expect(overlaps({ start: 5n, end: 5n }, { start: 0n, end: 10n })).toBe(false);
        });
    });

    describe('intersect', () => {
        it('should return the shared part of two ranges', () => {
            expect(intersect({ start: 120n, end: 300n }, { start: 100n, end: 200n })).toEqual({ start: 120n, end: 200n });
        });

        it('should return undefined for disjoint ranges', () => {
            expect(intersect({ start: 0n, end: 10n }, { start: 10n, end: 20n })).toBeUndefined();
        });
    });

    describe('subrangeMap', () => {
        const rule: RangeRule = { source: { start: 100n, end: 200n }, target: { start: 50n, end: 150n } };

        it('should translate a contained sub-range by the rule offset', () => {
            expect(subrangeMap(rule, { start: 120n, end: 200n })).toEqual({
                source: { start: 120n, end: 200n },
                target: { start: 70n, end: 150n },
            });
        });

        it('should return undefined when the sub-range leaves the source', () => {
            expect(subrangeMap(rule, { start: 90n, end: 110n })).toBeUndefined();
            expect(subrangeMap(rule, { start: 190n, end: 201n })).toBeUndefined();
        });
    });

    describe('construction', () => {
        it('should build a rule from a target, source, length triple', () => {
            const rule = createRule([40n, 18n, 4n]);
            expect(rule).toEqual({ source: { start: 18n, end: 22n }, target: { start: 40n, end: 44n } });
            expect(ruleOffset(rule)).toBe(22n);
        });

        it('should reject reversed and negative intervals', () => {
            expect(() => createInterval(5n, 4n)).toThrow(ConfigurationError);
            expect(() => createInterval(-1n, 4n)).toThrow('Interval start must be an unsigned 64-bit integer, got -1.');
        });

        it('should accept bounds up to the largest 64-bit value', () => {
            expect(createInterval(2n ** 60n, MAX_VALUE)).toEqual({ start: 1152921504606846976n, end: 18446744073709551615n });
            expect(() => createInterval(0n, MAX_VALUE + 1n)).toThrow(ConfigurationError);
        });

        it('should freeze created intervals and rules', () => {
            const rule = createRule([40n, 18n, 4n]);
            expect(Object.isFrozen(rule)).toBe(true);
            expect(Object.isFrozen(rule.source)).toBe(true);
            expect(Object.isFrozen(rule.target)).toBe(true);
        });

        it('should reject rules whose sides differ in length', () => {
            const rule = { source: { start: 1n, end: 2n }, target: { start: 4n, end: 6n } };
            expect(() => validateRule(rule)).toThrow('Rule source [1, 2) and target [4, 6) differ in length.');
        });

        it('should reject rules reaching past the 64-bit range', () => {
            expect(() => createRule([0n, MAX_VALUE, 2n])).toThrow('Interval end must be an unsigned 64-bit integer, got 18446744073709551617.');
        });
    });

    describe('helpers', () => {
        it('should measure half-open intervals and test membership', () => {
            const interval = { start: 3n, end: 7n };
            expect(intervalLength(interval)).toBe(4n);
            expect(containsPoint(interval, 3n)).toBe(true);
            expect(containsPoint(interval, 6n)).toBe(true);
            expect(containsPoint(interval, 7n)).toBe(false);
        });

        it('should tell valid intervals from reversed or out-of-range ones', () => {
            expect(isValidInterval({ start: 3n, end: 3n })).toBe(true);
            expect(isValidInterval({ start: 4n, end: 3n })).toBe(false);
            expect(isValidInterval({ start: 0n, end: MAX_VALUE + 1n })).toBe(false);
        });

        it('should find the smallest start', () => {
            expect(minStart([{ start: 39n, end: 40n }, { start: 10n, end: 11n }, { start: 82n, end: 85n }])).toBe(10n);
            expect(minStart([])).toBeUndefined();
        });
    });
});

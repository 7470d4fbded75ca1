import { Category, Interval, RangeRule, RuleTriple, Value } from '../types';
import { ConfigurationError } from '../errors';
import { IntervalIndex } from './IntervalIndex';
import { compareStarts, containsPoint, createInterval, createRule, isValidNumber, ruleOffset, validateRule } from './Interval';

/**
 * The translation table of a single `source -> target` category edge.
 *
 * Scalar lookups scan the rules in input order; range lookups go through an
 * interval index built from the same rules. Both views are fixed at construction.
 */
export class CategoryMap {
    private readonly ruleList: readonly RangeRule[];
    private readonly index: IntervalIndex;

    /**
     * Creates a new CategoryMap.
     *
     * @param sourceCategory - The category values are read from.
     * @param targetCategory - The category values are written to.
     * @param rules - The translation rules, in input order.
     * @throws {ConfigurationError} If the categories are equal, a rule is malformed, or two rules share source values.
     */
    constructor(
        public readonly sourceCategory: Category,
        public readonly targetCategory: Category,
        rules: readonly RangeRule[]
    ) {
        if (sourceCategory === targetCategory) {
            throw new ConfigurationError(`Category map '${sourceCategory}' cannot target its own category.`);
        }
        this.ruleList = Object.freeze(rules.map(validateRule));
        this.validateDisjoint();
        this.index = IntervalIndex.fromRules(this.ruleList);
    }

    /**
     * Creates a map from almanac triples `[targetStart, sourceStart, length]`.
     */
    public static fromTriples(sourceCategory: Category, targetCategory: Category, triples: readonly RuleTriple[]): CategoryMap {
        return new CategoryMap(sourceCategory, targetCategory, triples.map(createRule));
    }

    public get rules(): readonly RangeRule[] {
        return this.ruleList;
    }

    private validateDisjoint(): void {
        const sorted = this.ruleList
            .filter(r => r.source.start < r.source.end)
            .sort((a, b) => compareStarts(a.source, b.source));

        for (let i = 1; i < sorted.length; i++) {
            const prev = sorted[i - 1].source;
            const curr = sorted[i].source;
            if (prev.end > curr.start) {
                throw new ConfigurationError(
                    `Rules [${prev.start}, ${prev.end}) and [${curr.start}, ${curr.end}) of '${this.sourceCategory}-to-${this.targetCategory}' overlap.`
                );
            }
        }
    }

    /**
     * Translates a single value into the target category.
     *
     * A number no rule covers passes through unchanged.
     *
     * @returns The translated value, or undefined if the value is not in this map's source
     * category or its number is not an unsigned 64-bit integer.
     */
    public valueFor(value: Value): Value | undefined {
        if (value.category !== this.sourceCategory || !isValidNumber(value.number)) {
            return undefined;
        }

        const rule = this.ruleList.find(r => containsPoint(r.source, value.number));
        const number = rule ? value.number + ruleOffset(rule) : value.number;
        return { category: this.targetCategory, number };
    }

    /**
     * Translates a source-space interval into target-space intervals.
     *
     * Covered parts are shifted by their rule's offset; gaps before, between and after
     * them pass through unchanged. The pieces come out in ascending source order and
     * their lengths add up to the query's length.
     *
     * @param query - A source-category interval.
     * @throws {ConfigurationError} If the query is reversed or leaves the unsigned 64-bit range.
     */
    public rangesFor(query: Interval): Interval[] {
        const { start, end } = createInterval(query.start, query.end);
        const matches = this.index.findIntersections({ start, end });
        matches.sort((a, b) => compareStarts(a.source, b.source));

        const ranges: Interval[] = [];
        let cursor = start;
        for (const match of matches) {
            if (match.source.start > cursor) {
                ranges.push({ start: cursor, end: match.source.start });
            }
            ranges.push(match.target);
            cursor = match.source.end;
        }
        if (cursor < end || ranges.length === 0) {
            ranges.push({ start: cursor, end });
        }

        return ranges;
    }
}

import { Category, HopTrace, Interval, Value } from '../types';
import { ConfigurationError } from '../errors';
import { CategoryMap } from './CategoryMap';
import { isValidInterval, minStart } from './Interval';

/**
 * Configuration options for a pipeline.
 */
export interface PipelineOptions {
    /** Called after every hop of a scalar walk. */
    onValueHop?: (hop: HopTrace<bigint>) => void;
    /** Called after every hop of a range walk with copies of the working set before and after the hop. */
    onRangeHop?: (hop: HopTrace<readonly Interval[]>) => void;
}

/**
 * A chain of category maps keyed by source category.
 *
 * Walks move a value, or a working set of intervals, one map at a time until the
 * target category is reached. A walk fails (undefined) when it reaches a category
 * with no outgoing map, or comes back to a category it already left.
 */
export class Pipeline {
    private readonly maps = new Map<Category, CategoryMap>();

    constructor(maps: Iterable<CategoryMap> = [], private readonly options: PipelineOptions = {}) {
        for (const map of maps) {
            this.insert(map);
        }
    }

    /**
     * Registers a category map as the outgoing edge of its source category.
     *
     * @throws {ConfigurationError} If the source category already has a map.
     */
    public insert(map: CategoryMap): void {
        if (this.maps.has(map.sourceCategory)) {
            throw new ConfigurationError(`Category '${map.sourceCategory}' already has an outgoing map.`);
        }
        this.maps.set(map.sourceCategory, map);
    }

    public getMap(category: Category): CategoryMap | undefined {
        return this.maps.get(category);
    }

    public get categories(): Category[] {
        return Array.from(this.maps.keys());
    }

    /**
     * The categories a walk passes through, both ends included.
     *
     * @returns The path, or undefined if the target cannot be reached.
     */
    public chainFrom(source: Category, target: Category): Category[] | undefined {
        const path = [source];
        let current = source;
        while (current !== target) {
            const map = this.maps.get(current);
            if (!map || path.includes(map.targetCategory)) {
                return undefined;
            }
            current = map.targetCategory;
            path.push(current);
        }
        return path;
    }

    /**
     * Translates a single value hop by hop until it reaches the target category.
     *
     * @returns The value in the target category, or undefined if the chain dead-ends or cycles first.
     */
    public map(value: Value, targetCategory: Category): Value | undefined {
        const visited = new Set<Category>();
        let current = value;

        while (current.category !== targetCategory) {
            visited.add(current.category);
            const map = this.maps.get(current.category);
            const next = map?.valueFor(current);
            if (!next || visited.has(next.category)) {
                return undefined;
            }
            this.options.onValueHop?.({ from: current.category, to: next.category, input: current.number, output: next.number });
            current = next;
        }

        return current;
    }

    /**
     * Translates an interval hop by hop, re-splitting the working set at every map.
     *
     * @param interval - The interval to translate.
     * @param sourceCategory - The category the interval starts in.
     * @param targetCategory - The category to stop at.
     * @returns Target-category intervals covering as many values as the input,
     * or undefined if the chain dead-ends or cycles before the target.
     */
    public mapRange(interval: Interval, sourceCategory: Category, targetCategory: Category): Interval[] | undefined {
        return this.mapRanges([interval], sourceCategory, targetCategory);
    }

    /**
     * Translates a working set of intervals that all start in the same category.
     *
     * @returns undefined if the chain dead-ends or cycles, or if an interval is reversed
     * or leaves the unsigned 64-bit range.
     */
    public mapRanges(intervals: readonly Interval[], sourceCategory: Category, targetCategory: Category): Interval[] | undefined {
        if (!intervals.every(isValidInterval)) {
            return undefined;
        }
        const visited = new Set<Category>();
        let current = sourceCategory;
        let working: Interval[] = intervals.map(i => ({ start: i.start, end: i.end }));

        while (working.length > 0 && current !== targetCategory) {
            visited.add(current);
            const map = this.maps.get(current);
            if (!map || visited.has(map.targetCategory)) {
                return undefined;
            }

            const next = working.flatMap(i => map.rangesFor(i));
            this.options.onRangeHop?.({ from: current, to: map.targetCategory, input: [...working], output: [...next] });
            working = next;
            current = map.targetCategory;
        }

        return working;
    }

    /**
     * The smallest number any of the values maps to. Values whose walk fails are skipped.
     */
    public findLowest(numbers: Iterable<bigint>, sourceCategory: Category, targetCategory: Category): bigint | undefined {
        let lowest: bigint | undefined;
        for (const number of numbers) {
            const mapped = this.map({ category: sourceCategory, number }, targetCategory);
            if (mapped && (lowest === undefined || mapped.number < lowest)) {
                lowest = mapped.number;
            }
        }
        return lowest;
    }

    /**
     * The smallest start across the translations of every interval. Intervals whose walk
     * fails are skipped, and so are zero-length results, which hold no values.
     */
    public findLowestInRanges(intervals: Iterable<Interval>, sourceCategory: Category, targetCategory: Category): bigint | undefined {
        const mapped: Interval[] = [];
        for (const interval of intervals) {
            const ranges = this.mapRange(interval, sourceCategory, targetCategory) ?? [];
            mapped.push(...ranges.filter(r => r.start < r.end));
        }
        return minStart(mapped);
    }
}

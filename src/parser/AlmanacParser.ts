import { Category, Interval, MapDefinition, RuleTriple, SeedMode } from '../types';
import { ParseError } from '../errors';
import { DEFAULT_TARGET_CATEGORY } from '../defaults';
import { CategoryMap } from '../engine/CategoryMap';
import { MAX_VALUE } from '../engine/Interval';
import { Pipeline, PipelineOptions } from '../engine/Pipeline';

/**
 * Options for reading an almanac.
 */
export interface ParseOptions {
    /**
     * How the numbers on the seeds line are read.
     * Default: SeedMode.INDIVIDUAL.
     */
    seedMode?: SeedMode;
}

/**
 * The structured content of an almanac document.
 */
export interface Almanac {
    /** The category the seeds line declares values in (e.g., 'seed' for a "seeds:" line). */
    seedCategory: Category;
    /** Every number on the seeds line, in order. */
    seeds: bigint[];
    /** The seeds read as `(start, length)` pairs. Empty unless parsed in SeedMode.RANGES. */
    seedRanges: Interval[];
    /** One definition per map block, in document order. */
    maps: MapDefinition[];
}

export interface SolveOptions extends ParseOptions, PipelineOptions {
    /**
     * The category to translate seeds into.
     * Default: 'location'.
     */
    targetCategory?: Category;
}

const SEEDS_LINE = /^([a-z][a-z0-9_]*):(.*)$/i;
const MAP_HEADER = /^([a-z][a-z0-9_]*)-to-([a-z][a-z0-9_]*)\s+map:$/i;

function parseNumbers(text: string, line: number): bigint[] {
    const tokens = text.trim().split(/\s+/).filter(t => t.length > 0);
    return tokens.map(token => {
        if (!/^\d+$/.test(token)) {
            throw new ParseError(`Expected a non-negative integer, got '${token}'.`, line);
        }
        const value = BigInt(token);
        if (value > MAX_VALUE) {
            throw new ParseError(`Number ${token} does not fit in 64 bits.`, line);
        }
        return value;
    });
}

function pairSeeds(seeds: bigint[], line: number): Interval[] {
    if (seeds.length % 2 !== 0) {
        throw new ParseError(`Seed ranges need (start, length) pairs, got ${seeds.length} numbers.`, line);
    }
    const ranges: Interval[] = [];
    for (let i = 0; i < seeds.length; i += 2) {
        const start = seeds[i];
        const end = start + seeds[i + 1];
        if (end > MAX_VALUE) {
            throw new ParseError(`Seed range starting at ${start} ends beyond the supported range.`, line);
        }
        ranges.push({ start, end });
    }
    return ranges;
}

/**
 * Reads an almanac document.
 *
 * The first non-blank line declares the seeds (`seeds: 79 14 55 13`). Each
 * `<source>-to-<target> map:` header opens a block of rule lines, each holding
 * `targetStart sourceStart length`. Blank lines are ignored.
 *
 * @param text - The whole document.
 * @param options - Parsing options.
 * @throws {ParseError} If a line does not fit the format, or a source category has two blocks.
 */
export function parseAlmanac(text: string, options: ParseOptions = {}): Almanac {
    const seedMode = options.seedMode ?? SeedMode.INDIVIDUAL;
    const lines = text.split(/\r?\n/);

    let seedsLine: { label: string; numbers: bigint[]; line: number } | undefined;
    const maps: MapDefinition[] = [];
    let block: MapDefinition | undefined;

    for (let i = 0; i < lines.length; i++) {
        const lineNumber = i + 1;
        const line = lines[i].trim();
        if (line.length === 0) continue;

        if (!seedsLine) {
            const match = SEEDS_LINE.exec(line);
            if (!match) {
                throw new ParseError(`Expected a seeds line, got '${line}'.`, lineNumber);
            }
            seedsLine = { label: match[1], numbers: parseNumbers(match[2], lineNumber), line: lineNumber };
            continue;
        }

        const header = MAP_HEADER.exec(line);
        if (header) {
            const [, sourceCategory, targetCategory] = header;
            if (maps.some(m => m.sourceCategory === sourceCategory)) {
                throw new ParseError(`Category '${sourceCategory}' has more than one map.`, lineNumber);
            }
            block = { sourceCategory, targetCategory, rules: [] };
            maps.push(block);
            continue;
        }

        if (!block) {
            throw new ParseError(`Expected a map header, got '${line}'.`, lineNumber);
        }
        const numbers = parseNumbers(line, lineNumber);
        if (numbers.length !== 3) {
            throw new ParseError(`A rule needs 3 numbers (target start, source start, length), got ${numbers.length}.`, lineNumber);
        }
        const rule: RuleTriple = [numbers[0], numbers[1], numbers[2]];
        block.rules.push(rule);
    }

    if (!seedsLine) {
        throw new ParseError('Missing seeds line.', Math.max(lines.length, 1));
    }

    const label = seedsLine.label;
    return {
        seedCategory: label.endsWith('s') ? label.slice(0, -1) : label,
        seeds: seedsLine.numbers,
        seedRanges: seedMode === SeedMode.RANGES ? pairSeeds(seedsLine.numbers, seedsLine.line) : [],
        maps,
    };
}

/**
 * Builds a pipeline with one category map per almanac block.
 *
 * @throws {ConfigurationError} If a block holds overlapping or out-of-range rules.
 */
export function buildPipeline(almanac: Almanac, options: PipelineOptions = {}): Pipeline {
    const categoryMaps = almanac.maps.map(m => CategoryMap.fromTriples(m.sourceCategory, m.targetCategory, m.rules));
    return new Pipeline(categoryMaps, options);
}

/**
 * Parses an almanac and returns the smallest value any of its seeds translates to.
 *
 * In SeedMode.RANGES every seed range is walked as a whole.
 *
 * @returns The smallest target-category number, or undefined if no seed reaches the target.
 */
export function solveAlmanac(text: string, options: SolveOptions = {}): bigint | undefined {
    const almanac = parseAlmanac(text, options);
    const pipeline = buildPipeline(almanac, options);
    const target = options.targetCategory ?? DEFAULT_TARGET_CATEGORY;

    if (options.seedMode === SeedMode.RANGES) {
        return pipeline.findLowestInRanges(almanac.seedRanges, almanac.seedCategory, target);
    }
    return pipeline.findLowest(almanac.seeds, almanac.seedCategory, target);
}

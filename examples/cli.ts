import { readFileSync } from 'fs';
import { parseAlmanac, buildPipeline } from '../src/parser/AlmanacParser';
import { DEFAULT_TARGET_CATEGORY } from '../src/defaults';
import { RangeMapperError } from '../src/errors';
import { HopTrace, Interval, SeedMode } from '../src/types';
import { PipelineOptions } from '../src/engine/Pipeline';

// Usage: cli.ts <almanac file> [--ranges] [--verbose]
const args = process.argv.slice(2);
const inputPath = args.find(a => !a.startsWith('--'));
const useRanges = args.includes('--ranges');
const verbose = args.includes('--verbose');

if (!inputPath) {
    console.error('No input provided. Usage: cli.ts <almanac file> [--ranges] [--verbose]');
    process.exit(1);
}

function formatRanges(ranges: readonly Interval[]): string {
    return ranges.map(r => `[${r.start}..${r.end}) (${r.end - r.start})`).join(', ');
}

const traceOptions: PipelineOptions = verbose
    ? {
        onValueHop: (hop: HopTrace<bigint>) => console.log(`${hop.from} ${hop.input} -> ${hop.to} ${hop.output}`),
        onRangeHop: (hop: HopTrace<readonly Interval[]>) => {
            console.log(`${hop.from} -> ${hop.to}`);
            console.log(`\tfrom: ${formatRanges(hop.input)}`);
            console.log(`\tto:   ${formatRanges(hop.output)}`);
        },
    }
    : {};

try {
    const contents = readFileSync(inputPath, 'utf8');
    const almanac = parseAlmanac(contents, { seedMode: useRanges ? SeedMode.RANGES : SeedMode.INDIVIDUAL });
    const pipeline = buildPipeline(almanac, traceOptions);

    const smallest = useRanges
        ? pipeline.findLowestInRanges(almanac.seedRanges, almanac.seedCategory, DEFAULT_TARGET_CATEGORY)
        : pipeline.findLowest(almanac.seeds, almanac.seedCategory, DEFAULT_TARGET_CATEGORY);

    if (smallest === undefined) {
        console.error(`Couldn't map any ${almanac.seedCategory} to ${DEFAULT_TARGET_CATEGORY}.`);
        process.exit(1);
    }
    console.log(`smallest ${DEFAULT_TARGET_CATEGORY}: ${smallest}`);
} catch (error) {
    if (error instanceof RangeMapperError) {
        console.error(`${error.name}: ${error.message}`);
    } else {
        console.error('Could not read input file.');
        console.error(error);
    }
    process.exit(1);
}

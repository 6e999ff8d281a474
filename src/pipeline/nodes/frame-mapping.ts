import { FrameIndex, FrameRange, InputRef, inRange, rangeLength } from "../../shared/types/frame.types.js";
import { NodeConfig, NodeConfigOf } from "../../shared/types/graph-config.types.js";
import { ConfigError, OutOfRangeError } from "../../shared/utils/errors.js";



/**
 * Name and valid range of one of a node's input streams.
 */
export interface InputStreamInfo {
    name: string;
    range: FrameRange;
}

export interface ConcatLocation {
    segment: number;
    /** Frame index within the segment's input stream. */
    frame: FrameIndex;
    /** Present when the frame lies in a cross-blend with the previous segment. */
    blend?: {
        previousFrame: FrameIndex;
        /** Weight of the incoming segment, from 0 up to (not including) 1. */
        factor: number;
    };
}

function assertNever(value: never): never {
    throw new Error(`Unhandled node kind: ${JSON.stringify(value)}`);
}

function intersect(ranges: FrameRange[]): FrameRange {
    const start = Math.max(...ranges.map(r => r.start));
    const end = Math.min(...ranges.map(r => r.end));
    return { start, end: Math.max(start, end) };
}

/**
 * Start offsets of each concatenated segment, plus the total length as the last entry.
 */
export function concatSegmentStarts(lengths: number[], crossBlend: number): number[] {
    const starts = [ 0 ];
    let current = 0;
    for (const length of lengths.slice(0, -1)) {
        current += length - crossBlend;
        starts.push(current);
    }
    const last = lengths.at(-1) ?? 0;
    starts.push(current + last);
    return starts;
}

function concatLengths(config: NodeConfigOf<"concat">, inputs: InputStreamInfo[]): number[] {
    const lengths = inputs.map(input => rangeLength(input.range));
    if (inputs.length > 1) {
        const short = inputs.find((input, i) => lengths[ i ] < config.crossBlend);
        if (short) {
            throw new ConfigError(
                `${config.name}: input ${short.name} is shorter than the ${config.crossBlend}-frame cross-blend`,
                { node: config.name, input: short.name }
            );
        }
    }
    return lengths;
}

export function locateConcatFrame(
    config: NodeConfigOf<"concat">,
    inputs: InputStreamInfo[],
    frame: FrameIndex,
): ConcatLocation {
    const starts = concatSegmentStarts(concatLengths(config, inputs), config.crossBlend);

    for (let i = 0; i < inputs.length; i++) {
        if (frame < starts[ i ] || frame >= starts[ i + 1 ]) continue;

        const local = frame - starts[ i ];
        const location: ConcatLocation = { segment: i, frame: inputs[ i ].range.start + local };
        if (i > 0 && local < config.crossBlend) {
            location.blend = {
                previousFrame: inputs[ i - 1 ].range.start + (frame - starts[ i - 1 ]),
                factor: local / config.crossBlend,
            };
        }
        return location;
    }

    throw new OutOfRangeError(config.name, frame, { start: 0, end: starts.at(-1) ?? 0 });
}

/**
 * Offsets of a window of `width` frames around its centre: for width 3 this is [-1, 0, 1].
 */
export function windowOffsets(width: number): number[] {
    const before = Math.floor(width / 2);
    return Array.from({ length: width }, (_, i) => i - before);
}

/**
 * Valid output range of a node, given its inputs' ranges.
 * Sources pass their own (declared or probed) range as `sourceRange`.
 */
export function deriveRange(config: NodeConfig, inputs: InputStreamInfo[], sourceRange?: FrameRange): FrameRange {
    switch (config.kind) {
        case "source":
            if (!sourceRange) {
                throw new ConfigError(`${config.name}: source range has not been probed`, { node: config.name });
            }
            return sourceRange;
        case "map":
        case "window":
            return inputs[ 0 ].range;
        case "merge":
            return intersect(inputs.map(input => input.range));
        case "resample": {
            const { start, end } = inputs[ 0 ].range;
            return { start: Math.ceil(start / config.ratio), end: Math.ceil(end / config.ratio) };
        }
        case "substream": {
            const range = inputs[ 0 ].range;
            if (config.first < range.start || config.last > range.end || config.first >= config.last) {
                throw new ConfigError(
                    `${config.name}: substream [${config.first}, ${config.last}) does not fit ${inputs[ 0 ].name} [${range.start}, ${range.end})`,
                    { node: config.name }
                );
            }
            return { start: 0, end: config.last - config.first };
        }
        case "still":
            return { start: 0, end: config.count };
        case "hold": {
            const { name, range } = inputs[ 0 ];
            if (!inRange(range, config.frame)) {
                throw new ConfigError(
                    `${config.name}: frame ${config.frame} is outside ${name} [${range.start}, ${range.end})`,
                    { node: config.name }
                );
            }
            return { start: 0, end: config.count };
        }
        case "concat": {
            const starts = concatSegmentStarts(concatLengths(config, inputs), config.crossBlend);
            return { start: 0, end: starts.at(-1) ?? 0 };
        }
        default:
            return assertNever(config);
    }
}

/**
 * Input frames needed to produce `frame`, in the order the operation consumes them.
 * Pure: depends only on the configuration and the input ranges.
 */
export function requiredInputs(
    config: NodeConfig,
    frame: FrameIndex,
    inputs: InputStreamInfo[],
    ownRange: FrameRange,
): InputRef[] {
    if (!inRange(ownRange, frame)) {
        throw new OutOfRangeError(config.name, frame, ownRange);
    }

    switch (config.kind) {
        case "source":
        case "still":
            return [];
        case "hold":
            return [ { input: 0, frame: config.frame } ];
        case "map":
            return [ { input: 0, frame } ];
        case "merge":
            return inputs.map((_, input) => ({ input, frame }));
        case "window": {
            const { name, range } = inputs[ 0 ];
            const refs: InputRef[] = [];
            for (const offset of windowOffsets(config.width)) {
                const wanted = frame + offset;
                if (inRange(range, wanted)) {
                    refs.push({ input: 0, frame: wanted });
                    continue;
                }
                switch (config.edge) {
                    case "clamp":
                        refs.push({ input: 0, frame: Math.min(Math.max(wanted, range.start), range.end - 1) });
                        break;
                    case "skip":
                        break;
                    case "error":
                        throw new OutOfRangeError(name, wanted, range);
                    default:
                        return assertNever(config.edge);
                }
            }
            return refs;
        }
        case "resample":
            return [ { input: 0, frame: Math.floor(frame * config.ratio) } ];
        case "substream":
            return [ { input: 0, frame: frame + config.first } ];
        case "concat": {
            const location = locateConcatFrame(config, inputs, frame);
            if (!location.blend) return [ { input: location.segment, frame: location.frame } ];
            return [
                { input: location.segment - 1, frame: location.blend.previousFrame },
                { input: location.segment, frame: location.frame },
            ];
        }
        default:
            return assertNever(config);
    }
}

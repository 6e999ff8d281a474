//shared/types/frame.types.ts

/**
 * Non-negative position in a stream's ordered sequence.
 */
export type FrameIndex = number;

/**
 * Half-open range `[start, end)` of frame indices.
 */
export interface FrameRange {
    start: FrameIndex;
    end: FrameIndex;
}

/**
 * One required input frame: `input` is the position in the node's ordered input list.
 */
export interface InputRef {
    input: number;
    frame: FrameIndex;
}

export const EDGE_POLICIES = [ "clamp", "skip", "error" ] as const;
export type EdgePolicy = (typeof EDGE_POLICIES)[ number ];

export function rangeLength(range: FrameRange): number {
    return Math.max(0, range.end - range.start);
}

export function inRange(range: FrameRange, frame: FrameIndex): boolean {
    return frame >= range.start && frame < range.end;
}

export function framesOf(range: FrameRange): FrameIndex[] {
    const frames: FrameIndex[] = [];
    for (let f = range.start; f < range.end; f++) frames.push(f);
    return frames;
}

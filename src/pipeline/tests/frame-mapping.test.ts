import { describe, it, expect } from 'vitest';
import {
    InputStreamInfo,
    concatSegmentStarts,
    deriveRange,
    locateConcatFrame,
    requiredInputs,
    windowOffsets,
} from '../nodes/frame-mapping.js';
import { ConcatNodeConfigSchema, NodeConfig, NodeConfigInput, NodeConfigSchema } from '../../shared/types/graph-config.types.js';
import { ConfigError, OutOfRangeError } from '../../shared/utils/errors.js';

const node = (raw: NodeConfigInput): NodeConfig => NodeConfigSchema.parse(raw);
const stream = (name: string, start: number, end: number): InputStreamInfo => ({ name, range: { start, end } });

function required(config: NodeConfig, frame: number, inputs: InputStreamInfo[]) {
    return requiredInputs(config, frame, inputs, deriveRange(config, inputs)).map(ref => [ ref.input, ref.frame ]);
}

describe('windowOffsets', () => {
    it('centres odd widths', () => {
        expect(windowOffsets(1)).toEqual([ 0 ]);
        expect(windowOffsets(3)).toEqual([ -1, 0, 1 ]);
    });

    it('puts the extra frame before the centre for even widths', () => {
        expect(windowOffsets(4)).toEqual([ -2, -1, 0, 1 ]);
    });
});

describe('requiredInputs', () => {
    const src = [ stream('src', 0, 10) ];

    it('maps frame f of a map node to frame f of its input', () => {
        const map = node({ kind: 'map', name: 'm', path: '/m/{frame}.png', input: 'src' });
        expect(deriveRange(map, src)).toEqual({ start: 0, end: 10 });
        expect(required(map, 4, src)).toEqual([ [ 0, 4 ] ]);
    });

    it('asks every merge input for the same frame over the common range', () => {
        const merge = node({ kind: 'merge', name: 'mg', path: '/mg/{frame}.png', inputs: [ 'a', 'b' ] });
        const inputs = [ stream('a', 0, 10), stream('b', 2, 8) ];
        expect(deriveRange(merge, inputs)).toEqual({ start: 2, end: 8 });
        expect(required(merge, 3, inputs)).toEqual([ [ 0, 3 ], [ 1, 3 ] ]);
    });

    describe('window', () => {
        const window = (edge: 'clamp' | 'skip' | 'error') =>
            node({ kind: 'window', name: 'w', path: '/w/{frame}.png', input: 'src', width: 3, edge });

        it('takes neighbours in the interior', () => {
            expect(required(window('clamp'), 5, src)).toEqual([ [ 0, 4 ], [ 0, 5 ], [ 0, 6 ] ]);
        });

        it('clamps at both boundaries', () => {
            expect(required(window('clamp'), 0, src)).toEqual([ [ 0, 0 ], [ 0, 0 ], [ 0, 1 ] ]);
            expect(required(window('clamp'), 9, src)).toEqual([ [ 0, 8 ], [ 0, 9 ], [ 0, 9 ] ]);
        });

        it('drops out-of-range neighbours with skip', () => {
            expect(required(window('skip'), 0, src)).toEqual([ [ 0, 0 ], [ 0, 1 ] ]);
        });

        it('raises OutOfRange for the input stream with error', () => {
            const config = window('error');
            expect(() => requiredInputs(config, 0, src, deriveRange(config, src))).toThrowError(
                new OutOfRangeError('src', -1, { start: 0, end: 10 })
            );
        });
    });

    it('rejects frames outside the node’s own range', () => {
        const map = node({ kind: 'map', name: 'm', path: '/m/{frame}.png', input: 'src' });
        expect(() => requiredInputs(map, 10, src, deriveRange(map, src))).toThrow(OutOfRangeError);
    });

    describe('resample', () => {
        it('halves the frame count at ratio 2', () => {
            const config = node({ kind: 'resample', name: 'r', path: '/r/{frame}.png', input: 'src', ratio: 2 });
            expect(deriveRange(config, src)).toEqual({ start: 0, end: 5 });
            expect(required(config, 3, src)).toEqual([ [ 0, 6 ] ]);
        });

        it('repeats frames at ratio 0.5', () => {
            const config = node({ kind: 'resample', name: 'r', path: '/r/{frame}.png', input: 'src', ratio: 0.5 });
            expect(deriveRange(config, src)).toEqual({ start: 0, end: 20 });
            expect(required(config, 7, src)).toEqual([ [ 0, 3 ] ]);
        });

        it('keeps the last input frame reachable for uneven ratios', () => {
            const config = node({ kind: 'resample', name: 'r', path: '/r/{frame}.png', input: 'src', ratio: 3 });
            expect(deriveRange(config, src)).toEqual({ start: 0, end: 4 });
            expect(required(config, 3, src)).toEqual([ [ 0, 9 ] ]);
        });
    });

    describe('substream', () => {
        it('re-bases a slice of its input at zero', () => {
            const config = node({ kind: 'substream', name: 's', path: '/s/{frame}.png', input: 'src', first: 2, last: 6 });
            expect(deriveRange(config, src)).toEqual({ start: 0, end: 4 });
            expect(required(config, 1, src)).toEqual([ [ 0, 3 ] ]);
        });

        it('rejects a slice beyond the input', () => {
            const config = node({ kind: 'substream', name: 's', path: '/s/{frame}.png', input: 'src', first: 5, last: 12 });
            expect(() => deriveRange(config, src)).toThrow(ConfigError);
        });
    });

    describe('still', () => {
        it('repeats one image for its declared length without inputs', () => {
            const config = node({ kind: 'still', name: 'card', path: '/card/{frame}.png', image: '/title.png', count: 5 });
            expect(deriveRange(config, [])).toEqual({ start: 0, end: 5 });
            expect(required(config, 3, [])).toEqual([]);
        });

        it('defaults to 24 frames', () => {
            const config = node({ kind: 'still', name: 'card', path: '/card/{frame}.png', image: '/title.png' });
            expect(deriveRange(config, [])).toEqual({ start: 0, end: 24 });
        });
    });

    describe('hold', () => {
        it('maps every output frame to the held input frame', () => {
            const config = node({ kind: 'hold', name: 'h', path: '/h/{frame}.png', input: 'src', frame: 7, count: 30 });
            expect(deriveRange(config, src)).toEqual({ start: 0, end: 30 });
            expect(required(config, 0, src)).toEqual([ [ 0, 7 ] ]);
            expect(required(config, 29, src)).toEqual([ [ 0, 7 ] ]);
        });

        it('rejects a held frame outside its input', () => {
            const config = node({ kind: 'hold', name: 'h', path: '/h/{frame}.png', input: 'src', frame: 12 });
            expect(() => deriveRange(config, src)).toThrowError('h: frame 12 is outside src [0, 10)');
        });
    });

    describe('concat', () => {
        const inputs = [ stream('a', 0, 10), stream('b', 0, 8) ];

        it('plays inputs back to back without a blend', () => {
            const config = node({ kind: 'concat', name: 'c', path: '/c/{frame}.png', inputs: [ 'a', 'b' ] });
            expect(deriveRange(config, inputs)).toEqual({ start: 0, end: 18 });
            expect(required(config, 9, inputs)).toEqual([ [ 0, 9 ] ]);
            expect(required(config, 12, inputs)).toEqual([ [ 1, 2 ] ]);
        });

        it('overlaps segments by the cross-blend and needs both inputs inside it', () => {
            const config = node({ kind: 'concat', name: 'c', path: '/c/{frame}.png', inputs: [ 'a', 'b' ], crossBlend: 4 });
            expect(deriveRange(config, inputs)).toEqual({ start: 0, end: 14 });
            expect(required(config, 5, inputs)).toEqual([ [ 0, 5 ] ]);
            expect(required(config, 6, inputs)).toEqual([ [ 0, 6 ], [ 1, 0 ] ]);
            expect(required(config, 9, inputs)).toEqual([ [ 0, 9 ], [ 1, 3 ] ]);
            expect(required(config, 10, inputs)).toEqual([ [ 1, 4 ] ]);
        });

        it('reports the blend weight of the incoming segment', () => {
            const config = ConcatNodeConfigSchema.parse({ kind: 'concat', name: 'c', path: '/c/{frame}.png', inputs: [ 'a', 'b' ], crossBlend: 4 });
            expect(locateConcatFrame(config, inputs, 9)).toEqual({
                segment: 1,
                frame: 3,
                blend: { previousFrame: 9, factor: 0.75 },
            });
        });

        it('rejects inputs shorter than the cross-blend', () => {
            const config = node({ kind: 'concat', name: 'c', path: '/c/{frame}.png', inputs: [ 'a', 'b' ], crossBlend: 9 });
            expect(() => deriveRange(config, inputs)).toThrow(ConfigError);
        });
    });
});

describe('concatSegmentStarts', () => {
    it('lists segment starts followed by the total length', () => {
        expect(concatSegmentStarts([ 10, 8, 5 ], 0)).toEqual([ 0, 10, 18, 23 ]);
        expect(concatSegmentStarts([ 10, 8, 5 ], 2)).toEqual([ 0, 8, 14, 19 ]);
    });
});

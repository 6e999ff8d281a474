import { describe, it, expect, beforeEach } from 'vitest';
import { FrameNode } from '../nodes/frame-node.js';
import { FrameGraph } from '../graph.js';
import { ConfigError } from '../../shared/utils/errors.js';
import { CommandRunner } from '../services/command-runner.js';
import { FakeCommandRunner, MemoryFrameStore, makeContext } from './fakes.js';

describe('FrameNode', () => {
    let store: MemoryFrameStore;
    let source: FrameNode;
    let map: FrameNode;

    beforeEach(async () => {
        store = new MemoryFrameStore();
        store.seed('/src/{frame:03}.png', 0, 5);
        source = FrameNode.fromConfig({ kind: 'source', name: 'src', path: '/src/{frame:03}.png' }, store);
        map = FrameNode.fromConfig({ kind: 'map', name: 'm', path: '/m/{frame:03}.png', input: 'src' }, store);

        const graph = new FrameGraph();
        graph.addNode(map);
        graph.addNode(source);
        await graph.prepare();
    });

    it('derives its range from its input', () => {
        expect(source.frameRange()).toEqual({ start: 0, end: 5 });
        expect(map.frameRange()).toEqual({ start: 0, end: 5 });
        expect(map.inputs).toHaveLength(1);
        expect(map.inputs[ 0 ]).toBe(source);
    });

    it('uses a declared source count without probing', () => {
        const declared = FrameNode.fromConfig({ kind: 'source', name: 'd', path: '/d/{frame}.png', count: 3 }, store);
        expect(declared.frameRange()).toEqual({ start: 0, end: 3 });
    });

    it('adds the source offset to file numbers', () => {
        const offset = FrameNode.fromConfig({ kind: 'source', name: 'o', path: '/o/{frame}.png', offset: 10 }, store);
        expect(offset.output.pathFor(0)).toBe('/o/10.png');
    });

    it('rejects invalid configuration', () => {
        expect(() => FrameNode.fromConfig({ kind: 'window', name: 'w', path: '/w/{frame}.png', input: 'src', width: 0 }, store))
            .toThrow(ConfigError);
        expect(() => FrameNode.fromConfig({ kind: 'map', name: 'bad name', path: '/w/{frame}.png', input: 'src' }, store))
            .toThrow(ConfigError);
    });

    it('limits tile merges to the cells of the grid', () => {
        const tile = (columns: number, rows: number) => FrameNode.fromConfig({
            kind: 'merge', name: 'mg', path: '/mg/{frame}.png', inputs: [ 'a', 'b', 'c' ], layout: 'tile', columns, rows,
        }, store);

        expect(() => tile(2, 1)).toThrowError('mg: a 2x1 tile takes at most 2 inputs');
        expect(tile(3, 1).inputNames).toEqual([ 'a', 'b', 'c' ]);
    });

    it('has no inputs for a still', () => {
        const still = FrameNode.fromConfig({ kind: 'still', name: 'card', path: '/card/{frame}.png', image: '/title.png', count: 3 }, store);
        expect(still.inputNames).toEqual([]);
        expect(still.isSource).toBe(false);
        expect(still.frameRange()).toEqual({ start: 0, end: 3 });
    });

    describe('execute', () => {
        it('succeeds for a source frame that exists', async () => {
            const result = await source.execute(2, [], makeContext(store, new FakeCommandRunner(store)));
            expect(result).toEqual({ ok: true, key: 'src#2', node: 'src', frame: 2, outputPath: '/src/002.png', attempts: 1 });
        });

        it('reports a missing source frame as MissingInput', async () => {
            const result = await source.execute(7, [], makeContext(store, new FakeCommandRunner(store)));
            expect(result).toMatchObject({ ok: false, code: 'MissingInput', message: 'Source frame 7 of src not found at /src/007.png' });
        });

        it('runs the operation and checks the output exists', async () => {
            const runner = new FakeCommandRunner(store);
            const result = await map.execute(2, [ '/src/002.png' ], makeContext(store, runner));

            expect(result).toEqual({ ok: true, key: 'm#2', node: 'm', frame: 2, outputPath: '/m/002.png', attempts: 1 });
            expect(runner.calls).toEqual([ [ 'convert', '/src/002.png', '/m/002.png' ] ]);
            expect(await store.exists('/m/002.png')).toBe(true);
        });

        it('removes partial output when the command exits non-zero', async () => {
            const runner = new FakeCommandRunner(store, { failOutputs: new Set([ '/m/002.png' ]) });
            const result = await map.execute(2, [ '/src/002.png' ], makeContext(store, runner));

            expect(result).toMatchObject({
                ok: false,
                code: 'TransformFailed',
                message: 'Command for m#2 exited with code 1: convert: unable to open image',
            });
            expect(store.removed).toEqual([ '/m/002.png' ]);
            expect(store.files.has('/m/002.png')).toBe(false);
        });

        it('fails and removes the empty file when the command succeeds without writing output', async () => {
            const runner = new FakeCommandRunner(store, { silentOutputs: new Set([ '/m/002.png' ]) });
            const result = await map.execute(2, [ '/src/002.png' ], makeContext(store, runner));

            expect(result).toMatchObject({
                ok: false,
                code: 'TransformFailed',
                message: 'Command for m#2 reported success but wrote no output at /m/002.png',
            });
            expect(store.removed).toEqual([ '/m/002.png' ]);
            expect(store.files.has('/m/002.png')).toBe(false);
        });

        it('fails when the command cannot be started', async () => {
            const runner: CommandRunner = { run: () => Promise.reject(new Error('spawn convert ENOENT')) };
            const result = await map.execute(2, [ '/src/002.png' ], makeContext(store, runner));

            expect(result).toMatchObject({
                ok: false,
                code: 'TransformFailed',
                message: 'Command for m#2 could not be started: spawn convert ENOENT',
            });
        });
    });
});

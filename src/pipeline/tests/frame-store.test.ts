import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LocalFrameStore } from '../services/frame-store.js';
import { FramePathTemplate } from '../frame-path.js';
import { Stream } from '../stream.js';

describe('LocalFrameStore', () => {
    let dir: string;
    const store = new LocalFrameStore();

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'frame-store-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    const touch = (name: string, content = 'pixels') => fs.writeFile(path.join(dir, name), content);

    it('lists frame numbers matching the template, ascending', async () => {
        await Promise.all([ touch('shot_0003.png'), touch('shot_0001.png'), touch('shot_0002.png'), touch('shot_1.png'), touch('notes.txt') ]);

        expect(await store.listFrames(new FramePathTemplate(path.join(dir, 'shot_{frame:04}.png')))).toEqual([ 1, 2, 3 ]);
    });

    it('lists nothing for a missing directory', async () => {
        expect(await store.listFrames(new FramePathTemplate(path.join(dir, 'absent', '{frame}.png')))).toEqual([]);
    });

    it('treats empty files and directories as missing', async () => {
        await touch('full.png');
        await touch('empty.png', '');
        await fs.mkdir(path.join(dir, 'folder.png'));

        expect(await store.exists(path.join(dir, 'full.png'))).toBe(true);
        expect(await store.exists(path.join(dir, 'empty.png'))).toBe(false);
        expect(await store.exists(path.join(dir, 'folder.png'))).toBe(false);
        expect(await store.exists(path.join(dir, 'none.png'))).toBe(false);
    });

    it('removes files and tolerates missing ones', async () => {
        await touch('full.png');

        await store.remove(path.join(dir, 'full.png'));
        await store.remove(path.join(dir, 'none.png'));

        expect(await store.exists(path.join(dir, 'full.png'))).toBe(false);
    });

    it('creates nested directories', async () => {
        await store.ensureDirectory(path.join(dir, 'a', 'b'));
        expect((await fs.stat(path.join(dir, 'a', 'b'))).isDirectory()).toBe(true);
    });

    it('backs a source stream with an offset', async () => {
        await Promise.all([ touch('shot_0001.png'), touch('shot_0002.png'), touch('shot_0003.png') ]);
        const stream = new Stream('src', new FramePathTemplate(path.join(dir, 'shot_{frame:04}.png')), store, { offset: 1 });

        expect(await stream.availableRange()).toEqual({ start: 0, end: 3 });
        expect(stream.pathFor(0)).toBe(path.join(dir, 'shot_0001.png'));
        expect(await stream.exists(2)).toBe(true);
        expect(await stream.exists(3)).toBe(false);
    });
});

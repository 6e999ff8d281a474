import * as path from 'node:path';
import { DEFAULT_TOOLS } from '../../shared/config.js';
import { FramePathTemplate } from '../frame-path.js';
import { ExecutionContext } from '../nodes/frame-node.js';
import { CommandResult, CommandRunner } from '../services/command-runner.js';
import { FrameStore } from '../services/frame-store.js';



/**
 * In-memory FrameStore. A file "exists" when it has non-empty content.
 */
export class MemoryFrameStore implements FrameStore {
    readonly files = new Map<string, string>();
    readonly removed: string[] = [];

    write(filePath: string, content = 'pixels') {
        this.files.set(filePath, content);
    }

    /** Writes frames `[start, end)` through a template, as an external producer would. */
    seed(template: string, start: number, end: number) {
        const parsed = new FramePathTemplate(template);
        for (let n = start; n < end; n++) this.write(parsed.format(n));
    }

    async listFrames(template: FramePathTemplate): Promise<number[]> {
        const numbers: number[] = [];
        for (const filePath of this.files.keys()) {
            if (path.dirname(filePath) !== template.directory) continue;
            const n = template.parse(path.basename(filePath));
            if (n !== undefined) numbers.push(n);
        }
        return numbers.sort((a, b) => a - b);
    }

    async exists(filePath: string): Promise<boolean> {
        return (this.files.get(filePath) ?? '').length > 0;
    }

    async remove(filePath: string): Promise<void> {
        this.removed.push(filePath);
        this.files.delete(filePath);
    }

    async ensureDirectory(): Promise<void> { }
}

export interface FakeRunnerOptions {
    /** Outputs whose command exits non-zero. */
    failOutputs?: Set<string>;
    /** Outputs whose command exits zero leaving an empty file. */
    silentOutputs?: Set<string>;
    delayMs?: number;
}

/**
 * Stands in for ImageMagick: "writes" the last argument (the output path) into
 * the store, and records every invocation.
 */
export class FakeCommandRunner implements CommandRunner {
    readonly calls: string[][] = [];
    active = 0;
    maxActive = 0;

    constructor(private store: MemoryFrameStore, private options: FakeRunnerOptions = {}) { }

    outputs(): string[] {
        return this.calls.map(outputOf);
    }

    async run(argv: string[]): Promise<CommandResult> {
        this.calls.push(argv);
        this.active++;
        this.maxActive = Math.max(this.maxActive, this.active);
        try {
            if (this.options.delayMs) {
                await new Promise(resolve => setTimeout(resolve, this.options.delayMs));
            }

            const output = outputOf(argv);
            if (this.options.failOutputs?.has(output)) {
                this.store.write(output, 'partial');
                return { exitCode: 1, signal: null, stderr: 'convert: unable to open image' };
            }
            this.store.write(output, this.options.silentOutputs?.has(output) ? '' : `rendered by ${argv[ 0 ]}`);
            return { exitCode: 0, signal: null, stderr: '' };
        } finally {
            this.active--;
        }
    }
}

export function outputOf(argv: string[]): string {
    return (argv.at(-1) ?? '').replace(/^PNG24:/, '');
}

export function makeContext(store: MemoryFrameStore, runner: CommandRunner): ExecutionContext {
    return { store, runner, tools: DEFAULT_TOOLS };
}

import { FrameIndex, FrameRange } from "../shared/types/index.js";
import { FramePathTemplate } from "./frame-path.js";
import { FrameStore } from "./services/frame-store.js";



export interface StreamOptions {
    /** Added to the frame index to obtain the file number. */
    offset?: number;
    /** Declared length; skips probing when set. */
    count?: number;
}

/**
 * Ordered, file-backed sequence of frames owned by exactly one producing node.
 */
export class Stream {
    readonly offset: number;
    private range?: FrameRange;
    private probe?: Promise<FrameRange>;

    constructor(
        readonly producer: string,
        readonly template: FramePathTemplate,
        private readonly store: FrameStore,
        options: StreamOptions = {},
    ) {
        this.offset = options.offset ?? 0;
        if (options.count !== undefined) {
            this.range = { start: 0, end: options.count };
        }
    }

    pathFor(frame: FrameIndex): string {
        return this.template.format(frame + this.offset);
    }

    exists(frame: FrameIndex): Promise<boolean> {
        return this.store.exists(this.pathFor(frame));
    }

    knownRange(): FrameRange | undefined {
        return this.range;
    }

    /**
     * Discovers the frames present on disk once and caches the result.
     * Gaps inside the range are allowed and surface as missing frames.
     */
    availableRange(): Promise<FrameRange> {
        if (this.range) return Promise.resolve(this.range);
        if (!this.probe) {
            this.probe = this.store.listFrames(this.template).then(numbers => {
                const indices = numbers
                    .map(n => n - this.offset)
                    .filter(index => index >= 0);

                const range = indices.length === 0
                    ? { start: 0, end: 0 }
                    : {
                        start: indices.reduce((a, b) => Math.min(a, b)),
                        end: indices.reduce((a, b) => Math.max(a, b)) + 1,
                    };

                console.log(`[Stream] ${this.producer}: found ${indices.length} frames in [${range.start}, ${range.end})`);
                this.range = range;
                return range;
            });
        }
        return this.probe;
    }
}

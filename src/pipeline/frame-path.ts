import path from "path";
import { ConfigError } from "../shared/utils/errors.js";



const PLACEHOLDER = /\{frame(?::(\d+))?\}/g;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Maps frame numbers to file paths and back, e.g. `renders/shot_{frame:04}.png`.
 * The `{frame}` placeholder must appear exactly once, in the file name.
 */
export class FramePathTemplate {
    readonly directory: string;
    readonly padding: number;
    private readonly prefix: string;
    private readonly suffix: string;
    private readonly matcher: RegExp;

    constructor(readonly template: string) {
        const matches = [ ...template.matchAll(PLACEHOLDER) ];
        if (matches.length !== 1) {
            throw new ConfigError(`Frame path "${template}" must contain exactly one {frame} placeholder`, { template });
        }

        const fileName = path.basename(template);
        const [ placeholder ] = [ ...fileName.matchAll(PLACEHOLDER) ];
        if (!placeholder || placeholder.index === undefined) {
            throw new ConfigError(`Frame path "${template}" must carry {frame} in the file name, not the directory`, { template });
        }

        this.directory = path.dirname(template);
        this.padding = placeholder[ 1 ] ? Number.parseInt(placeholder[ 1 ], 10) : 0;
        this.prefix = fileName.slice(0, placeholder.index);
        this.suffix = fileName.slice(placeholder.index + placeholder[ 0 ].length);
        this.matcher = new RegExp(`^${escapeRegExp(this.prefix)}(\\d+)${escapeRegExp(this.suffix)}$`);
    }

    format(frameNumber: number): string {
        if (!Number.isInteger(frameNumber) || frameNumber < 0) {
            throw new RangeError(`Frame number must be a non-negative integer, got ${frameNumber}`);
        }
        const fileName = `${this.prefix}${String(frameNumber).padStart(this.padding, "0")}${this.suffix}`;
        return path.join(this.directory, fileName);
    }

    /**
     * Inverse of `format` for a bare file name. Returns undefined for names
     * this template would never produce (including wrong zero padding).
     */
    parse(fileName: string): number | undefined {
        const match = this.matcher.exec(fileName);
        if (!match) return undefined;

        const digits = match[ 1 ];
        const frameNumber = Number.parseInt(digits, 10);
        if (String(frameNumber).padStart(this.padding, "0") !== digits) return undefined;
        return frameNumber;
    }
}
